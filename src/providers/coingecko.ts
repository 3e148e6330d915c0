import { z } from "zod";
import { FetchError, errorMessage } from "../errors.js";
import { logFetch } from "../logging.js";
import type { PriceSample, StableCapSample } from "../scores/types.js";

// ─── Collaborator interface ──────────────────────────────────

export interface FetchOptions {
  timeoutMs: number;
}

/**
 * Upstream market data. Implementations throw FetchError on any failure;
 * an empty array means the upstream answered with no data.
 */
export interface MarketDataSource {
  /** Daily samples, oldest first, one per UTC day */
  fetchPriceHistory(assetId: string, days: number, opts: FetchOptions): Promise<PriceSample[]>;
  /** One sample per returned id, in the order requested */
  fetchStableCaps(ids: readonly string[], opts: FetchOptions): Promise<StableCapSample[]>;
}

// ─── Wire schemas ────────────────────────────────────────────

const PointSchema = z.tuple([z.number(), z.number().nullable()]);

const MarketChartSchema = z.object({
  prices: z.array(PointSchema),
  total_volumes: z.array(PointSchema),
});

const MarketRowSchema = z.object({
  id: z.string(),
  market_cap: z.number().nullable().optional(),
  market_cap_change_24h: z.number().nullable().optional(),
});

const MarketsSchema = z.array(MarketRowSchema);

export type MarketChartPayload = z.infer<typeof MarketChartSchema>;
export type MarketRow = z.infer<typeof MarketRowSchema>;

// ─── Payload mapping (pure) ──────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Join price and volume points by timestamp, drop unusable prices and keep
 * the latest observation of each UTC day.
 */
export function toPriceSamples(payload: MarketChartPayload): PriceSample[] {
  const volumeAt = new Map<number, number>();
  for (const [ts, vol] of payload.total_volumes) {
    if (vol !== null && Number.isFinite(vol) && vol >= 0) volumeAt.set(ts, vol);
  }

  const byDay = new Map<number, PriceSample>();
  for (const [ts, price] of payload.prices) {
    if (price === null || !Number.isFinite(price) || price <= 0 || !Number.isFinite(ts)) continue;
    const day = Math.floor(ts / DAY_MS);
    const existing = byDay.get(day);
    if (existing && existing.timestamp > ts) continue;
    byDay.set(day, { timestamp: ts, price, volume: volumeAt.get(ts) ?? 0 });
  }

  return [...byDay.values()].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * CoinGecko reports the current cap and its absolute 24h change; the prior
 * cap is derived from those. Ids missing from the response are skipped.
 */
export function toStableCapSamples(rows: readonly MarketRow[], ids: readonly string[]): StableCapSample[] {
  const byId = new Map(rows.map((r): [string, MarketRow] => [r.id, r]));
  const out: StableCapSample[] = [];
  for (const id of ids) {
    const row = byId.get(id);
    if (!row) continue;
    const now = Math.max(0, row.market_cap ?? 0);
    const change = row.market_cap_change_24h ?? 0;
    out.push({ id, marketCapNow: now, marketCapPrior24h: Math.max(0, now - change) });
  }
  return out;
}

// ─── HTTP client ─────────────────────────────────────────────

export interface CoinGeckoOptions {
  baseUrl: string;
  apiKey?: string;
  vsCurrency: string;
}

export class CoinGeckoSource implements MarketDataSource {
  private readonly baseUrl: string;

  constructor(private readonly opts: CoinGeckoOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  async fetchPriceHistory(assetId: string, days: number, opts: FetchOptions): Promise<PriceSample[]> {
    const path = `/coins/${encodeURIComponent(assetId)}/market_chart`;
    const payload = await this.getJson(path, { vs_currency: this.opts.vsCurrency, days: String(days), interval: "daily" }, opts);
    const parsed = MarketChartSchema.safeParse(payload);
    if (!parsed.success) {
      logFetch.error({ path, issues: parsed.error.issues }, "market_chart response failed schema validation");
      throw new FetchError("unexpected market_chart payload", path);
    }
    const samples = toPriceSamples(parsed.data);
    logFetch.debug({ assetId, days, samples: samples.length }, "Price history fetched");
    return samples;
  }

  async fetchStableCaps(ids: readonly string[], opts: FetchOptions): Promise<StableCapSample[]> {
    const path = "/coins/markets";
    const payload = await this.getJson(path, { vs_currency: this.opts.vsCurrency, ids: ids.join(",") }, opts);
    const parsed = MarketsSchema.safeParse(payload);
    if (!parsed.success) {
      logFetch.error({ path, issues: parsed.error.issues }, "coins/markets response failed schema validation");
      throw new FetchError("unexpected coins/markets payload", path);
    }
    const samples = toStableCapSamples(parsed.data, ids);
    if (samples.length < ids.length) {
      const got = new Set(samples.map((s) => s.id));
      logFetch.warn({ missing: ids.filter((id) => !got.has(id)) }, "Some stablecoin ids were not returned");
    }
    return samples;
  }

  private async getJson(path: string, params: Record<string, string>, opts: FetchOptions): Promise<unknown> {
    const url = `${this.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.opts.apiKey) headers["x-cg-demo-api-key"] = this.opts.apiKey;

    const start = Date.now();
    let res: Response;
    try {
      res = await fetch(url, { headers, signal: AbortSignal.timeout(opts.timeoutMs) });
    } catch (e: unknown) {
      const timedOut = e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
      const message = timedOut ? `timed out after ${opts.timeoutMs}ms` : errorMessage(e);
      throw new FetchError(message, path, undefined, { cause: e });
    }

    if (!res.ok) {
      throw new FetchError(`HTTP ${res.status}`, path, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (e: unknown) {
      throw new FetchError(`invalid JSON: ${errorMessage(e)}`, path, res.status, { cause: e });
    }
    logFetch.debug({ path, status: res.status, duration_ms: Date.now() - start }, `GET ${path} → ${res.status}`);
    return body;
  }
}
