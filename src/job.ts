/**
 * One score cycle: fetch → compute → persist.
 *
 * A fetch failure aborts before anything is written, so the previous
 * signals.csv row and latest.json stay as they were. Persisting is
 * all-or-nothing: every sink is staged, then committed in order, and any
 * failure rolls back what was already committed. There is no retry within
 * a cycle.
 */
import type { AppConfig } from "./config.js";
import { FetchError, ScoreJobError, WriteError, errorMessage } from "./errors.js";
import { logScores, logSink } from "./logging.js";
import type { MarketDataSource } from "./providers/coingecko.js";
import { computeScores } from "./scores/engine.js";
import type { PriceSample, ScoreResult, StableCapSample } from "./scores/types.js";
import type { PendingWrite, ResultSink } from "./sinks/types.js";

export interface CycleDeps {
  source: MarketDataSource;
  /** Committed in order; the row store first, then the snapshot */
  sinks: readonly ResultSink[];
  config: Pick<AppConfig, "coingecko" | "market" | "scores">;
  now?: () => Date;
}

export async function runScoreCycle(deps: CycleDeps): Promise<ScoreResult> {
  const { source, sinks, config } = deps;
  const now = deps.now ?? (() => new Date());
  const fetchOpts = { timeoutMs: config.coingecko.timeoutMs };
  const start = Date.now();

  let prices: PriceSample[];
  let stables: StableCapSample[];
  try {
    [prices, stables] = await Promise.all([
      source.fetchPriceHistory(config.market.assetId, config.market.historyDays, fetchOpts),
      source.fetchStableCaps(config.market.stablecoinIds, fetchOpts),
    ]);
  } catch (e: unknown) {
    if (e instanceof ScoreJobError) throw e;
    throw new FetchError(errorMessage(e), "market-data", undefined, { cause: e });
  }

  if (prices.length < 2) {
    logScores.warn({ samples: prices.length }, "Too few price samples — price scores default to 0");
  }
  if (stables.length === 0) {
    logScores.warn("No stablecoin market caps returned — stables score defaults to 0");
  }

  const result = computeScores(
    { prices, stables, timestamp: now().toISOString() },
    config.scores,
  );
  logScores.info(
    {
      scoreETF: result.scoreETF,
      scoreStables: result.scoreStables,
      scoreStress: result.scoreStress,
      scoreWeighted: result.scoreWeighted,
      priceSamples: prices.length,
      stablecoins: stables.length,
    },
    "Scores computed",
  );

  await persist(result, sinks);

  logScores.info({ duration_ms: Date.now() - start, sinks: sinks.map((s) => s.name) }, "Score cycle complete");
  return result;
}

async function persist(result: ScoreResult, sinks: readonly ResultSink[]): Promise<void> {
  const staged: Array<{ name: string; pending: PendingWrite }> = [];
  let current = "";
  try {
    for (const sink of sinks) {
      current = sink.name;
      staged.push({ name: sink.name, pending: await sink.prepare(result) });
    }
    for (const { name, pending } of staged) {
      current = name;
      await pending.commit();
    }
  } catch (e: unknown) {
    for (const { name, pending } of [...staged].reverse()) {
      try {
        await pending.rollback();
      } catch (rollbackErr: unknown) {
        logSink.error({ err: rollbackErr, sink: name }, "Rollback failed; output may hold a partial cycle");
      }
    }
    if (e instanceof ScoreJobError) throw e;
    throw new WriteError(errorMessage(e), current, { cause: e });
  }
}
