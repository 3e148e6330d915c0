import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CoinGeckoSource, toPriceSamples, toStableCapSamples } from "../coingecko.js";
import { FetchError } from "../../errors.js";

const DAY = 24 * 60 * 60 * 1000;
const T = Date.UTC(2024, 0, 1);

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  };
}

describe("toPriceSamples", () => {
  it("joins volumes by timestamp and keeps the latest point per day", () => {
    const samples = toPriceSamples({
      prices: [
        [T + DAY + 3_600_000, 111],
        [T, 100],
        [T + DAY, 110],
      ],
      total_volumes: [
        [T, 5],
        [T + DAY, 6],
        [T + DAY + 3_600_000, 7],
      ],
    });
    expect(samples).toEqual([
      { timestamp: T, price: 100, volume: 5 },
      { timestamp: T + DAY + 3_600_000, price: 111, volume: 7 },
    ]);
  });

  it("drops non-positive and null prices", () => {
    const samples = toPriceSamples({
      prices: [
        [T, 0],
        [T + DAY, null],
        [T + 2 * DAY, -3],
        [T + 3 * DAY, 120],
      ],
      total_volumes: [],
    });
    expect(samples).toEqual([{ timestamp: T + 3 * DAY, price: 120, volume: 0 }]);
  });

  it("defaults missing or null volumes to 0", () => {
    const samples = toPriceSamples({
      prices: [[T, 100]],
      total_volumes: [[T, null]],
    });
    expect(samples).toEqual([{ timestamp: T, price: 100, volume: 0 }]);
  });
});

describe("toStableCapSamples", () => {
  it("derives the prior cap from the 24h change and keeps request order", () => {
    const samples = toStableCapSamples(
      [
        { id: "dai", market_cap: 100, market_cap_change_24h: null },
        { id: "tether", market_cap: 1000, market_cap_change_24h: -50 },
      ],
      ["tether", "usd-coin", "dai"],
    );
    expect(samples).toEqual([
      { id: "tether", marketCapNow: 1000, marketCapPrior24h: 1050 },
      { id: "dai", marketCapNow: 100, marketCapPrior24h: 100 },
    ]);
  });

  it("clamps a derived prior cap at 0", () => {
    const samples = toStableCapSamples([{ id: "dai", market_cap: 10, market_cap_change_24h: 25 }], ["dai"]);
    expect(samples).toEqual([{ id: "dai", marketCapNow: 10, marketCapPrior24h: 0 }]);
  });
});

describe("CoinGeckoSource", () => {
  let fetchSpy: ReturnType<typeof vi.fn>;
  const source = new CoinGeckoSource({ baseUrl: "https://api.test/v3/", apiKey: "test-key", vsCurrency: "usd" });

  beforeEach(() => {
    fetchSpy = vi.fn();
    vi.stubGlobal("fetch", fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests daily market_chart data and maps it", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({
        prices: [
          [T, 100],
          [T + DAY, 101],
        ],
        market_caps: [],
        total_volumes: [
          [T, 1000],
          [T + DAY, 1100],
        ],
      }),
    );

    const samples = await source.fetchPriceHistory("bitcoin", 30, { timeoutMs: 1000 });

    expect(samples).toEqual([
      { timestamp: T, price: 100, volume: 1000 },
      { timestamp: T + DAY, price: 101, volume: 1100 },
    ]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://api.test/v3/coins/bitcoin/market_chart?vs_currency=usd&days=30&interval=daily");
    expect(init.headers["x-cg-demo-api-key"]).toBe("test-key");
  });

  it("requests stablecoin markets with a comma-joined id list", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse([
        { id: "tether", symbol: "usdt", market_cap: 900, market_cap_change_24h: -100 },
        { id: "usd-coin", symbol: "usdc", market_cap: 500, market_cap_change_24h: 0 },
      ]),
    );

    const samples = await source.fetchStableCaps(["tether", "usd-coin"], { timeoutMs: 1000 });

    expect(samples).toEqual([
      { id: "tether", marketCapNow: 900, marketCapPrior24h: 1000 },
      { id: "usd-coin", marketCapNow: 500, marketCapPrior24h: 500 },
    ]);
    expect(fetchSpy.mock.calls[0][0]).toBe("https://api.test/v3/coins/markets?vs_currency=usd&ids=tether%2Cusd-coin");
  });

  it("omits the API key header when none is configured", async () => {
    fetchSpy.mockResolvedValue(jsonResponse([]));
    const anonymous = new CoinGeckoSource({ baseUrl: "https://api.test/v3", vsCurrency: "usd" });

    await anonymous.fetchStableCaps(["dai"], { timeoutMs: 1000 });

    expect(fetchSpy.mock.calls[0][1].headers).toEqual({ Accept: "application/json" });
  });

  it("returns an empty list for an empty but valid payload", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ prices: [], total_volumes: [] }));
    await expect(source.fetchPriceHistory("bitcoin", 30, { timeoutMs: 1000 })).resolves.toEqual([]);
  });

  it("throws FetchError with the status on a non-2xx response", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: "rate limited" }, 429));

    const err = await source.fetchStableCaps(["tether"], { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: "fetch", statusCode: 429, endpoint: "/coins/markets" });
    expect((err as FetchError).message).toBe("Fetch failed (/coins/markets): HTTP 429");
  });

  it("throws FetchError when the request times out", async () => {
    fetchSpy.mockRejectedValue(Object.assign(new Error("aborted"), { name: "TimeoutError" }));

    await expect(source.fetchPriceHistory("bitcoin", 30, { timeoutMs: 50 })).rejects.toThrow(
      "Fetch failed (/coins/bitcoin/market_chart): timed out after 50ms",
    );
  });

  it("throws FetchError on a network error", async () => {
    fetchSpy.mockRejectedValue(new Error("getaddrinfo ENOTFOUND api.test"));

    await expect(source.fetchStableCaps(["dai"], { timeoutMs: 1000 })).rejects.toBeInstanceOf(FetchError);
  });

  it("throws FetchError on a malformed payload", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ prices: "nope" }));

    await expect(source.fetchPriceHistory("bitcoin", 30, { timeoutMs: 1000 })).rejects.toThrow(
      "unexpected market_chart payload",
    );
  });

  it("throws FetchError when the body is not JSON", async () => {
    fetchSpy.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => {
        throw new SyntaxError("Unexpected token < in JSON");
      },
    });

    await expect(source.fetchStableCaps(["dai"], { timeoutMs: 1000 })).rejects.toThrow(
      "Fetch failed (/coins/markets): invalid JSON: Unexpected token < in JSON",
    );
  });
});
