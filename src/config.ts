import dotenv from "dotenv";

dotenv.config();

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// Everything the job reads from the environment lives here. The score engine
// itself never touches process.env; it receives `config.scores` as arguments.
export const config = {
  coingecko: {
    baseUrl: process.env.COINGECKO_BASE_URL ?? "https://api.coingecko.com/api/v3",
    /** Optional demo-plan key, sent as x-cg-demo-api-key */
    apiKey: process.env.COINGECKO_API_KEY ?? "",
    timeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS ?? "20000", 10),
    vsCurrency: process.env.VS_CURRENCY ?? "usd",
  },
  market: {
    assetId: process.env.ASSET_ID ?? "bitcoin",
    historyDays: parseInt(process.env.HISTORY_DAYS ?? "30", 10),
    stablecoinIds: parseList(process.env.STABLECOIN_IDS, ["tether", "usd-coin", "dai"]),
  },
  scores: {
    momentum: {
      windowDays: parseInt(process.env.MOMENTUM_WINDOW_DAYS ?? "30", 10),
      momentumWeight: parseFloat(process.env.MOMENTUM_WEIGHT ?? "0.7"),
      volumeWeight: parseFloat(process.env.VOLUME_WEIGHT ?? "0.3"),
    },
    stress: {
      lookback: parseInt(process.env.STRESS_LOOKBACK ?? "14", 10),
      /** Daily-return std dev at or below which stress is 0 */
      floor: parseFloat(process.env.STRESS_FLOOR ?? "0.005"),
      /** Daily-return std dev at or above which stress is 1 */
      ceiling: parseFloat(process.env.STRESS_CEILING ?? "0.03"),
    },
    weights: {
      wEtf: parseFloat(process.env.W_ETF ?? "0.6"),
      wStables: parseFloat(process.env.W_STABLES ?? "0.3"),
      wStress: parseFloat(process.env.W_STRESS ?? "0.1"),
    },
  },
  output: {
    csvPath: process.env.SIGNALS_CSV_PATH ?? "signals.csv",
    latestPath: process.env.LATEST_JSON_PATH ?? "latest.json",
    pair: process.env.SIGNAL_PAIR ?? "BTC/CHF",
    note: process.env.SIGNAL_NOTE ?? "coingecko-auto",
  },
};

export type AppConfig = typeof config;
