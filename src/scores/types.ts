export interface PriceSample {
  /** Epoch milliseconds (UTC) */
  timestamp: number;
  price: number;
  volume: number;
}

export interface StableCapSample {
  /** CoinGecko coin id, e.g. "tether" */
  id: string;
  marketCapNow: number;
  marketCapPrior24h: number;
}

export interface MomentumParams {
  /** Trailing window in days, counted back from the last sample */
  windowDays: number;
  momentumWeight: number;
  volumeWeight: number;
}

export interface StressParams {
  /** Number of daily returns (lookback + 1 prices) */
  lookback: number;
  floor: number;
  ceiling: number;
}

export interface ScoreWeights {
  wEtf: number;
  wStables: number;
  wStress: number;
}

export interface ScoreParams {
  momentum: MomentumParams;
  stress: StressParams;
  weights: ScoreWeights;
}

export interface ScoreResult {
  /** ISO-8601 UTC */
  timestamp: string;
  scoreETF: number;
  scoreStables: number;
  /** Always within [0, 1] */
  scoreStress: number;
  scoreWeighted: number;
}

export const DEFAULT_SCORE_PARAMS: ScoreParams = {
  momentum: { windowDays: 30, momentumWeight: 0.7, volumeWeight: 0.3 },
  stress: { lookback: 14, floor: 0.005, ceiling: 0.03 },
  weights: { wEtf: 0.6, wStables: 0.3, wStress: 0.1 },
};
