import type { PriceSample, StressParams } from "./types.js";
import { normalize01, populationStdDev, simpleReturns } from "./math.js";

/**
 * Volatility stress over the trailing `lookback` daily returns.
 * Population std dev of simple returns, mapped linearly from
 * [floor, ceiling] onto [0, 1] and saturated outside it.
 * @returns 0 = calm, 1 = extreme; 0 when fewer than 2 prices
 */
export function computeStressScore(samples: readonly PriceSample[], params: StressParams): number {
  if (samples.length < 2) return 0;
  const lookback = Math.max(1, Math.floor(params.lookback));
  const prices = samples.slice(-(lookback + 1)).map((s) => s.price);
  const vol = populationStdDev(simpleReturns(prices));
  return normalize01(vol, params.floor, params.ceiling);
}
