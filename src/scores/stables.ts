import type { StableCapSample } from "./types.js";
import { safeDivide } from "./math.js";

/**
 * Stablecoin dominance score: the 24h relative change of the combined
 * stablecoin market cap, sign-inverted. Shrinking stable supply reads as
 * rising risk appetite and therefore scores higher.
 */
export function computeStablesScore(samples: readonly StableCapSample[]): number {
  if (samples.length === 0) return 0;
  const totalNow = samples.reduce((s, c) => s + c.marketCapNow, 0);
  const totalPrior = samples.reduce((s, c) => s + c.marketCapPrior24h, 0);
  const rel = safeDivide(totalNow - totalPrior, totalPrior);
  // avoid emitting -0
  return rel === 0 ? 0 : -rel;
}
