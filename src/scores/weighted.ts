import type { ScoreWeights } from "./types.js";

/** Linear blend of the three scores. Weights are not required to sum to 1. */
export function computeWeightedScore(etf: number, stables: number, stress: number, weights: ScoreWeights): number {
  return weights.wEtf * etf + weights.wStables * stables + weights.wStress * stress;
}
