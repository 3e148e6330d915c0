/**
 * Score Engine
 *
 * Pure composition of the four score functions. No I/O and no module state:
 * every constant arrives through `params`, so identical inputs always give
 * identical results.
 */
import type { PriceSample, ScoreParams, ScoreResult, StableCapSample } from "./types.js";
import { computeMomentumVolumeScore } from "./momentum-volume.js";
import { computeStablesScore } from "./stables.js";
import { computeStressScore } from "./stress.js";
import { computeWeightedScore } from "./weighted.js";

export interface ScoreInput {
  /** Ordered oldest first */
  prices: readonly PriceSample[];
  stables: readonly StableCapSample[];
  /** Cycle time, ISO-8601 UTC */
  timestamp: string;
}

export function computeScores(input: ScoreInput, params: ScoreParams): ScoreResult {
  const scoreETF = computeMomentumVolumeScore(input.prices, params.momentum);
  const scoreStables = computeStablesScore(input.stables);
  const scoreStress = computeStressScore(input.prices, params.stress);
  const scoreWeighted = computeWeightedScore(scoreETF, scoreStables, scoreStress, params.weights);
  return {
    timestamp: input.timestamp,
    scoreETF,
    scoreStables,
    scoreStress,
    scoreWeighted,
  };
}
