import { describe, it, expect } from "vitest";
import { computeWeightedScore } from "../weighted.js";
import { DEFAULT_SCORE_PARAMS } from "../types.js";

describe("computeWeightedScore", () => {
  it("should blend with the default 0.6 / 0.3 / 0.1 weights", () => {
    // 0.6 * 2.0 + 0.3 * 0.1 + 0.1 * 0.5 = 1.2 + 0.03 + 0.05
    expect(computeWeightedScore(2.0, 0.1, 0.5, DEFAULT_SCORE_PARAMS.weights)).toBeCloseTo(1.28, 12);
  });

  it("should not require weights to sum to 1", () => {
    expect(computeWeightedScore(1, 2, 3, { wEtf: 1, wStables: 1, wStress: 1 })).toBe(6);
  });

  it("should return 0 when all inputs are 0", () => {
    expect(computeWeightedScore(0, 0, 0, DEFAULT_SCORE_PARAMS.weights)).toBe(0);
  });

  it("should pass negative scores through unclamped", () => {
    expect(computeWeightedScore(-1, 0, 0, { wEtf: 0.5, wStables: 0, wStress: 0 })).toBe(-0.5);
  });
});
