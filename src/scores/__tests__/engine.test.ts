import { describe, it, expect } from "vitest";
import { computeScores } from "../engine.js";
import { DEFAULT_SCORE_PARAMS } from "../types.js";
import { linearRise, makeSeries } from "./helpers.js";

const TS = "2024-02-01T00:00:00.000Z";

describe("computeScores", () => {
  it("should compose all four scores for a linear rise", () => {
    const result = computeScores(
      {
        prices: linearRise(),
        stables: [{ id: "tether", marketCapNow: 900, marketCapPrior24h: 1000 }],
        timestamp: TS,
      },
      DEFAULT_SCORE_PARAMS,
    );

    expect(result.timestamp).toBe(TS);
    expect(result.scoreETF).toBeCloseTo(0.21, 12);
    expect(result.scoreStables).toBe(0.1);
    // 1/116 .. 1/129 daily returns are far below the 0.005 floor
    expect(result.scoreStress).toBe(0);
    expect(result.scoreWeighted).toBeCloseTo(0.6 * 0.21 + 0.3 * 0.1, 12);
  });

  it("should produce a complete all-zero result from empty inputs", () => {
    const result = computeScores({ prices: [], stables: [], timestamp: TS }, DEFAULT_SCORE_PARAMS);
    expect(result).toEqual({
      timestamp: TS,
      scoreETF: 0,
      scoreStables: 0,
      scoreStress: 0,
      scoreWeighted: 0,
    });
  });

  it("should honour custom weights", () => {
    const prices = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 100 : 110));
    const result = computeScores(
      { prices: makeSeries(prices), stables: [], timestamp: TS },
      { ...DEFAULT_SCORE_PARAMS, weights: { wEtf: 0, wStables: 0, wStress: 2 } },
    );
    expect(result.scoreStress).toBe(1);
    expect(result.scoreWeighted).toBe(2);
  });

  it("should be deterministic for identical input", () => {
    const input = {
      prices: makeSeries([100, 104, 97, 108, 112, 109], [1000, 1500, 900, 2000, 1800, 1200]),
      stables: [
        { id: "tether", marketCapNow: 1010, marketCapPrior24h: 1000 },
        { id: "dai", marketCapNow: 95, marketCapPrior24h: 100 },
      ],
      timestamp: TS,
    };
    expect(computeScores(input, DEFAULT_SCORE_PARAMS)).toEqual(computeScores(input, DEFAULT_SCORE_PARAMS));
  });
});
