/**
 * Division that never yields Infinity or NaN.
 * @returns `fallback` when the denominator is 0 or the quotient is not finite
 */
export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  if (denominator === 0) return fallback;
  const q = numerator / denominator;
  return Number.isFinite(q) ? q : fallback;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Population standard deviation (divides by n). 0 for fewer than 2 values.
 * An infinite value makes the spread infinite; NaN propagates.
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  if (values.some((v) => Number.isNaN(v))) return Number.NaN;
  if (values.some((v) => !Number.isFinite(v))) return Number.POSITIVE_INFINITY;
  const m = mean(values);
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * r_i = (p_i - p_{i-1}) / p_{i-1}; a zero previous price yields a 0 return.
 * A jump too large for a double stays Infinity so volatility saturates.
 */
export function simpleReturns(prices: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const prev = prices[i - 1];
    out.push(prev === 0 ? 0 : (prices[i] - prev) / prev);
  }
  return out;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Saturating min-max mapping of `x` onto [0, 1].
 * Returns 0 for an empty range (hi <= lo) or NaN; ±Infinity saturates.
 */
export function normalize01(x: number, lo: number, hi: number): number {
  if (!(hi > lo) || Number.isNaN(x)) return 0;
  return clamp((x - lo) / (hi - lo), 0, 1);
}
