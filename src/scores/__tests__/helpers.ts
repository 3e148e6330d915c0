import type { PriceSample } from "../types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const T0 = Date.UTC(2024, 0, 1);

/** Daily samples starting at T0; volume defaults to 1000. */
export function makeSeries(prices: number[], volumes?: number[]): PriceSample[] {
  return prices.map((price, i) => ({
    timestamp: T0 + i * DAY_MS,
    price,
    volume: volumes?.[i] ?? 1000,
  }));
}

/** 31 daily prices rising by 1 from 100 to 130 */
export function linearRise(): PriceSample[] {
  return makeSeries(Array.from({ length: 31 }, (_, i) => 100 + i));
}
