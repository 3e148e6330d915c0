import type { MomentumParams, PriceSample } from "./types.js";
import { mean, safeDivide } from "./math.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Samples within `windowDays` of the most recent one (inclusive).
 * Input must be ordered oldest first.
 */
export function trailingWindow(samples: readonly PriceSample[], windowDays: number): PriceSample[] {
  if (samples.length === 0) return [];
  const cutoff = samples[samples.length - 1].timestamp - windowDays * DAY_MS;
  return samples.filter((s) => s.timestamp >= cutoff);
}

/**
 * ETF-flow proxy: price momentum over the window blended with the latest
 * volume's deviation from the window mean.
 * @returns Unbounded score; 0 when fewer than 2 samples fall in the window
 */
export function computeMomentumVolumeScore(samples: readonly PriceSample[], params: MomentumParams): number {
  const window = trailingWindow(samples, params.windowDays);
  if (window.length < 2) return 0;

  const first = window[0];
  const last = window[window.length - 1];
  const momentum = safeDivide(last.price - first.price, first.price);

  const avgVolume = mean(window.map((s) => s.volume));
  const volumeImpulse = safeDivide(last.volume - avgVolume, avgVolume);

  return params.momentumWeight * momentum + params.volumeWeight * volumeImpulse;
}
