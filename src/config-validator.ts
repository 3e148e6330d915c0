import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - CoinGecko base URL parses as http(s)
 * - fetch timeout, history days and score windows are positive integers
 * - all weights are finite numbers
 * - stress floor is below stress ceiling
 * - at least one stablecoin id is configured
 * - output paths are set and distinct
 * - weights summing to something other than 1 (warning)
 * - history shorter than the momentum window (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isHttpUrl(cfg.coingecko.baseUrl)) {
    errors.push(`CoinGecko base URL must be an http(s) URL, got "${cfg.coingecko.baseUrl}"`);
  }

  if (!isPositiveInt(cfg.coingecko.timeoutMs)) {
    errors.push(`coingecko.timeoutMs must be positive, got ${cfg.coingecko.timeoutMs}`);
  }

  if (!cfg.market.assetId) {
    errors.push("market.assetId is required");
  }

  if (!isPositiveInt(cfg.market.historyDays)) {
    errors.push(`market.historyDays must be positive, got ${cfg.market.historyDays}`);
  }

  if (cfg.market.stablecoinIds.length === 0) {
    errors.push("At least one stablecoin id is required");
  }

  const { momentum, stress, weights } = cfg.scores;

  if (!isPositiveInt(momentum.windowDays)) {
    errors.push(`scores.momentum.windowDays must be positive, got ${momentum.windowDays}`);
  }

  if (!isPositiveInt(stress.lookback)) {
    errors.push(`scores.stress.lookback must be positive, got ${stress.lookback}`);
  }

  const finiteChecks: Array<[string, number]> = [
    ["scores.momentum.momentumWeight", momentum.momentumWeight],
    ["scores.momentum.volumeWeight", momentum.volumeWeight],
    ["scores.weights.wEtf", weights.wEtf],
    ["scores.weights.wStables", weights.wStables],
    ["scores.weights.wStress", weights.wStress],
    ["scores.stress.floor", stress.floor],
    ["scores.stress.ceiling", stress.ceiling],
  ];
  for (const [name, value] of finiteChecks) {
    if (!Number.isFinite(value)) {
      errors.push(`${name} must be a number, got ${value}`);
    }
  }

  if (Number.isFinite(stress.floor) && Number.isFinite(stress.ceiling) && stress.floor >= stress.ceiling) {
    errors.push(`scores.stress.floor (${stress.floor}) must be below scores.stress.ceiling (${stress.ceiling})`);
  }

  if (!cfg.output.csvPath) {
    errors.push("output.csvPath is required");
  }

  if (!cfg.output.latestPath) {
    errors.push("output.latestPath is required");
  }

  if (cfg.output.csvPath && cfg.output.csvPath === cfg.output.latestPath) {
    errors.push(`output.csvPath and output.latestPath must differ, both are "${cfg.output.csvPath}"`);
  }

  // Weights are allowed not to sum to 1, but it is usually a typo
  const weightSum = weights.wEtf + weights.wStables + weights.wStress;
  if (Number.isFinite(weightSum) && Math.abs(weightSum - 1) > 1e-9) {
    warnings.push(`Score weights sum to ${Math.round(weightSum * 1e6) / 1e6}, not 1`);
  }

  if (
    isPositiveInt(cfg.market.historyDays) &&
    isPositiveInt(momentum.windowDays) &&
    cfg.market.historyDays < momentum.windowDays
  ) {
    warnings.push(
      `market.historyDays (${cfg.market.historyDays}) is shorter than the momentum window (${momentum.windowDays})`,
    );
  }

  return { errors, warnings };
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
