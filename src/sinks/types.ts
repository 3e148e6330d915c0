import type { ScoreResult } from "../scores/types.js";

/**
 * A staged write. `commit` makes it visible; `rollback` undoes whatever was
 * staged or committed, so a failed cycle leaves every output as it was.
 */
export interface PendingWrite {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Persists one cycle's result in two phases. `prepare` checks the target and
 * stages the data without changing the visible output. Both phases throw
 * WriteError on failure.
 */
export interface ResultSink {
  readonly name: string;
  prepare(result: ScoreResult): Promise<PendingWrite>;
}

/** Round to 6 decimals; non-finite values and -0 become 0. */
export function round6(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const r = Math.round(value * 1e6) / 1e6;
  return r === 0 ? 0 : r;
}

/** ISO-8601 UTC to the second, e.g. 2024-02-01T06:00:00Z */
export function isoSeconds(timestamp: string): string {
  return new Date(timestamp).toISOString().replace(/\.\d{3}Z$/, "Z");
}
