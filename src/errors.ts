/**
 * Failures that end a score cycle. Numeric edge cases inside the score
 * functions never reach here; they resolve to 0 or saturate locally.
 */

export type ScoreJobErrorKind = "fetch" | "write" | "config";

export class ScoreJobError extends Error {
  readonly kind: ScoreJobErrorKind;

  constructor(kind: ScoreJobErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScoreJobError";
    this.kind = kind;
  }
}

/** Upstream unreachable, timed out, non-2xx, or returned a payload we can't read. */
export class FetchError extends ScoreJobError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super("fetch", `Fetch failed (${endpoint}): ${message}`, options);
    this.name = "FetchError";
  }
}

/** Output file could not be written. */
export class WriteError extends ScoreJobError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super("write", `Write failed (${path}): ${message}`, options);
    this.name = "WriteError";
  }
}

export class ConfigError extends ScoreJobError {
  constructor(public readonly problems: string[]) {
    super("config", `Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Process exit code for a failed cycle: 1 fetch, 2 write, 3 config, 4 anything else. */
export function exitCodeFor(e: unknown): number {
  if (!(e instanceof ScoreJobError)) return 4;
  switch (e.kind) {
    case "fetch":
      return 1;
    case "write":
      return 2;
    case "config":
      return 3;
  }
}
