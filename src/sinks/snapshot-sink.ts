import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { WriteError, errorMessage } from "../errors.js";
import { logSink } from "../logging.js";
import type { ScoreResult } from "../scores/types.js";
import { round6, type PendingWrite, type ResultSink } from "./types.js";

export interface LatestSnapshot {
  utc: string;
  scores: {
    Score_ETF: number;
    Score_Stables: number;
    Score_Stress: number;
    Score_Gewichtet: number;
  };
}

export function toLatestSnapshot(result: ScoreResult): LatestSnapshot {
  return {
    utc: new Date(result.timestamp).toISOString(),
    scores: {
      Score_ETF: round6(result.scoreETF),
      Score_Stables: round6(result.scoreStables),
      Score_Stress: round6(result.scoreStress),
      Score_Gewichtet: round6(result.scoreWeighted),
    },
  };
}

async function readPrevious(file: string): Promise<Buffer | null> {
  try {
    return await readFile(file);
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

async function removeTemp(tmp: string): Promise<void> {
  await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
    logSink.warn({ err: cleanupErr, tmp }, "Failed to remove temp snapshot");
  });
}

/**
 * A snapshot staged in a temp file beside the target. Commit renames it into
 * place; rollback after a commit puts the previous snapshot back.
 */
class SnapshotReplace implements PendingWrite {
  private committed = false;

  constructor(
    private readonly target: string,
    private readonly tmp: string,
    private readonly previous: Buffer | null,
  ) {}

  async commit(): Promise<void> {
    try {
      await rename(this.tmp, this.target);
    } catch (e: unknown) {
      await removeTemp(this.tmp);
      throw new WriteError(errorMessage(e), this.target, { cause: e });
    }
    this.committed = true;
    logSink.debug({ file: this.target }, "Latest snapshot written");
  }

  async rollback(): Promise<void> {
    if (!this.committed) {
      await removeTemp(this.tmp);
      return;
    }
    try {
      if (this.previous === null) {
        await rm(this.target, { force: true });
      } else {
        await writeFile(this.tmp, this.previous);
        await rename(this.tmp, this.target);
      }
    } catch (e: unknown) {
      await removeTemp(this.tmp);
      throw new WriteError(`rollback failed: ${errorMessage(e)}`, this.target, { cause: e });
    }
    this.committed = false;
    logSink.warn({ file: this.target }, "Latest snapshot rolled back");
  }
}

/** Overwrites latest.json each cycle via write-to-temp + rename. */
export class SnapshotSink implements ResultSink {
  readonly name = "snapshot";

  constructor(private readonly file: string) {}

  async prepare(result: ScoreResult): Promise<PendingWrite> {
    const target = path.resolve(this.file);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(target), { recursive: true });
      const previous = await readPrevious(target);
      await writeFile(tmp, JSON.stringify(toLatestSnapshot(result), null, 2) + "\n", "utf-8");
      return new SnapshotReplace(target, tmp, previous);
    } catch (e: unknown) {
      await removeTemp(tmp);
      throw new WriteError(errorMessage(e), this.file, { cause: e });
    }
  }
}
