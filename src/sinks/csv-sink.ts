/**
 * Row store: one line appended to signals.csv per cycle.
 *
 * The column layout is consumed by the dashboard by name and position, so
 * an existing file with a different header is refused rather than extended.
 * The header check happens in `prepare`, before the file is touched.
 */
import { appendFile, mkdir, readFile, rm, truncate } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { WriteError, errorMessage } from "../errors.js";
import { logSink } from "../logging.js";
import type { ScoreResult } from "../scores/types.js";
import { isoSeconds, round6, type PendingWrite, type ResultSink } from "./types.js";

export const SIGNAL_COLUMNS = [
  "timestamp",
  "pair",
  "action",
  "leverage",
  "confidence",
  "note",
  "Score_ETF",
  "Score_Stables",
  "Score_Stress",
  "Score_Gewichtet",
] as const;

export interface CsvSinkOptions {
  path: string;
  /** Written to the `pair` column, e.g. "BTC/CHF" */
  pair: string;
  /** Written to the `note` column */
  note: string;
}

export function toSignalRow(result: ScoreResult, opts: Pick<CsvSinkOptions, "pair" | "note">): string[] {
  const fmt = (v: number) => round6(v).toFixed(6);
  return [
    isoSeconds(result.timestamp),
    opts.pair,
    "hold",
    "0",
    fmt(result.scoreWeighted),
    opts.note,
    fmt(result.scoreETF),
    fmt(result.scoreStables),
    fmt(result.scoreStress),
    fmt(result.scoreWeighted),
  ];
}

async function readExisting(file: string): Promise<Buffer | null> {
  try {
    return await readFile(file);
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

function parseHeader(content: string): string[] {
  const rows: unknown = parse(content, { to_line: 1, relax_column_count: true });
  if (!Array.isArray(rows) || rows.length === 0 || !Array.isArray(rows[0])) return [];
  return rows[0].map((cell: unknown) => String(cell).trim());
}

/** One staged append; rollback cuts the file back to its size before the append. */
class CsvAppend implements PendingWrite {
  private touched = false;

  constructor(
    private readonly file: string,
    private readonly chunk: string,
    /** null when the file did not exist */
    private readonly priorSize: number | null,
  ) {}

  async commit(): Promise<void> {
    this.touched = true;
    try {
      await appendFile(this.file, this.chunk, "utf-8");
    } catch (e: unknown) {
      throw new WriteError(errorMessage(e), this.file, { cause: e });
    }
    logSink.debug({ file: this.file, header: this.priorSize === null }, "Signal row appended");
  }

  async rollback(): Promise<void> {
    if (!this.touched) return;
    try {
      if (this.priorSize === null) {
        await rm(this.file, { force: true });
      } else {
        await truncate(this.file, this.priorSize);
      }
    } catch (e: unknown) {
      throw new WriteError(`rollback failed: ${errorMessage(e)}`, this.file, { cause: e });
    }
    this.touched = false;
    logSink.warn({ file: this.file }, "Signal row rolled back");
  }
}

export class CsvSink implements ResultSink {
  readonly name = "csv";

  constructor(private readonly opts: CsvSinkOptions) {}

  async prepare(result: ScoreResult): Promise<PendingWrite> {
    const file = this.opts.path;
    try {
      await mkdir(path.dirname(path.resolve(file)), { recursive: true });
      const raw = await readExisting(file);
      const existing = raw?.toString("utf-8") ?? "";
      const needsHeader = existing.trim() === "";

      if (!needsHeader) {
        const header = parseHeader(existing);
        if (header.join(",") !== SIGNAL_COLUMNS.join(",")) {
          throw new WriteError(`unexpected header "${header.join(",")}"`, file);
        }
      }

      const rows: string[][] = needsHeader ? [[...SIGNAL_COLUMNS]] : [];
      rows.push(toSignalRow(result, this.opts));
      const prefix = !needsHeader && !existing.endsWith("\n") ? "\n" : "";
      return new CsvAppend(file, prefix + stringify(rows), raw === null ? null : raw.length);
    } catch (e: unknown) {
      if (e instanceof WriteError) throw e;
      throw new WriteError(errorMessage(e), file, { cause: e });
    }
  }
}
