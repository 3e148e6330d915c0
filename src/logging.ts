import pino from "pino";
import path from "path";
import fs from "fs";

const logsDir = path.resolve(process.env.LOG_DIR ?? "data/logs");
const underTest = process.env.VITEST !== undefined || process.env.NODE_ENV === "test";

// One file per UTC day — filename: scores-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `scores-${date}.log`);
}

function createLogger(): pino.Logger {
  // Tests stay quiet and leave no log files behind
  if (underTest) {
    return pino({ level: process.env.LOG_LEVEL ?? "silent" });
  }

  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

  // Multi-destination: stderr (human-readable) + file (JSON for parsing).
  // stdout is reserved for the one-line result summary.
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level: process.env.LOG_LEVEL ?? "info",
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug",
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "market-risk-scores" },
    },
    transport,
  );
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logFetch = logger.child({ subsystem: "fetch" });
export const logScores = logger.child({ subsystem: "scores" });
export const logSink = logger.child({ subsystem: "sink" });

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30, dir: string = logsDir): number {
  let removed = 0;
  try {
    if (!fs.existsSync(dir)) return 0;
    const files = fs.readdirSync(dir).filter((f) => f.startsWith("scores-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setUTCDate(cutoff.getUTCDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/^scores-(\d{4}-\d{2}-\d{2})\.log$/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(dir, file));
        removed++;
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
  return removed;
}
