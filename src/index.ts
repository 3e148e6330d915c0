#!/usr/bin/env node
/**
 * CLI: compute one round of scores and persist them.
 *
 * Usage (from cron / CI):
 *   npx tsx src/index.ts
 *
 * Exit codes: 0 ok, 1 fetch failed, 2 write failed, 3 bad config, 4 unexpected.
 */
import { config } from "./config.js";
import { runCli } from "./cli.js";

// exitCode instead of process.exit() so the log transport can flush
process.exitCode = await runCli({ config });
