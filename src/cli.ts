/**
 * One CLI run: validate config, run a cycle, print the summary line.
 * Never throws; failures are logged and mapped to an exit code.
 *
 * Exit codes: 0 ok, 1 fetch failed, 2 write failed, 3 bad config, 4 unexpected.
 */
import type { AppConfig } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { ConfigError, exitCodeFor } from "./errors.js";
import { runScoreCycle } from "./job.js";
import { logger, pruneOldLogs } from "./logging.js";
import { CoinGeckoSource, type MarketDataSource } from "./providers/coingecko.js";
import type { ScoreResult } from "./scores/types.js";
import { round6 } from "./sinks/types.js";
import { CsvSink } from "./sinks/csv-sink.js";
import { SnapshotSink } from "./sinks/snapshot-sink.js";

export interface CliDeps {
  config: AppConfig;
  /** Defaults to a CoinGecko client built from `config.coingecko` */
  source?: MarketDataSource;
  /** Receives the summary line; defaults to stdout */
  print?: (line: string) => void;
  now?: () => Date;
}

/** `OK {"Score_ETF":…,"Score_Stables":…,"Score_Stress":…,"Score_Gewichtet":…}` */
export function summaryLine(result: ScoreResult): string {
  return `OK ${JSON.stringify({
    Score_ETF: round6(result.scoreETF),
    Score_Stables: round6(result.scoreStables),
    Score_Stress: round6(result.scoreStress),
    Score_Gewichtet: round6(result.scoreWeighted),
  })}`;
}

async function run(deps: CliDeps): Promise<void> {
  const { config } = deps;
  logger.info({ asset: config.market.assetId, stablecoins: config.market.stablecoinIds }, "Score job starting");

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new ConfigError(validation.errors);
  }

  pruneOldLogs();

  const source =
    deps.source ??
    new CoinGeckoSource({
      baseUrl: config.coingecko.baseUrl,
      apiKey: config.coingecko.apiKey,
      vsCurrency: config.coingecko.vsCurrency,
    });

  const result = await runScoreCycle({
    source,
    sinks: [
      new CsvSink({ path: config.output.csvPath, pair: config.output.pair, note: config.output.note }),
      new SnapshotSink(config.output.latestPath),
    ],
    config,
    now: deps.now,
  });

  (deps.print ?? console.log)(summaryLine(result));
}

export async function runCli(deps: CliDeps): Promise<number> {
  try {
    await run(deps);
    return 0;
  } catch (err: unknown) {
    logger.fatal({ err }, "Score cycle failed");
    return exitCodeFor(err);
  }
}
