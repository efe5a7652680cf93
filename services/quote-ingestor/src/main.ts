import { loadConfig, parseCliArgs, USAGE, type Config } from './config.js';
import { withDbClient } from './db/client.js';
import { ConfigError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { writeMetricsTextfile } from './metrics/metrics.js';
import { YahooChartProvider } from './providers/yahoo-chart.provider.js';
import { runIngestion } from './services/ingest.service.js';
import { formatSummary } from './utils/report.js';

export const EXIT = {
  OK: 0,
  FATAL: 1,
  USAGE: 2,
  PARTIAL: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

async function flushMetrics(cfg: Config, logger: Logger) {
  if (!cfg.metricsTextfile) return;
  try {
    await writeMetricsTextfile(cfg.metricsTextfile);
  } catch (err) {
    logger.error({ err, path: cfg.metricsTextfile }, 'failed writing metrics textfile');
  }
}

// ---- global process error traps ----
export function installProcessTraps(logger: Logger): void {
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandledRejection');
    process.exit(EXIT.FATAL);
  });
}

/** One ingestion run; resolves to the process exit code. */
export async function main(argv: readonly string[], env: Record<string, string | undefined>): Promise<ExitCode> {
  let cfg: Config;
  try {
    const cli = parseCliArgs(argv);
    if (cli.help) {
      console.log(USAGE);
      return EXIT.OK;
    }
    cfg = loadConfig(env, cli.overrides);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Error: ${err.message}\n\n${USAGE}`);
    return EXIT.USAGE;
  }

  const logger = createLogger({ level: cfg.logLevel, pretty: cfg.logPretty, file: cfg.logFile });
  const provider = new YahooChartProvider({
    baseUrl: cfg.provider.baseUrl,
    timeoutMs: cfg.provider.timeoutMs,
    logger,
  });

  try {
    const report = await withDbClient(cfg.databaseUrl, logger, (db) =>
      runIngestion(
        { db, logger, provider },
        { tickers: cfg.tickers, lookbackDays: cfg.lookbackDays, failFast: cfg.failFast },
      ),
    );
    for (const line of formatSummary(report)) logger.info(line);
    await flushMetrics(cfg, logger);
    return report.totals.failed > 0 ? EXIT.PARTIAL : EXIT.OK;
  } catch (err) {
    logger.fatal({ err }, 'Fatal error during stock update');
    await flushMetrics(cfg, logger);
    return EXIT.FATAL;
  }
}
