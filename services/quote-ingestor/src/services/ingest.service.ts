import { performance } from 'node:perf_hooks';
import { MAX_LOOKBACK_DAYS } from '../config.js';
import type { DbContext } from '../db/client.js';
import { quotesInserted, quotesSkipped, tickersFailed } from '../metrics/metrics.js';
import type { MarketDataProvider } from '../providers/types.js';
import type { IngestReport, TickerOutcome, TimeWindow } from '../types/domain.js';
import { lookbackWindow } from '../utils/window.js';
import { refreshLastUpdate } from './freshness.service.js';
import { fetchQuoteWindow } from './quote-fetcher.service.js';
import { writeQuote } from './quote-writer.service.js';
import { resolveStockId } from './symbol-resolver.service.js';

export type IngestDeps = DbContext & { provider: MarketDataProvider };

export type IngestOptions = {
  tickers: readonly string[];
  lookbackDays: number;
  /** Upper bound of the lookback window; defaults to the wall clock. */
  now?: Date;
  /** Abort the run on the first ticker failure (default) or record it and continue. */
  failFast?: boolean;
};

type Progress = { stockId: number | null; inserted: number; skipped: number };

// Resolve -> Fetch+Write per sub-window -> Refresh. `progress` is updated in place so
// a failing ticker still reports what it wrote before the error.
async function ingestTicker(deps: IngestDeps, ticker: string, window: TimeWindow, progress: Progress) {
  const stockId = await resolveStockId(deps, ticker);
  progress.stockId = stockId;

  for await (const point of fetchQuoteWindow(deps, ticker, window.start, window.end)) {
    const res = await writeQuote(deps, stockId, point);
    if (res === 'inserted') progress.inserted++;
    else progress.skipped++;
  }

  const lastUpdate = await refreshLastUpdate(deps, stockId);
  return { stockId, lastUpdate };
}

// Keeps the freshness marker in line with quotes written before an isolated failure.
async function refreshAfterFailure(deps: IngestDeps, ticker: string, stockId: number) {
  try {
    await refreshLastUpdate(deps, stockId);
  } catch (err) {
    deps.logger.error({ err, ticker, stockId }, `Could not refresh lastUpdate for ${ticker} after failure`);
  }
}

export async function runIngestion(deps: IngestDeps, opts: IngestOptions): Promise<IngestReport> {
  const { tickers, lookbackDays, failFast = true } = opts;
  if (!Number.isInteger(lookbackDays) || lookbackDays < 1 || lookbackDays > MAX_LOOKBACK_DAYS) {
    throw new RangeError(`lookbackDays must be an integer in [1, ${MAX_LOOKBACK_DAYS}], got ${lookbackDays}`);
  }

  const window = lookbackWindow(opts.now ?? new Date(), lookbackDays);
  deps.logger.info(
    { tickers: tickers.length, from: window.start.toISOString(), to: window.end.toISOString(), failFast },
    `Starting stock quote update with ${lookbackDays}-day lookback`,
  );

  const outcomes: TickerOutcome[] = [];
  for (const ticker of tickers) {
    const progress: Progress = { stockId: null, inserted: 0, skipped: 0 };
    const t0 = performance.now();
    deps.logger.info({ ticker }, `Fetching quotes for ${ticker}...`);

    try {
      const { stockId, lastUpdate } = await ingestTicker(deps, ticker, window, progress);
      const { inserted, skipped } = progress;
      outcomes.push({ ticker, status: 'ok', stockId, inserted, skipped, lastUpdate });
      deps.logger.info(
        { ticker, inserted, skipped, lastUpdate },
        `${ticker}: Inserted ${inserted} quotes, Skipped ${skipped} (already present)`,
      );
    } catch (err) {
      tickersFailed.inc();
      const error = err instanceof Error ? err : new Error(String(err));
      const { stockId, inserted, skipped } = progress;
      deps.logger.error({ err: error, ticker, inserted, skipped }, `Error processing ticker ${ticker}`);
      if (failFast) throw error;
      if (stockId !== null) await refreshAfterFailure(deps, ticker, stockId);
      outcomes.push({ ticker, status: 'failed', inserted, skipped, error });
    } finally {
      quotesInserted.inc({ ticker }, progress.inserted);
      quotesSkipped.inc({ ticker }, progress.skipped);
      deps.logger.debug({ ticker, ms: Number((performance.now() - t0).toFixed(2)) }, 'ticker latency');
    }
  }

  const totals = outcomes.reduce(
    (acc, o) => ({
      inserted: acc.inserted + o.inserted,
      skipped: acc.skipped + o.skipped,
      failed: acc.failed + (o.status === 'failed' ? 1 : 0),
    }),
    { inserted: 0, skipped: 0, failed: 0 },
  );

  return { window, outcomes, totals };
}
