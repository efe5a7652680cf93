import type { Logger } from '../logger.js';
import type { MarketDataProvider } from '../providers/types.js';
import type { QuotePoint } from '../types/domain.js';
import { firstScalar, formatPrice } from '../utils/price.js';
import { splitWindow } from '../utils/window.js';

export type FetcherDeps = { provider: MarketDataProvider; logger: Logger };

/**
 * Streams normalized minute quotes for `[start, end)`, one provider call per
 * 7-day sub-window in chronological order. A provider error aborts the
 * remaining sub-windows.
 */
export async function* fetchQuoteWindow(
  deps: FetcherDeps,
  ticker: string,
  start: Date,
  end: Date,
): AsyncGenerator<QuotePoint, void, undefined> {
  for (const w of splitWindow(start, end)) {
    deps.logger.debug(
      { ticker, from: w.start.toISOString(), to: w.end.toISOString() },
      `Fetching ${ticker} sub-window`,
    );
    const bars = await deps.provider.fetchMinuteBars(ticker, w.start, w.end);
    const ordered = [...bars].sort((a, b) => a.ts.getTime() - b.ts.getTime());

    let dropped = 0;
    for (const bar of ordered) {
      const close = firstScalar(bar.close);
      if (close === null || !Number.isFinite(close)) {
        dropped++;
        continue;
      }
      yield { ts: bar.ts, price: formatPrice(close) };
    }
    if (dropped) deps.logger.debug({ ticker, dropped }, 'bars without a close price skipped');
  }
}
