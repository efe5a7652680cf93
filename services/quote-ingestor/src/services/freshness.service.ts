import type { DbContext } from '../db/client.js';
import { maxQuoteTimestamp } from '../repositories/quotes.repo.js';
import { setLastUpdate } from '../repositories/stocks.repo.js';

/** Moves the stock's lastUpdate marker to its newest quote; no-op without quotes. */
export async function refreshLastUpdate(deps: DbContext, stockId: number): Promise<Date | null> {
  const maxTs = await maxQuoteTimestamp(deps, stockId);
  if (maxTs === null) return null;
  await setLastUpdate(deps, stockId, maxTs);
  return maxTs;
}
