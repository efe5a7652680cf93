import type { DbContext } from '../db/client.js';
import { UnknownSymbolError } from '../errors.js';
import type { MarketDataProvider, SymbolInfo } from '../providers/types.js';
import { findStockIdByTicker, insertStock } from '../repositories/stocks.repo.js';

export type ResolverDeps = DbContext & { provider: MarketDataProvider };

export function displayName(info: SymbolInfo, ticker: string): string {
  return info.longName?.trim() || info.shortName?.trim() || ticker;
}

/**
 * Maps a ticker to its stock id, registering tickers the store has not seen yet
 * once the provider confirms them.
 */
export async function resolveStockId(deps: ResolverDeps, ticker: string): Promise<number> {
  const existing = await findStockIdByTicker(deps, ticker);
  if (existing !== null) return existing;

  deps.logger.debug({ ticker }, 'validating ticker with market-data provider');
  const info = await deps.provider.lookupSymbol(ticker);
  if (!info) throw new UnknownSymbolError(ticker);

  const name = displayName(info, ticker);
  const id = await insertStock(deps, ticker, name);
  deps.logger.info({ ticker, name, stockId: id }, `Inserted new stock record for ticker '${ticker}'`);
  return id;
}
