import { runQuery, type DbContext } from '../db/client.js';
import { SQL } from '../db/sql.js';
import { StoreError } from '../errors.js';

export async function findStockIdByTicker(ctx: DbContext, ticker: string): Promise<number | null> {
  const { rows } = await runQuery<{ id: number }>(ctx, 'stocks.idByTicker', SQL.stocks.idByTicker, [ticker]);
  return rows[0]?.id ?? null;
}

/** Registers a ticker and returns the id the store assigned to it. */
export async function insertStock(ctx: DbContext, ticker: string, name: string): Promise<number> {
  const { rows } = await runQuery<{ id: number }>(ctx, 'stocks.insert', SQL.stocks.insert, [ticker, name]);
  const id = rows[0]?.id;
  if (id === undefined) throw new StoreError('stocks.insert', new Error(`no id returned for '${ticker}'`));
  return id;
}

export async function setLastUpdate(ctx: DbContext, stockId: number, ts: Date): Promise<void> {
  await runQuery(ctx, 'stocks.setLastUpdate', SQL.stocks.setLastUpdate, [stockId, ts]);
}
