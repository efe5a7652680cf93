import { runQuery, type DbContext } from '../db/client.js';
import { SQL } from '../db/sql.js';

/** Returns true when a row was written, false when (stock, ts) was already on record. */
export async function insertQuoteIfAbsent(
  ctx: DbContext,
  stockId: number,
  price: string,
  ts: Date,
): Promise<boolean> {
  const r = await runQuery<{ id: string }>(ctx, 'quotes.insertIfAbsent', SQL.quotes.insertIfAbsent, [stockId, price, ts]);
  return (r.rowCount ?? r.rows.length) > 0;
}

export async function maxQuoteTimestamp(ctx: DbContext, stockId: number): Promise<Date | null> {
  const { rows } = await runQuery<{ maxTs: Date | null }>(ctx, 'quotes.maxTimestamp', SQL.quotes.maxTimestamp, [stockId]);
  return rows[0]?.maxTs ?? null;
}
