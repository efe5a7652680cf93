import type { DbContext } from '../db/client.js';
import { insertQuoteIfAbsent } from '../repositories/quotes.repo.js';
import type { QuotePoint, WriteResult } from '../types/domain.js';

export async function writeQuote(deps: DbContext, stockId: number, point: QuotePoint): Promise<WriteResult> {
  const written = await insertQuoteIfAbsent(deps, stockId, point.price, point.ts);
  return written ? 'inserted' : 'skipped';
}
