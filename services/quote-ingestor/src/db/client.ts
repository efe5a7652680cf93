import { performance } from 'node:perf_hooks';
import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import { StoreError } from '../errors.js';
import type { Logger } from '../logger.js';
import { storeOpDuration } from '../metrics/metrics.js';

/** The slice of a pg client the repositories use; a `pg.Client` satisfies it. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export type DbContext = { db: Queryable; logger: Logger };

export async function runQuery<R extends QueryResultRow>(
  ctx: DbContext,
  op: string,
  text: string,
  values: unknown[],
): Promise<QueryResult<R>> {
  const t0 = performance.now();
  try {
    return await ctx.db.query<R>(text, values);
  } catch (err) {
    throw new StoreError(op, err);
  } finally {
    const ms = performance.now() - t0;
    storeOpDuration.observe({ op }, ms);
    ctx.logger.debug({ op, ms: Number(ms.toFixed(2)) }, 'store op latency');
  }
}

/**
 * Opens one connection for the duration of `fn` and always closes it.
 * A close failure after `fn` threw is logged so the original error surfaces.
 */
export async function withDbClient<T>(
  connectionString: string,
  logger: Logger,
  fn: (db: Queryable) => Promise<T>,
): Promise<T> {
  const client = new pg.Client({ connectionString });
  client.on('error', (err) => logger.error({ err }, 'database connection error'));

  try {
    await client.connect();
  } catch (err) {
    throw new StoreError('connect', err);
  }
  logger.info('connected to database');

  let result: T;
  try {
    result = await fn(client);
  } catch (err) {
    await client.end().then(
      () => logger.info('disconnected from database'),
      (closeErr: unknown) => logger.error({ err: closeErr }, 'failed closing database connection'),
    );
    throw err;
  }

  try {
    await client.end();
  } catch (err) {
    throw new StoreError('close', err);
  }
  logger.info('disconnected from database');
  return result;
}
