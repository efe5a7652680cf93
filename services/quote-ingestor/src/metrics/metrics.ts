import { writeFile } from 'node:fs/promises';
import client from 'prom-client';

export const registry = new client.Registry();

const LATENCY_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 15000];

export const quotesInserted = new client.Counter({
  name: 'quotes_inserted_total',
  help: 'quotes written to the store',
  labelNames: ['ticker'],
  registers: [registry],
});

export const quotesSkipped = new client.Counter({
  name: 'quotes_skipped_total',
  help: 'quotes already present in the store',
  labelNames: ['ticker'],
  registers: [registry],
});

export const tickersFailed = new client.Counter({
  name: 'tickers_failed_total',
  help: 'tickers whose ingestion failed',
  registers: [registry],
});

export const storeOpDuration = new client.Histogram({
  name: 'store_op_duration_ms',
  help: 'store statement latency',
  labelNames: ['op'],
  buckets: LATENCY_BUCKETS,
  registers: [registry],
});

export const providerRequestDuration = new client.Histogram({
  name: 'provider_request_duration_ms',
  help: 'market-data provider request latency',
  labelNames: ['op'],
  buckets: LATENCY_BUCKETS,
  registers: [registry],
});

/** Dumps the registry in text exposition format, for a node_exporter textfile collector. */
export async function writeMetricsTextfile(path: string): Promise<void> {
  await writeFile(path, await registry.metrics(), 'utf8');
}
