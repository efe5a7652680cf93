import { performance } from 'node:perf_hooks';
import { fetch } from 'undici';
import { z } from 'zod';
import { ProviderTransportError, messageOf } from '../errors.js';
import type { Logger } from '../logger.js';
import { providerRequestDuration } from '../metrics/metrics.js';
import type { MarketDataProvider, RawBar, SymbolInfo } from './types.js';

// --- chart response schema ---

const ChartMeta = z.object({
  symbol: z.string(),
  longName: z.string().optional(),
  shortName: z.string().optional(),
});

const ChartQuote = z.object({
  close: z.array(z.number().nullable()).optional(),
});

const ChartResult = z.object({
  meta: ChartMeta,
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({ quote: z.array(ChartQuote) }).optional(),
});

const ChartResponse = z.object({
  chart: z.object({
    result: z.array(ChartResult).nullable().optional(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().nullable().optional(),
      })
      .nullable()
      .optional(),
  }),
});

type ChartResponse = z.infer<typeof ChartResponse>;
type ChartResult = z.infer<typeof ChartResult>;

export type YahooChartOptions = {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
};

type ChartReply = { status: number; body: ChartResponse | null };

function epochSec(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

export function toRawBars(result: ChartResult, start: Date, end: Date): RawBar[] {
  const timestamps = result.timestamp ?? [];
  const quotes = result.indicators?.quote ?? [];
  const bars: RawBar[] = [];

  timestamps.forEach((sec, i) => {
    const ts = new Date(sec * 1000);
    if (ts < start || ts >= end) return;
    const closes = quotes.map(q => q.close?.[i] ?? null);
    bars.push({ ts, close: closes.length === 1 ? closes[0] : closes });
  });
  return bars;
}

export class YahooChartProvider implements MarketDataProvider {
  constructor(private readonly opts: YahooChartOptions) {}

  async lookupSymbol(ticker: string): Promise<SymbolInfo | null> {
    const { status, body } = await this.request('lookupSymbol', ticker, { range: '1d', interval: '1d' });
    if (status === 404) return null;
    if (status < 200 || status >= 300) {
      throw new ProviderTransportError('lookupSymbol', `HTTP ${status} for ${ticker}`, status);
    }

    const meta = body?.chart.result?.[0]?.meta;
    if (!meta || body?.chart.error) return null;
    return { symbol: meta.symbol, longName: meta.longName, shortName: meta.shortName };
  }

  async fetchMinuteBars(ticker: string, start: Date, end: Date): Promise<RawBar[]> {
    const { status, body } = await this.request('fetchMinuteBars', ticker, {
      period1: String(epochSec(start)),
      period2: String(epochSec(end)),
      interval: '1m',
      includePrePost: 'false',
    });
    if (status < 200 || status >= 300) {
      throw new ProviderTransportError('fetchMinuteBars', `HTTP ${status} for ${ticker}`, status);
    }
    const chartError = body?.chart.error;
    if (chartError) {
      throw new ProviderTransportError(
        'fetchMinuteBars',
        `${chartError.code ?? 'error'}: ${chartError.description ?? 'no description'}`,
        status,
      );
    }

    const result = body?.chart.result?.[0];
    return result ? toRawBars(result, start, end) : [];
  }

  private async request(op: string, ticker: string, params: Record<string, string>): Promise<ChartReply> {
    const url = `${this.opts.baseUrl}/${encodeURIComponent(ticker)}?${new URLSearchParams(params).toString()}`;
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    const t0 = performance.now();

    try {
      const res = await fetch(url, {
        headers: { accept: 'application/json', 'user-agent': 'Mozilla/5.0' },
        signal: ac.signal,
      });
      // error statuses may carry a non-JSON body; only the status matters for them
      if (!res.ok) {
        await res.body?.cancel();
        return { status: res.status, body: null };
      }

      const parsed = ChartResponse.safeParse(await res.json());
      if (!parsed.success) {
        throw new ProviderTransportError(op, `unexpected response shape for ${ticker}: ${parsed.error.message}`, res.status);
      }
      return { status: res.status, body: parsed.data };
    } catch (err) {
      if (err instanceof ProviderTransportError) throw err;
      const reason = ac.signal.aborted ? `timed out after ${this.opts.timeoutMs}ms` : messageOf(err);
      throw new ProviderTransportError(op, `${reason} (${ticker})`, undefined, err);
    } finally {
      clearTimeout(to);
      const ms = performance.now() - t0;
      providerRequestDuration.observe({ op }, ms);
      this.opts.logger.debug({ op, ticker, ms: Number(ms.toFixed(2)) }, 'provider request latency');
    }
  }
}
