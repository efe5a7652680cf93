export type StockRow = { id: number; ticker: string; name: string; lastUpdate: Date | null };

/** A minute-bar close ready to be written; `price` always carries two decimals. */
export type QuotePoint = { ts: Date; price: string };

export type WriteResult = 'inserted' | 'skipped';

export type TimeWindow = { start: Date; end: Date };

export type TickerOutcome =
  | {
      ticker: string;
      status: 'ok';
      stockId: number;
      inserted: number;
      skipped: number;
      lastUpdate: Date | null;
    }
  | {
      ticker: string;
      status: 'failed';
      inserted: number;
      skipped: number;
      error: Error;
    };

export type IngestReport = {
  window: TimeWindow;
  outcomes: TickerOutcome[];
  totals: { inserted: number; skipped: number; failed: number };
};
