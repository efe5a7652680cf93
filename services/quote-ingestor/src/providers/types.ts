/** What the provider knows about a ticker; absent names fall back to the ticker. */
export type SymbolInfo = {
  symbol: string;
  longName?: string;
  shortName?: string;
};

/**
 * One minute bar as the provider reports it. Some providers hand back a
 * multi-valued close (one entry per requested series); consumers take the first scalar.
 */
export type RawBar = {
  ts: Date;
  close: number | null | ReadonlyArray<number | null>;
};

export interface MarketDataProvider {
  /** `null` when the provider reports the ticker as unknown; transport failures throw. */
  lookupSymbol(ticker: string): Promise<SymbolInfo | null>;
  /** Minute bars in `[start, end)`, possibly empty. */
  fetchMinuteBars(ticker: string, start: Date, end: Date): Promise<RawBar[]>;
}
