export type IngestErrorCode =
  | 'UNKNOWN_SYMBOL'
  | 'STORE_ERROR'
  | 'PROVIDER_TRANSPORT'
  | 'INVALID_CONFIG';

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The provider does not know the ticker; never retried. */
export class UnknownSymbolError extends IngestError {
  constructor(readonly ticker: string) {
    super('UNKNOWN_SYMBOL', `Invalid ticker '${ticker}': not found at market-data provider`);
  }
}

export class StoreError extends IngestError {
  constructor(readonly op: string, cause: unknown) {
    super('STORE_ERROR', `store operation '${op}' failed: ${messageOf(cause)}`, { cause });
  }
}

export class ProviderTransportError extends IngestError {
  constructor(
    readonly op: string,
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super('PROVIDER_TRANSPORT', `provider '${op}' failed: ${message}`, { cause });
  }
}

export class ConfigError extends IngestError {
  constructor(message: string, readonly issues: Record<string, string[] | undefined> = {}) {
    super('INVALID_CONFIG', message);
  }
}

export function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

