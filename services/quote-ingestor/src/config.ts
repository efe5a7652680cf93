// services/quote-ingestor/src/config.ts
import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError, messageOf } from './errors.js';

export const MAX_LOOKBACK_DAYS = 28;

const DEFAULT_TICKERS_FILE = new URL('../config/tickers.json', import.meta.url);

const Flag = z.union([z.literal('1'), z.literal('0')]);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),

  DATABASE_URL: z.string().min(1).optional(),
  PGHOST: z.string().min(1).default('localhost'),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGDATABASE: z.string().min(1).default('tinker'),
  PGUSER: z.string().min(1).default('tinker'),
  PGPASSWORD: z.string().optional(),

  LOOKBACK_DAYS: z.coerce
    .number({ invalid_type_error: 'days must be a positive integer' })
    .int('days must be a positive integer')
    .min(1, 'days must be a positive integer')
    .max(MAX_LOOKBACK_DAYS, `days must be less than or equal to ${MAX_LOOKBACK_DAYS}`)
    .default(MAX_LOOKBACK_DAYS),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: Flag.default('0'),
  LOG_FILE: z.string().min(1).optional(),

  TICKERS: z.string().optional(),
  TICKERS_FILE: z.string().min(1).optional(),
  FAIL_FAST: Flag.default('1'),

  PROVIDER_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  METRICS_TEXTFILE: z.string().min(1).optional(),
});

type Env = z.infer<typeof EnvSchema>;

const TickerList = z
  .array(z.string().regex(/^\S+$/, 'ticker must be a non-empty string without whitespace'))
  .min(1, 'ticker universe must not be empty');

export type LogLevel = Env['LOG_LEVEL'];

export type Config = {
  readonly env: Env['NODE_ENV'];
  readonly databaseUrl: string;
  readonly lookbackDays: number;
  readonly logLevel: LogLevel;
  readonly logPretty: boolean;
  readonly logFile: string | undefined;
  readonly tickers: readonly string[];
  readonly failFast: boolean;
  readonly provider: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
  };
  readonly metricsTextfile: string | undefined;
};

export const USAGE = `Usage: quote-ingestor [-h] [-d DAYS] [-p PASSWORD] [-l LOG_FILE] [-i] [--tickers LIST] [--continue-on-error]

Fetch minute quotes for the configured tickers and store them in PostgreSQL.

Options:
  -d, --days DAYS         number of days to look back for quotes (default: 28, max: 28)
  -p, --password PASS     database password (overrides PGPASSWORD; not allowed with DATABASE_URL)
  -l, --log-file PATH     also write logs to this file
  -i, --info              enable DEBUG logging to track latency of store and provider calls
      --tickers LIST      comma separated tickers, replacing the configured universe
      --continue-on-error record failed tickers and keep going instead of aborting the run
  -h, --help              show this help

Examples:
  quote-ingestor -p "test-password" -l /tmp/quotes.log
  quote-ingestor --days 10 --tickers AAPL,MSFT -i`;

export type CliArgs = {
  help: boolean;
  /** CLI flags translated to the environment variables they override. */
  overrides: Record<string, string>;
};

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      days: { type: 'string', short: 'd' },
      password: { type: 'string', short: 'p' },
      'log-file': { type: 'string', short: 'l' },
      info: { type: 'boolean', short: 'i' },
      tickers: { type: 'string' },
      'continue-on-error': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  }).values;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (err) {
    throw new ConfigError(messageOf(err));
  }

  const overrides: Record<string, string> = {};
  if (values.days !== undefined) overrides.LOOKBACK_DAYS = values.days;
  if (values.password !== undefined) overrides.PGPASSWORD = values.password;
  if (values['log-file'] !== undefined) overrides.LOG_FILE = values['log-file'];
  if (values.info) overrides.LOG_LEVEL = 'debug';
  if (values.tickers !== undefined) overrides.TICKERS = values.tickers;
  if (values['continue-on-error']) overrides.FAIL_FAST = '0';

  return { help: values.help === true, overrides };
}

function toArray(csv?: string): string[] {
  return (csv ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

function buildPgUrl(e: Env) {
  if (e.DATABASE_URL) return e.DATABASE_URL;
  const pw = e.PGPASSWORD ? `:${encodeURIComponent(e.PGPASSWORD)}` : '';
  const host = encodeURIComponent(e.PGHOST);
  return `postgres://${encodeURIComponent(e.PGUSER)}${pw}@${host}:${e.PGPORT}/${encodeURIComponent(e.PGDATABASE)}`;
}

function readTickersFile(file: string | URL): unknown {
  try {
    return JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`cannot read ticker universe from ${String(file)}: ${messageOf(err)}`);
  }
}

export function resolveTickers(e: Pick<Env, 'TICKERS' | 'TICKERS_FILE'>): string[] {
  const raw = e.TICKERS !== undefined
    ? toArray(e.TICKERS)
    : readTickersFile(e.TICKERS_FILE ?? DEFAULT_TICKERS_FILE);

  const parsed = TickerList.safeParse(raw);
  if (!parsed.success) {
    const reasons = [...new Set(parsed.error.issues.map(i => i.message))];
    throw new ConfigError(`invalid ticker universe: ${reasons.join('; ')}`);
  }

  const seen = new Set<string>();
  for (const t of parsed.data) {
    if (seen.has(t)) throw new ConfigError(`duplicate ticker '${t}' in ticker universe`);
    seen.add(t);
  }
  return parsed.data;
}

export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: Record<string, string> = {},
): Config {
  const parsed = EnvSchema.safeParse({ ...env, ...overrides });
  if (!parsed.success) {
    const { fieldErrors } = parsed.error.flatten();
    const details = Object.entries(fieldErrors)
      .map(([key, msgs]) => `${key}: ${(msgs ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, fieldErrors);
  }
  const e = parsed.data;
  if (e.DATABASE_URL && overrides.PGPASSWORD !== undefined) {
    throw new ConfigError('-p/--password cannot be combined with DATABASE_URL; put the password in the url');
  }

  return {
    env: e.NODE_ENV,
    databaseUrl: buildPgUrl(e),
    lookbackDays: e.LOOKBACK_DAYS,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
    logFile: e.LOG_FILE,
    tickers: resolveTickers(e),
    failFast: e.FAIL_FAST === '1',
    provider: {
      baseUrl: e.PROVIDER_BASE_URL,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
    },
    metricsTextfile: e.METRICS_TEXTFILE,
  };
}
