import pino from 'pino';
import pretty from 'pino-pretty';
import type { Level, Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export type LoggerOptions = {
  level: LogLevel;
  pretty: boolean;
  /** Path of an additional JSON log file, created if missing and appended to. */
  file?: string;
};

export function createLogger(opts: LoggerOptions): Logger {
  // multistream filters per stream; 'silent' is handled by the logger level itself
  const level: Level = opts.level === 'silent' ? 'fatal' : opts.level;
  const stdout = { level, stream: opts.pretty ? pretty({ colorize: true }) : process.stdout };
  const streams = opts.file
    ? [stdout, { level, stream: pino.destination({ dest: opts.file, mkdir: true, append: true, sync: true }) }]
    : [stdout];
  return pino({ level: opts.level }, pino.multistream(streams));
}

/** Logger for code paths that must not emit anything, such as unit tests. */
export const silentLogger: Logger = pino({ level: 'silent' });
