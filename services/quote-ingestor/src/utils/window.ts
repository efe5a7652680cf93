import type { TimeWindow } from '../types/domain.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const CHUNK_DAYS = 7;

/** `[now - days, now)` */
export function lookbackWindow(now: Date, days: number): TimeWindow {
  return { start: new Date(now.getTime() - days * DAY_MS), end: new Date(now.getTime()) };
}

/**
 * Splits `[start, end)` into consecutive sub-windows of `chunkMs`, the last one
 * truncated at `end`. Adjacent windows share their boundary instant.
 */
export function splitWindow(start: Date, end: Date, chunkMs = CHUNK_DAYS * DAY_MS): TimeWindow[] {
  if (!(chunkMs > 0)) throw new RangeError(`chunk size must be positive, got ${chunkMs}`);

  const out: TimeWindow[] = [];
  let cur = start.getTime();
  const stop = end.getTime();
  while (cur < stop) {
    const next = Math.min(cur + chunkMs, stop);
    out.push({ start: new Date(cur), end: new Date(next) });
    cur = next;
  }
  return out;
}
