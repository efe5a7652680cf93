/** First scalar of a possibly multi-valued field; `null` when there is none. */
export function firstScalar(value: number | null | undefined | ReadonlyArray<number | null>): number | null {
  const v = typeof value === 'object' && value !== null ? value[0] : value;
  return typeof v === 'number' ? v : null;
}

/**
 * Two decimals, rounding the exact binary value; exact ties go to the even cent.
 * 150.123449 -> "150.12", 150.125 -> "150.12", 10.375 -> "10.38"
 */
export function formatPrice(raw: number): string {
  if (!Number.isFinite(raw)) throw new RangeError(`price must be finite, got ${raw}`);
  // a double lies exactly halfway between two cents only when it is an odd multiple of 1/8
  const eighths = raw * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths % 2) === 1) {
    const lo = Math.floor(raw * 100);
    const cents = lo % 2 === 0 ? lo : lo + 1;
    return (cents / 100).toFixed(2);
  }
  return raw.toFixed(2);
}
