/**
 * Major/minor unit conversion. Amounts live as integer cents everywhere
 * except the values a person types or reads.
 */

/**
 * Major units → cents, rounding half up on the decimal value.
 * Fixing to six places first strips binary noise: 12.34 * 100 is
 * 1233.9999999999998 and 1.005 * 100 is 100.49999999999999.
 */
export function toMinor(major: number): number {
  return Math.round(Number((major * 100).toFixed(6)));
}

export function fromMinor(minor: number): number {
  return minor / 100;
}

/** Two-decimal rendering used by exports, e.g. 1234 → "12.34" */
export function formatMajor(minor: number): string {
  return fromMinor(minor).toFixed(2);
}

/** Integer division rounded half to even; 0 when there is nothing to divide */
export function divideHalfEven(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  const quotient = Math.floor(numerator / denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}
