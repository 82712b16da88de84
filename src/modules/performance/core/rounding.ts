/**
 * Two-decimal rounding of binary floating point values.
 */

import { Decimal } from 'decimal.js';

/**
 * Rounds to 2 decimal places.
 *
 * The exact binary value of `value` is rounded, ties going to the even digit.
 * `2.675` is stored just below the tie and rounds to `2.67`; `0.125` is an
 * exact tie and rounds to `0.12`. Non-finite values round to 0.
 */
export const round2 = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  // toFixed(100) spells out the stored binary value digit for digit
  const rounded = new Decimal(value.toFixed(100))
    .toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN)
    .toNumber();

  // -0 becomes 0
  return rounded + 0;
};
