/**
 * @file src/lib/quantity.ts
 * @description Parses the quantity token: integers, decimals, scientific notation and simple
 *              fractions such as `3/4`.
 */

import { NumericParseError } from '../shared/errors';

const UNSIGNED_INTEGER = /^\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const MAX_FRACTION_PART = (1n << 64n) - 1n;

const isFractionPart = (text: string): boolean =>
  UNSIGNED_INTEGER.test(text) && BigInt(text) <= MAX_FRACTION_PART;

/**
 * Fractions split at the first slash and both sides must be plain digits within 64 bits, so
 * `-3/4` and `3.5/4` are rejected. A zero denominator yields `Infinity` or `NaN`; any other
 * overflow is rejected.
 * @throws NumericParseError when the whole token is not a number.
 */
export const parseQuantity = (text: string): number => {
  const slash = text.indexOf('/');
  if (slash !== -1) {
    const numerator = text.slice(0, slash);
    const denominator = text.slice(slash + 1);
    if (!isFractionPart(numerator) || !isFractionPart(denominator)) {
      throw new NumericParseError(text);
    }
    return Number(numerator) / Number(denominator);
  }

  const value = DECIMAL.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new NumericParseError(text);
  }
  return value;
};
