/**
 * Radix parser
 *
 * Converts octal, decimal and hex numerals into 32-bit signed integers.
 *
 * Values wider than 32 bits wrap around: the weighted digit sum is reduced
 * modulo 2^32 and the result is reinterpreted as signed, so
 * `parseByRadix('FFFFFFFF', 16)` is -1 rather than an error.
 *
 * Validation order is fixed: null source, then radix, then content.
 */

import { NEGATIVE_SIGN, SIGNED_RADIX, UINT32_RANGE } from './constants';
import { NumeralFormatError } from './errors';
import { assertRadix, digitsForRadix } from './schemas';

/**
 * Parse a signed numeral in radix 8, 10 or 16.
 *
 * @throws {NumeralFormatError} source is null, has no digits, or contains a
 *   character outside the radix alphabet
 * @throws {InvalidRadixError} radix is not 8, 10 or 16
 *
 * @example
 * parseByRadix('-123', 10) // => -123
 * parseByRadix('ff', 16)   // => 255
 * parseByRadix('FFFFFFFF', 16) // => -1
 */
export function parseByRadix(source: string | null | undefined, radix: number): number {
  if (source === null || source === undefined) {
    throw new NumeralFormatError('missing-source', source);
  }

  assertRadix(radix);

  let start = 0;
  let negative = false;
  if (radix === SIGNED_RADIX && source.startsWith(NEGATIVE_SIGN)) {
    negative = true;
    start = 1;
  }

  if (source.length <= start) {
    throw new NumeralFormatError('empty-source', source);
  }

  // Match one code unit at a time in either case; full-string case mapping
  // can expand a single character into several (e.g. U+FB00 -> 'FF').
  const digits = digitsForRadix(radix);
  const lowerDigits = digits.toLowerCase();
  let accumulator = 0;
  for (let i = start; i < source.length; i++) {
    const char = source[i];
    let digit = digits.indexOf(char);
    if (digit === -1) digit = lowerDigits.indexOf(char);
    if (digit === -1) {
      throw new NumeralFormatError('invalid-digit', source, i);
    }
    // Reduce after every step; accumulator * 16 + 15 stays well inside 2^53.
    accumulator = (accumulator * radix + digit) % UINT32_RANGE;
  }

  const value = accumulator | 0;
  return negative ? -value | 0 : value;
}

/**
 * Parse a numeral that must not be negative. Zero is accepted.
 *
 * @throws {NumeralFormatError} with reason `not-positive` when the parsed
 *   value has its sign bit set, plus everything `parseByRadix` throws
 */
export function parsePositiveByRadix(source: string | null | undefined, radix: number): number {
  const value = parseByRadix(source, radix);
  if (value < 0) {
    throw new NumeralFormatError('not-positive', source);
  }
  return value;
}

export function parsePositiveFromOctal(source: string | null | undefined): number {
  return parsePositiveByRadix(source, 8);
}

export function parsePositiveFromDecimal(source: string | null | undefined): number {
  return parsePositiveByRadix(source, 10);
}

export function parsePositiveFromHex(source: string | null | undefined): number {
  return parsePositiveByRadix(source, 16);
}
