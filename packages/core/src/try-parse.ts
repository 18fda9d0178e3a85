import { NumeralFormatError } from './errors';
import { parseByRadix, parsePositiveByRadix } from './radix-parser';

export type ParseResult = { success: true; value: number } | { success: false; value: 0 };

// Format errors become a failed result; InvalidRadixError and anything
// unexpected propagate.
function attempt(parse: () => number): ParseResult {
  try {
    return { success: true, value: parse() };
  } catch (err) {
    if (err instanceof NumeralFormatError) {
      return { success: false, value: 0 };
    }
    throw err;
  }
}

/**
 * Non-throwing form of `parseByRadix`.
 *
 * @throws {InvalidRadixError} radix is not 8, 10 or 16
 *
 * @example
 * tryParseByRadix('XYZ', 10) // => { success: false, value: 0 }
 * tryParseByRadix('17', 8)   // => { success: true, value: 15 }
 */
export function tryParseByRadix(source: string | null | undefined, radix: number): ParseResult {
  return attempt(() => parseByRadix(source, radix));
}

export function tryParsePositiveByRadix(
  source: string | null | undefined,
  radix: number
): ParseResult {
  return attempt(() => parsePositiveByRadix(source, radix));
}

export function tryParsePositiveFromOctal(source: string | null | undefined): ParseResult {
  return tryParsePositiveByRadix(source, 8);
}

export function tryParsePositiveFromDecimal(source: string | null | undefined): ParseResult {
  return tryParsePositiveByRadix(source, 10);
}

export function tryParsePositiveFromHex(source: string | null | undefined): ParseResult {
  return tryParsePositiveByRadix(source, 16);
}
