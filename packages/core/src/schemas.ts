import { z } from 'zod';
import { DIGIT_ALPHABET, type Radix } from './constants';
import { InvalidRadixError } from './errors';

export const radixSchema = z.union([z.literal(8), z.literal(10), z.literal(16)]);

export function isSupportedRadix(value: unknown): value is Radix {
  return radixSchema.safeParse(value).success;
}

export function assertRadix(value: unknown): asserts value is Radix {
  if (!isSupportedRadix(value)) {
    throw new InvalidRadixError(value);
  }
}

/**
 * Valid digit characters for a radix (uppercase).
 *
 * @example
 * digitsForRadix(8) // => '01234567'
 */
export function digitsForRadix(radix: Radix): string {
  return DIGIT_ALPHABET.slice(0, radix);
}
