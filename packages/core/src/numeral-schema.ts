import { z } from 'zod';
import { isNumeralFormatError } from './errors';
import { parseByRadix, parsePositiveByRadix } from './radix-parser';
import { assertRadix } from './schemas';

export interface NumeralSchemaOptions {
  radix: number;
  /** Reject values with the sign bit set */
  positive?: boolean;
}

/**
 * Zod schema that accepts a numeral string and outputs its int32 value.
 *
 * The radix is checked here, once: an unsupported radix throws
 * `InvalidRadixError` instead of surfacing later as a validation issue.
 * Format failures become a custom issue with `params.reason` set.
 */
export function createNumeralSchema(options: NumeralSchemaOptions) {
  const { radix, positive = false } = options;
  assertRadix(radix);
  const parse = positive ? parsePositiveByRadix : parseByRadix;

  return z.string().transform((value, ctx) => {
    try {
      return parse(value, radix);
    } catch (err) {
      if (!isNumeralFormatError(err)) throw err;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err.message,
        params: { reason: err.reason, index: err.index },
      });
      return z.NEVER;
    }
  });
}

export const octalSchema = createNumeralSchema({ radix: 8 });
export const decimalSchema = createNumeralSchema({ radix: 10 });
export const hexSchema = createNumeralSchema({ radix: 16 });

export const positiveOctalSchema = createNumeralSchema({ radix: 8, positive: true });
export const positiveDecimalSchema = createNumeralSchema({ radix: 10, positive: true });
export const positiveHexSchema = createNumeralSchema({ radix: 16, positive: true });
