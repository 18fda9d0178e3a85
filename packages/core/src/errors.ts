export const NUMERAL_FORMAT_REASONS = [
  'missing-source',
  'empty-source',
  'invalid-digit',
  'not-positive',
] as const;

export type NumeralFormatReason = (typeof NUMERAL_FORMAT_REASONS)[number];

const FORMAT_MESSAGES: Record<NumeralFormatReason, string> = {
  'missing-source': 'source value is null',
  'empty-source': 'source does not contain any digits',
  'invalid-digit': 'source does not represent a valid number in the given numeral system',
  'not-positive': 'source does not represent a positive number',
};

/**
 * Base class for every error thrown by the parser family.
 */
export class NumeralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NumeralError';
  }
}

/**
 * The radix is outside {8, 10, 16}. This is a programming error and is
 * re-thrown even by the `tryParse*` functions.
 */
export class InvalidRadixError extends NumeralError {
  constructor(public readonly radix: unknown) {
    super('radix must be 8, 10, or 16');
    this.name = 'InvalidRadixError';
  }
}

export class NumeralFormatError extends NumeralError {
  constructor(
    public readonly reason: NumeralFormatReason,
    public readonly source: string | null | undefined,
    /** Position of the offending character, for `invalid-digit` */
    public readonly index?: number
  ) {
    super(FORMAT_MESSAGES[reason]);
    this.name = 'NumeralFormatError';
  }
}

export function isNumeralFormatError(error: unknown): error is NumeralFormatError {
  return error instanceof NumeralFormatError;
}
