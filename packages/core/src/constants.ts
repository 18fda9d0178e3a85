export const SUPPORTED_RADIXES = [8, 10, 16] as const;
export type Radix = (typeof SUPPORTED_RADIXES)[number];

// Ordered digit alphabet; the first `radix` characters are valid for that radix.
export const DIGIT_ALPHABET = '0123456789ABCDEF';

export const NEGATIVE_SIGN = '-';

// Only decimal numerals may carry a sign.
export const SIGNED_RADIX: Radix = 10;

export const UINT32_RANGE = 2 ** 32;
