import { describe, expect, it } from 'vitest';
import { InvalidRadixError } from './errors';
import {
  tryParseByRadix,
  tryParsePositiveByRadix,
  tryParsePositiveFromDecimal,
  tryParsePositiveFromHex,
  tryParsePositiveFromOctal,
} from './try-parse';

describe('tryParseByRadix', () => {
  it('returns the value on success', () => {
    expect(tryParseByRadix('17', 8)).toEqual({ success: true, value: 15 });
    expect(tryParseByRadix('-2147483648', 10)).toEqual({ success: true, value: -2147483648 });
    expect(tryParseByRadix('FFFFFFFF', 16)).toEqual({ success: true, value: -1 });
  });

  it('captures format errors as a zero failure', () => {
    expect(tryParseByRadix('XYZ', 10)).toEqual({ success: false, value: 0 });
    expect(tryParseByRadix('-17', 16)).toEqual({ success: false, value: 0 });
    expect(tryParseByRadix('', 8)).toEqual({ success: false, value: 0 });
    expect(tryParseByRadix(null, 10)).toEqual({ success: false, value: 0 });
  });

  it('re-throws an unsupported radix', () => {
    expect(() => tryParseByRadix('123', 5)).toThrow(InvalidRadixError);
    expect(() => tryParseByRadix('XYZ', 2)).toThrow('radix must be 8, 10, or 16');
  });

  it('narrows on success', () => {
    const result = tryParseByRadix('ff', 16);
    if (!result.success) throw new Error('expected success');
    expect(result.value + 1).toBe(256);
  });
});

describe('tryParsePositiveByRadix', () => {
  it('fails on negative results', () => {
    expect(tryParsePositiveByRadix('FFFFFFFF', 16)).toEqual({ success: false, value: 0 });
    expect(tryParsePositiveByRadix('-1', 10)).toEqual({ success: false, value: 0 });
  });

  it('returns non-negative values', () => {
    expect(tryParsePositiveByRadix('0', 16)).toEqual({ success: true, value: 0 });
    expect(tryParsePositiveByRadix('2147483647', 10)).toEqual({
      success: true,
      value: 2147483647,
    });
  });

  it('re-throws an unsupported radix', () => {
    expect(() => tryParsePositiveByRadix('1', 12)).toThrow(InvalidRadixError);
  });
});

describe('fixed-radix try wrappers', () => {
  it('parses octal', () => {
    expect(tryParsePositiveFromOctal('644')).toEqual({ success: true, value: 420 });
    expect(tryParsePositiveFromOctal('8')).toEqual({ success: false, value: 0 });
  });

  it('parses decimal', () => {
    expect(tryParsePositiveFromDecimal('1000')).toEqual({ success: true, value: 1000 });
    expect(tryParsePositiveFromDecimal('-1000')).toEqual({ success: false, value: 0 });
  });

  it('parses hex', () => {
    expect(tryParsePositiveFromHex('Cafe')).toEqual({ success: true, value: 51966 });
    expect(tryParsePositiveFromHex('0x10')).toEqual({ success: false, value: 0 });
    expect(tryParsePositiveFromHex('\uFB00')).toEqual({ success: false, value: 0 });
  });
});
