import { describe, expect, it } from 'vitest';
import { KeyFormatError, ValueFormatError } from '../errors.js';
import {
  formatDate,
  formatDecimal,
  formatTimestamp,
  isBlank,
  isDateText,
  isTrue,
  isValidKey,
  jsonEscape,
  jsonUnescape,
  parseDate,
  parseDecimal,
  parseInt32,
  parseLong,
  parseTimestamp,
  urlDecode,
  urlEncode,
  validateKey,
} from '../values.js';

describe('Values — Canonical Text Forms', () => {
  describe('keys', () => {
    it('accepts lowercase letters, digits, underscore, hyphen and dot', () => {
      expect(isValidKey('order.id-2_x')).toBe(true);
    });

    it('rejects uppercase, blanks and spaces', () => {
      expect(isValidKey('Order')).toBe(false);
      expect(isValidKey('')).toBe(false);
      expect(isValidKey('a b')).toBe(false);
      expect(() => validateKey('A')).toThrow(KeyFormatError);
    });
  });

  describe('isBlank / isTrue', () => {
    it('treats null, empty and whitespace as blank', () => {
      expect(isBlank(null)).toBe(true);
      expect(isBlank(' \t')).toBe(true);
      expect(isBlank(' x ')).toBe(false);
    });

    it('recognizes truthy words regardless of case and padding', () => {
      expect(['1', 'TRUE', ' yes ', 'On'].map(isTrue)).toEqual([true, true, true, true]);
      const falsy = ['0', 'false', 'no', '', null].map(isTrue);
      expect(falsy).toEqual([false, false, false, false, false]);
    });
  });

  describe('numbers', () => {
    it('parses decimals, trimming padding', () => {
      expect(parseDecimal('k', ' 12.50 ')).toBe(12.5);
      expect(parseDecimal('k', '1e3')).toBe(1000);
      expect(parseDecimal('k', '-.5')).toBe(-0.5);
    });

    it('accepts padded zeros that carry no digits', () => {
      expect(parseDecimal('k', '00012.500')).toBe(12.5);
      expect(parseDecimal('k', '+1.5e2')).toBe(150);
      expect(parseDecimal('k', '0.000')).toBe(0);
    });

    it('rejects decimals a number cannot hold exactly', () => {
      expect(() => parseDecimal('k', '1e400')).toThrow(ValueFormatError);
      expect(() => parseDecimal('k', '-1e400')).toThrow(ValueFormatError);
      expect(() => parseDecimal('k', '12345678901234567890.12')).toThrow(ValueFormatError);
      expect(() => parseDecimal('k', '9007199254740993')).toThrow(ValueFormatError);
    });

    it('rejects non-numeric text', () => {
      expect(() => parseDecimal('k', 'abc')).toThrow(ValueFormatError);
      expect(() => parseDecimal('k', '')).toThrow(ValueFormatError);
      expect(() => parseDecimal('k', '1,5')).toThrow(ValueFormatError);
    });

    it('parses exact longs', () => {
      expect(parseLong('k', '12')).toBe(12n);
      expect(parseLong('k', '12.00')).toBe(12n);
      expect(parseLong('k', '1.2e1')).toBe(12n);
      expect(parseLong('k', '9223372036854775807')).toBe(9223372036854775807n);
    });

    it('rejects fractional or out-of-range longs', () => {
      expect(() => parseLong('k', '1.5')).toThrow(ValueFormatError);
      expect(() => parseLong('k', '9223372036854775808')).toThrow(ValueFormatError);
    });

    it('bounds ints to 32 bits', () => {
      expect(parseInt32('k', '2147483647')).toBe(2147483647);
      expect(parseInt32('k', '-2147483648')).toBe(-2147483648);
      expect(() => parseInt32('k', '2147483648')).toThrow(ValueFormatError);
    });

    it('formats numbers without exponent notation', () => {
      expect(formatDecimal('k', 0.1)).toBe('0.1');
      expect(formatDecimal('k', -0)).toBe('0');
      expect(formatDecimal('k', 1e21)).toBe('1000000000000000000000');
      expect(formatDecimal('k', 1.5e-7)).toBe('0.00000015');
      expect(formatDecimal('k', -2.5e-7)).toBe('-0.00000025');
    });

    it('rejects non-finite numbers', () => {
      expect(() => formatDecimal('k', Number.NaN)).toThrow(ValueFormatError);
      expect(() => formatDecimal('k', Number.POSITIVE_INFINITY)).toThrow(ValueFormatError);
    });
  });

  describe('dates and timestamps', () => {
    it('formats and parses YYYYMMDD', () => {
      expect(formatDate('d', { year: 2024, month: 2, day: 29 })).toBe('20240229');
      expect(parseDate('d', '20240229')).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it('rejects dates that do not exist', () => {
      expect(() => formatDate('d', { year: 2023, month: 2, day: 29 })).toThrow(ValueFormatError);
      expect(() => parseDate('d', '20230230')).toThrow(ValueFormatError);
      expect(() => parseDate('d', '2024-02-29')).toThrow(ValueFormatError);
      expect(isDateText('20241231')).toBe(true);
      expect(isDateText('20241301')).toBe(false);
    });

    it('applies the leap-year rule to every year', () => {
      expect(parseDate('d', '00000229')).toEqual({ year: 0, month: 2, day: 29 });
      expect(parseDate('d', '00040229')).toEqual({ year: 4, month: 2, day: 29 });
      expect(parseDate('d', '20000229')).toEqual({ year: 2000, month: 2, day: 29 });
      expect(() => parseDate('d', '19000229')).toThrow(ValueFormatError);
      expect(() => parseDate('d', '00010229')).toThrow(ValueFormatError);
    });

    it('formats and parses timestamps with microseconds', () => {
      const ts = { year: 2024, month: 1, day: 2, hour: 3, minute: 4, second: 5, microsecond: 6 };
      expect(formatTimestamp('t', ts)).toBe('20240102T030405000006');
      expect(parseTimestamp('t', '20240102T030405000006')).toEqual(ts);
    });

    it('rejects out-of-range time components', () => {
      expect(() => parseTimestamp('t', '20240102T240000000000')).toThrow(ValueFormatError);
      expect(() =>
        formatTimestamp('t', {
          year: 2024,
          month: 1,
          day: 2,
          hour: 0,
          minute: 60,
          second: 0,
          microsecond: 0,
        }),
      ).toThrow(ValueFormatError);
    });
  });

  describe('JSON escapes', () => {
    it('escapes the fixed table and control characters', () => {
      expect(jsonEscape('a"b\\c/d\n\t\u0001')).toBe('a\\"b\\\\c\\/d\\n\\t\\u0001');
    });

    it('reverses the escapes', () => {
      expect(jsonUnescape('a\\"b\\\\c\\/d\\n\\t\\u0001')).toBe('a"b\\c/d\n\t\u0001');
      expect(jsonUnescape('caf\\u00e9')).toBe('café');
    });

    it('keeps unknown escapes as written', () => {
      expect(jsonUnescape('\\x')).toBe('\\x');
    });
  });

  describe('URL encoding', () => {
    it('leaves only letters, digits, dot, hyphen and underscore raw', () => {
      expect(urlEncode('A-z_0.9')).toBe('A-z_0.9');
      expect(urlEncode('a b*~(')).toBe('a%20b%2A%7E%28');
      expect(urlEncode('日')).toBe('%E6%97%A5');
      expect(urlEncode(null)).toBe('');
    });

    it('writes a lone surrogate as the replacement character', () => {
      expect(urlEncode('x\uD800')).toBe('x%EF%BF%BD');
      expect(urlEncode('\uDC00y')).toBe('%EF%BF%BDy');
      expect(urlEncode('\uD83D\uDE00')).toBe('%F0%9F%98%80');
    });

    it('decodes plus as space', () => {
      expect(urlDecode('k', 'a+b%20c')).toBe('a b c');
    });

    it('rejects malformed escapes', () => {
      expect(() => urlDecode('k', '%E0%A4%A')).toThrow(ValueFormatError);
    });
  });
});
