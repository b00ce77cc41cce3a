// ============================================================================
// @tabula/core — Value Helpers
// ============================================================================
//
// Canonical text forms used by records and codecs:
//   key        ^[a-z0-9_.-]+$
//   decimal    plain notation, no exponent      1234.5
//   date       YYYYMMDD                         20240229
//   timestamp  YYYYMMDD'T'HHMMSSffffff          20240229T235959123456
//   boolean    true | false  (read: 1/true/yes/on, case-insensitive)
//
// Escape tables:
//   JSON  \" \\ \/ \b \f \n \r \t, other control chars as \u00XX
//   URL   everything but A-Z a-z 0-9 . _ - is percent-encoded (space → %20)
// ============================================================================

import { KeyFormatError, ValueFormatError } from './errors.js';
import type { CalendarDate, CalendarTimestamp } from './types.js';

const KEY_PATTERN = /^[a-z0-9_.-]+$/;

/** Whether `key` is a valid record key. */
export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * @throws {KeyFormatError} If `key` is blank or uses characters outside `[a-z0-9_.-]`
 */
export function validateKey(key: string): void {
  if (!isValidKey(key)) {
    throw new KeyFormatError(key);
  }
}

/** Null, empty or whitespace-only. */
export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

/** Truthiness of stored text: `1`, `true`, `yes`, `on` (trimmed, any case). */
export function isTrue(value: string | null | undefined): boolean {
  if (isBlank(value)) return false;
  return TRUE_VALUES.has((value ?? '').trim().toLowerCase());
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^([+-]?\d+)(\.0*)?$/;

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

/** Move the decimal point of `mantissa` by `exponent` places; no exponent in the result. */
function shiftPoint(negative: boolean, mantissa: string, exponent: number): string {
  const dot = mantissa.indexOf('.');
  const digits = mantissa.replace('.', '');
  const point = (dot === -1 ? mantissa.length : dot) + exponent;

  let plain: string;
  if (point <= 0) {
    plain = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    plain = digits + '0'.repeat(point - digits.length);
  } else {
    plain = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${plain}` : plain;
}

function expandExponent(text: string): string {
  const e = text.search(/[eE]/);
  if (e === -1) return text;
  const signed = text.startsWith('-') || text.startsWith('+');
  return shiftPoint(text.startsWith('-'), text.slice(signed ? 1 : 0, e), Number(text.slice(e + 1)));
}

/** Plain decimal text without sign noise, leading zeros or trailing fractional zeros. */
function normalizePlain(text: string): string {
  const negative = text.startsWith('-');
  const [whole, fraction] = text.replace(/^[+-]/, '').split('.');
  const intPart = (whole ?? '').replace(/^0+/, '') || '0';
  const fracPart = (fraction ?? '').replace(/0+$/, '');
  const plain = fracPart.length > 0 ? `${intPart}.${fracPart}` : intPart;
  return negative && plain !== '0' ? `-${plain}` : plain;
}

/**
 * Parse decimal text. The value must be held exactly enough that formatting
 * it gives back the same digits.
 * @throws {ValueFormatError} If the text is not a decimal number, is out of
 * range, or carries more significant digits than a number keeps
 */
export function parseDecimal(key: string, text: string): number {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ValueFormatError(key, text, 'decimal');
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new ValueFormatError(key, text, 'decimal (out of range)');
  }
  if (normalizePlain(expandExponent(trimmed)) !== normalizePlain(formatDecimal(key, value))) {
    throw new ValueFormatError(key, text, 'decimal (precision)');
  }
  return value;
}

/**
 * Parse text that must denote an exact 64-bit integer (`12`, `12.00`, `1.2e1`).
 * @throws {ValueFormatError} On fractional values or overflow
 */
export function parseLong(key: string, text: string): bigint {
  const trimmed = text.trim();
  const match = INTEGER_PATTERN.exec(trimmed);
  let result: bigint;
  if (match?.[1] !== undefined) {
    result = BigInt(match[1]);
  } else {
    const n = parseDecimal(key, text);
    if (!Number.isSafeInteger(n)) {
      throw new ValueFormatError(key, text, 'integer');
    }
    result = BigInt(n);
  }
  if (result < LONG_MIN || result > LONG_MAX) {
    throw new ValueFormatError(key, text, 'long (out of range)');
  }
  return result;
}

/**
 * Parse text that must denote an exact 32-bit integer.
 * @throws {ValueFormatError} On fractional values or overflow
 */
export function parseInt32(key: string, text: string): number {
  const n = parseLong(key, text);
  if (n < BigInt(INT_MIN) || n > BigInt(INT_MAX)) {
    throw new ValueFormatError(key, text, 'int (out of range)');
  }
  return Number(n);
}

/**
 * Plain decimal text for a finite number, never in exponent notation.
 * @throws {ValueFormatError} For NaN and infinities
 */
export function formatDecimal(key: string, value: number): string {
  if (!Number.isFinite(value)) {
    throw new ValueFormatError(key, String(value), 'decimal');
  }
  if (Object.is(value, -0)) return '0';
  // Shortest round-trip form, exponent expanded.
  return expandExponent(String(value));
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{6})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);
}

function isValidDate(d: CalendarDate): boolean {
  return (
    Number.isInteger(d.year) &&
    Number.isInteger(d.month) &&
    Number.isInteger(d.day) &&
    d.year >= 0 &&
    d.year <= 9999 &&
    d.month >= 1 &&
    d.month <= 12 &&
    d.day >= 1 &&
    d.day <= daysInMonth(d.year, d.month)
  );
}

function isValidTimestamp(t: CalendarTimestamp): boolean {
  return (
    isValidDate(t) &&
    Number.isInteger(t.hour) &&
    Number.isInteger(t.minute) &&
    Number.isInteger(t.second) &&
    Number.isInteger(t.microsecond) &&
    t.hour >= 0 &&
    t.hour <= 23 &&
    t.minute >= 0 &&
    t.minute <= 59 &&
    t.second >= 0 &&
    t.second <= 59 &&
    t.microsecond >= 0 &&
    t.microsecond <= 999999
  );
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/** Distinguish a timestamp from a plain date. */
export function isCalendarTimestamp(value: CalendarDate): value is CalendarTimestamp {
  return 'hour' in value;
}

/**
 * @throws {ValueFormatError} If the date does not exist in the calendar
 */
export function formatDate(key: string, date: CalendarDate): string {
  if (!isValidDate(date)) {
    throw new ValueFormatError(key, JSON.stringify(date), 'date');
  }
  return `${pad(date.year, 4)}${pad(date.month, 2)}${pad(date.day, 2)}`;
}

/**
 * @throws {ValueFormatError} If any component is out of range
 */
export function formatTimestamp(key: string, ts: CalendarTimestamp): string {
  if (!isValidTimestamp(ts)) {
    throw new ValueFormatError(key, JSON.stringify(ts), 'timestamp');
  }
  return (
    `${formatDate(key, ts)}T${pad(ts.hour, 2)}${pad(ts.minute, 2)}${pad(ts.second, 2)}` +
    pad(ts.microsecond, 6)
  );
}

/**
 * Strict `YYYYMMDD` parse; no calendar rollover (20230230 is rejected).
 * @throws {ValueFormatError}
 */
export function parseDate(key: string, text: string): CalendarDate {
  const m = DATE_PATTERN.exec(text);
  if (!m) {
    throw new ValueFormatError(key, text, 'date');
  }
  const date = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  if (!isValidDate(date)) {
    throw new ValueFormatError(key, text, 'date');
  }
  return date;
}

/**
 * Strict `YYYYMMDD'T'HHMMSSffffff` parse.
 * @throws {ValueFormatError}
 */
export function parseTimestamp(key: string, text: string): CalendarTimestamp {
  const m = TIMESTAMP_PATTERN.exec(text);
  if (!m) {
    throw new ValueFormatError(key, text, 'timestamp');
  }
  const ts = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
    microsecond: Number(m[7]),
  };
  if (!isValidTimestamp(ts)) {
    throw new ValueFormatError(key, text, 'timestamp');
  }
  return ts;
}

/** Whether `text` is a valid strict `YYYYMMDD` date. */
export function isDateText(text: string): boolean {
  const m = DATE_PATTERN.exec(text);
  return m !== null && isValidDate({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) });
}

// ---------------------------------------------------------------------------
// JSON escapes
// ---------------------------------------------------------------------------

/** Escape text for use inside a JSON string literal. */
export function jsonEscape(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '/':
        out += '\\/';
        break;
      case '\b':
        out += '\\b';
        break;
      case '\f':
        out += '\\f';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      default: {
        const code = value.charCodeAt(i);
        out += code < 0x20 ? `\\u${code.toString(16).padStart(4, '0')}` : ch;
      }
    }
  }
  return out;
}

const SIMPLE_UNESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Reverse {@link jsonEscape}. Unknown or truncated escapes are kept as written.
 */
export function jsonUnescape(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '\\' || i + 1 >= value.length) {
      out += ch;
      continue;
    }
    const next = value[i + 1];
    const simple = SIMPLE_UNESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i++;
      continue;
    }
    if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(value.slice(i + 2, i + 6))) {
      out += String.fromCharCode(Number.parseInt(value.slice(i + 2, i + 6), 16));
      i += 5;
      continue;
    }
    out += ch;
  }
  return out;
}

// ---------------------------------------------------------------------------
// URL percent-encoding
// ---------------------------------------------------------------------------

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Percent-encode as UTF-8, leaving only `A-Z a-z 0-9 . _ -` raw.
 * Space becomes `%20` and `*` becomes `%2A`; a lone surrogate is written as
 * U+FFFD.
 */
export function urlEncode(value: string | null): string {
  const wellFormed = (value ?? '').replace(LONE_SURROGATE, '\uFFFD');
  return encodeURIComponent(wellFormed).replace(
    /[!'()*~]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Decode a percent-encoded component; `+` is read as a space.
 * @throws {ValueFormatError} On malformed escapes
 */
export function urlDecode(key: string, value: string): string {
  try {
    return decodeURIComponent(value.replaceAll('+', ' '));
  } catch {
    throw new ValueFormatError(key, value, 'percent-encoding');
  }
}
