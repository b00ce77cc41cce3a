// ============================================================================
// @tabula/core — Position Primitives
// ============================================================================
//
// Pure helpers shared by every finder. Two escape tests exist with the same
// contract: one indexes the string, the other a materialized code-unit
// buffer that the JSON finders switch to for long inputs.
// ============================================================================

import type { Span } from '../types.js';

export const BACKSLASH = 0x5c;
export const DOUBLE_QUOTE = 0x22;

/**
 * Whether the character at `pos` is escaped, i.e. preceded by an odd-length
 * run of backslashes. `\"` is escaped, `\\"` is not.
 *
 * @returns false for `pos <= 0` and for `pos > text.length`
 */
export function isEscaped(text: string, pos: number): boolean {
  if (pos <= 0 || pos > text.length) {
    return false;
  }
  let count = 0;
  for (let i = pos - 1; i >= 0 && text.charCodeAt(i) === BACKSLASH; i--) {
    count++;
  }
  return (count & 1) === 1;
}

/**
 * Buffer variant of {@link isEscaped}; identical results for the same text.
 */
export function isEscapedInBuffer(buffer: Uint16Array, pos: number): boolean {
  if (pos <= 0 || pos > buffer.length) {
    return false;
  }
  let count = 0;
  for (let i = pos - 1; i >= 0 && buffer[i] === BACKSLASH; i--) {
    count++;
  }
  return (count & 1) === 1;
}

/** Copy a string's UTF-16 code units into a buffer. */
export function toCharBuffer(text: string): Uint16Array {
  const buffer = new Uint16Array(text.length);
  for (let i = 0; i < text.length; i++) {
    buffer[i] = text.charCodeAt(i);
  }
  return buffer;
}

/**
 * Narrow a span to its interior when both boundary characters are double
 * quotes. Spans shorter than two characters are returned unchanged.
 */
export function trimQuotedSpan(text: string, begin: number, end: number): Span {
  if (
    end - begin >= 2 &&
    text.charCodeAt(begin) === DOUBLE_QUOTE &&
    text.charCodeAt(end - 1) === DOUBLE_QUOTE
  ) {
    return { begin: begin + 1, end: end - 1 };
  }
  return { begin, end };
}
