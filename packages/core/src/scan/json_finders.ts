// ============================================================================
// @tabula/core — JSON Member Finders
// ============================================================================
//
// These finders do not parse JSON. They cut the interior of one `{…}` or
// `[…]` into member tokens, leaving nested containers as opaque text for the
// codec to recurse into.
//
// Scan state inside the outermost brackets:
//   inQuote      toggled by an unescaped "
//   arrayDepth   [ … ] nesting
//   objectDepth  { … } nesting
// A comma ends a member only when all three are at rest. Blank characters
// (space, tab, CR, LF) around members are not part of the token.
//
// Member tokens are returned raw, quotes included, so that the string "null"
// and the literal null stay distinguishable.
// ============================================================================

import { getConfig } from '../config.js';
import { StructuralFormatError } from '../errors.js';
import type { Span } from '../types.js';
import { SpanFinder } from './finder.js';
import {
  DOUBLE_QUOTE,
  isEscaped,
  isEscapedInBuffer,
  toCharBuffer,
  trimQuotedSpan,
} from './position.js';

const COMMA = 0x2c;
const COLON = 0x3a;
const OPEN_ARRAY = 0x5b;
const CLOSE_ARRAY = 0x5d;
const OPEN_OBJECT = 0x7b;
const CLOSE_OBJECT = 0x7d;

/** Space, tab, LF or CR. */
export function isBlankChar(c: number): boolean {
  return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
}

/** Whether `text`, ignoring surrounding blanks, is enclosed by `{` and `}`. */
export function looksLikeJsonObject(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length >= 2 && trimmed.startsWith('{') && trimmed.endsWith('}');
}

/** Whether `text`, ignoring surrounding blanks, is enclosed by `[` and `]`. */
export function looksLikeJsonArray(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length >= 2 && trimmed.startsWith('[') && trimmed.endsWith(']');
}

/**
 * Split the range `[from, to)` of `text` at top-level commas.
 * Sources longer than the configured threshold are read from a code-unit
 * buffer; both paths produce the same spans.
 */
function scanMembers(text: string, from: number, to: number): Span[] {
  const buffer = text.length > getConfig().scanBufferThreshold ? toCharBuffer(text) : null;
  const charAt = buffer ? (i: number) => buffer[i] : (i: number) => text.charCodeAt(i);
  const escaped = buffer
    ? (i: number) => isEscapedInBuffer(buffer, i)
    : (i: number) => isEscaped(text, i);

  const spans: Span[] = [];
  let begin = from;
  let end = from;
  let inToken = false;
  let inQuote = false;
  let arrayDepth = 0;
  let objectDepth = 0;

  for (let i = from; i < to; i++) {
    const c = charAt(i);

    if (c !== COMMA && !isBlankChar(c)) {
      if (!inToken) {
        inToken = true;
        begin = i;
      }
      end = i + 1;
    }

    if (c === DOUBLE_QUOTE) {
      if (!escaped(i)) {
        inQuote = !inQuote;
      }
      continue;
    }
    if (inQuote) {
      continue;
    }

    switch (c) {
      case OPEN_ARRAY:
        arrayDepth++;
        continue;
      case CLOSE_ARRAY:
        if (arrayDepth > 0) arrayDepth--;
        continue;
      case OPEN_OBJECT:
        objectDepth++;
        continue;
      case CLOSE_OBJECT:
        if (objectDepth > 0) objectDepth--;
        continue;
    }
    if (arrayDepth > 0 || objectDepth > 0) {
      continue;
    }

    if (c === COMMA) {
      spans.push({ begin, end });
      begin = i + 1;
      end = begin;
      inToken = false;
    }
  }

  if (inToken) {
    spans.push({ begin, end });
  }
  return spans;
}

/**
 * Shared bracket handling for object and array finders.
 */
abstract class JsonContainerFinder extends SpanFinder {
  protected abstract readonly open: string;
  protected abstract readonly close: string;
  protected abstract readonly label: string;

  protected findSpans(text: string): Span[] {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return [];
    }
    if (trimmed.length < 2 || !trimmed.startsWith(this.open) || !trimmed.endsWith(this.close)) {
      throw new StructuralFormatError(
        `JSON ${this.label} must be enclosed in "${this.open}${this.close}"`,
        text,
      );
    }

    const outerBegin = text.indexOf(this.open) + 1;
    const outerEnd = text.lastIndexOf(this.close);
    return scanMembers(text, outerBegin, outerEnd);
  }
}

/**
 * Splits a JSON object into raw `"key": value` members.
 *
 * @example
 * ```ts
 * new JsonObjectFinder('{"x":1,"y":[1,2]}').toArray(); // ['"x":1', '"y":[1,2]']
 * ```
 */
export class JsonObjectFinder extends JsonContainerFinder {
  protected readonly open = '{';
  protected readonly close = '}';
  protected readonly label = 'object';
}

/**
 * Splits a JSON array into raw element tokens.
 *
 * @example
 * ```ts
 * new JsonArrayFinder('["a", null, [1]]').toArray(); // ['"a"', 'null', '[1]']
 * ```
 */
export class JsonArrayFinder extends JsonContainerFinder {
  protected readonly open = '[';
  protected readonly close = ']';
  protected readonly label = 'array';
}

/**
 * Splits one object member at its first unquoted, unescaped colon.
 *
 * Yields two spans (key with surrounding quotes removed, raw value) when a
 * colon exists, a single span otherwise.
 */
export class JsonKeyValueFinder extends SpanFinder {
  protected findSpans(text: string): Span[] {
    if (text.trim().length === 0) {
      return [];
    }

    let inQuote = false;
    let colon = -1;
    for (let i = 0; i < text.length; i++) {
      const c = text.charCodeAt(i);
      if (c === DOUBLE_QUOTE) {
        if (!isEscaped(text, i)) {
          inQuote = !inQuote;
        }
        continue;
      }
      if (!inQuote && c === COLON) {
        colon = i;
        break;
      }
    }

    if (colon === -1) {
      return [trimBlankSpan(text, 0, text.length)];
    }
    const key = trimBlankSpan(text, 0, colon);
    return [trimQuotedSpan(text, key.begin, key.end), trimBlankSpan(text, colon + 1, text.length)];
  }
}

function trimBlankSpan(text: string, begin: number, end: number): Span {
  let b = begin;
  let e = end;
  while (b < e && isBlankChar(text.charCodeAt(b))) b++;
  while (e > b && isBlankChar(text.charCodeAt(e - 1))) e--;
  return { begin: b, end: e };
}

/**
 * Split a raw object member into `[key, rawValue]`.
 *
 * @returns null when there is no colon or the key is blank; callers skip such members
 */
export function splitJsonKeyValue(member: string): [string, string] | null {
  const parts = new JsonKeyValueFinder(member).toArray();
  if (parts.length < 2) {
    return null;
  }
  const [key, value] = parts;
  if (key === undefined || value === undefined || key.trim().length === 0) {
    return null;
  }
  return [key, value];
}
