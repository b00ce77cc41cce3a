// ============================================================================
// @tabula/core — URL Query Codec
// ============================================================================
//
//   a=1&b%5B%5D=x        keys and values are percent-decoded, + reads as space
//   b[]=x&b[]=y          repeated `key[]` entries collect into one list
//   b[]=                 a lone empty `key[]` entry is an empty list
//   c                    no `=` reads as ''
//
// Encoding writes scalars and lists only; nested records, row lists and
// grids have no query form and are left out.
// ============================================================================

import { DuplicateKeyError, StructuralFormatError } from '../errors.js';
import { logSkipped } from '../logger.js';
import { CompositeRecord } from '../record/composite_record.js';
import { ScalarRecord } from '../record/scalar_record.js';
import { SimpleFinder } from '../scan/simple_finder.js';
import type { ScalarValue } from '../types.js';
import { urlDecode, urlEncode } from '../values.js';

const LIST_SUFFIX = '[]';

interface QueryParam {
  key: string;
  list: boolean;
  value: string;
}

function queryPart(text: string): string {
  const q = text.indexOf('?');
  return q >= 0 ? text.slice(q + 1) : text;
}

function* params(text: string): Generator<QueryParam> {
  for (const param of new SimpleFinder(queryPart(text), '&')) {
    if (param.length === 0) {
      continue;
    }
    const eq = param.indexOf('=');
    const rawKey = eq < 0 ? param : param.slice(0, eq);
    const key = urlDecode(rawKey, rawKey);
    const value = eq < 0 ? '' : urlDecode(key, param.slice(eq + 1));

    if (key.length === 0) {
      logSkipped('url', 'parameter without key', { param });
      continue;
    }
    const list = key.endsWith(LIST_SUFFIX);
    yield { key: list ? key.slice(0, -LIST_SUFFIX.length) : key, list, value };
  }
}

function encodeParam(key: string, value: ScalarValue): string {
  return `${key}=${urlEncode(value)}`;
}

/**
 * Serialize scalars and lists as a query string (no leading `?`).
 *
 * @example
 * ```ts
 * const rec = new CompositeRecord({ q: 'a b*', page: null });
 * rec.putList('tag', ['x', 'y']);
 * encodeUrlQuery(rec); // 'q=a%20b%2A&page=&tag[]=x&tag[]=y'
 * ```
 */
export function encodeUrlQuery(record: ScalarRecord): string {
  if (!(record instanceof CompositeRecord)) {
    return record
      .entries()
      .map(([key, value]) => encodeParam(key, value))
      .join('&');
  }

  const parts: string[] = [];
  for (const key of record.allKeys()) {
    switch (record.kindOf(key)) {
      case 'scalar':
        parts.push(encodeParam(key, record.getStringOrNull(key)));
        break;
      case 'list': {
        const values = record.getList(key);
        const listKey = `${key}${LIST_SUFFIX}`;
        if (values.length === 0) {
          parts.push(`${listKey}=`);
        } else {
          for (const value of values) {
            parts.push(encodeParam(listKey, value));
          }
        }
        break;
      }
      default:
        break;
    }
  }
  return parts.join('&');
}

/**
 * Read a query string, or the part of a URL after its first `?`, into a
 * composite record.
 *
 * @param target - Record to fill; a new one is created when omitted
 * @throws {StructuralFormatError} If a key appears both with and without `[]`
 * @throws {DuplicateKeyError} If a scalar key repeats or already exists in `target`
 * @throws {ValueFormatError} On a malformed percent-escape
 *
 * @example
 * ```ts
 * const rec = decodeUrlQuery('/search?a=1&b[]=x&b[]=y');
 * rec.getString('a'); // '1'
 * rec.getList('b');   // ['x', 'y']
 * ```
 */
export function decodeUrlQuery(
  text: string,
  target: CompositeRecord = new CompositeRecord(),
): CompositeRecord {
  const pending = new Map<string, { list: boolean; values: string[] }>();

  for (const { key, list, value } of params(text)) {
    const slot = pending.get(key);
    if (slot === undefined) {
      pending.set(key, { list, values: [value] });
    } else if (slot.list !== list) {
      throw new StructuralFormatError(
        `Query key "${key}" is used both with and without "${LIST_SUFFIX}"`,
        text,
      );
    } else if (!list) {
      throw new DuplicateKeyError(key, 'scalar');
    } else {
      slot.values.push(value);
    }
  }

  for (const [key, slot] of pending) {
    if (!slot.list) {
      target.put(key, slot.values[0]);
    } else if (slot.values.length === 1 && slot.values[0] === '') {
      target.putList(key, []);
    } else {
      target.putList(key, slot.values);
    }
  }
  return target;
}

/**
 * Read a query string into a flat record.
 * @throws {StructuralFormatError} If any key carries the `[]` list suffix
 * @throws {DuplicateKeyError} If a key repeats or already exists in `target`
 */
export function decodeUrlQueryFlat(
  text: string,
  target: ScalarRecord = new ScalarRecord(),
): ScalarRecord {
  for (const { key, list, value } of params(text)) {
    if (list) {
      throw new StructuralFormatError(
        `List key "${key}${LIST_SUFFIX}" is not allowed in a flat record`,
        text,
      );
    }
    target.put(key, value);
  }
  return target;
}
