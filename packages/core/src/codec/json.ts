// ============================================================================
// @tabula/core — JSON Codec
// ============================================================================
//
// A JSON subset sized for records, read without a grammar parser: the
// finders cut each container into raw member tokens and this module decides
// what each token is.
//
// Mapping:
//   scalar   "text" | null           literals (1, true) are kept as text
//   list     ["a", null, …]
//   record   { … }
//   rows     [{ … }, { … }]          array whose first element is an object
//   grid     [["a"], ["b", "c"]]     array whose first element is an array
//
// Nesting is counted in brackets from the top object (level 1) and may not
// exceed 3, on both encode and decode:
//
//   {"r": [ { "k": "v" } ]}
//    1    2  3
//
// Messages are appended as "_msg" / "_has_err"; decode skips both keys.
// ============================================================================

import { getConfig } from '../config.js';
import { StructuralFormatError } from '../errors.js';
import { logSkipped, timer } from '../logger.js';
import { CompositeRecord } from '../record/composite_record.js';
import { Grid } from '../record/grid.js';
import { type Message, formatMessageText } from '../record/messages.js';
import { RowList } from '../record/row_list.js';
import { ScalarRecord } from '../record/scalar_record.js';
import {
  JsonArrayFinder,
  JsonObjectFinder,
  looksLikeJsonArray,
  looksLikeJsonObject,
  splitJsonKeyValue,
} from '../scan/json_finders.js';
import type { MessageCatalog, ScalarValue } from '../types.js';
import { jsonEscape, jsonUnescape } from '../values.js';

/** Deepest bracket level a document may reach. */
export const MAX_JSON_DEPTH = 3;

/** Keys written by the message channel and skipped on decode. */
export const RESERVED_JSON_KEYS: ReadonlySet<string> = new Set(['_msg', '_has_err']);

export interface JsonEncodeOptions {
  /** Message id → text with `{0}`, `{1}`… placeholders. */
  catalog?: MessageCatalog;
}

function checkDepth(level: number, source: string): void {
  if (level > MAX_JSON_DEPTH) {
    throw new StructuralFormatError(
      `JSON nesting deeper than ${MAX_JSON_DEPTH} levels is not supported`,
      source,
    );
  }
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function encodeScalar(value: ScalarValue): string {
  return value === null ? 'null' : `"${jsonEscape(value)}"`;
}

function encodeList(values: readonly ScalarValue[]): string {
  return `[${values.map(encodeScalar).join(',')}]`;
}

function encodeFlat(record: ScalarRecord): string {
  const members = record.entries().map(([key, value]) => `"${key}":${encodeScalar(value)}`);
  return `{${members.join(',')}}`;
}

function encodeMessage(message: Message, catalog?: MessageCatalog): string {
  const parts = [
    `"type":"${message.severity}"`,
    `"id":"${jsonEscape(message.id)}"`,
    `"text":"${jsonEscape(formatMessageText(message, catalog))}"`,
  ];
  if (message.item !== null) {
    if (message.rowList !== null) {
      parts.push(`"item":"${jsonEscape(`${message.rowList}.${message.item}`)}"`);
      parts.push(`"row":${message.row}`);
    } else {
      parts.push(`"item":"${jsonEscape(message.item)}"`);
    }
  }
  return `{${parts.join(',')}}`;
}

function encodeComposite(record: CompositeRecord, level: number, catalog?: MessageCatalog): string {
  const members: string[] = [];

  for (const key of record.allKeys()) {
    let value: string;
    switch (record.kindOf(key)) {
      case 'list':
        checkDepth(level + 1, key);
        value = encodeList(record.getList(key));
        break;
      case 'record':
        checkDepth(level + 1, key);
        value = encodeComposite(record.getRecord(key), level + 1, catalog);
        break;
      case 'rows': {
        const rows = record.getRows(key);
        checkDepth(level + (rows.size > 0 ? 2 : 1), key);
        value = `[${[...rows].map(encodeFlat).join(',')}]`;
        break;
      }
      case 'grid': {
        const grid = record.getGrid(key);
        checkDepth(level + (grid.size > 0 ? 2 : 1), key);
        value = `[${[...grid].map(encodeList).join(',')}]`;
        break;
      }
      default:
        value = encodeScalar(record.getStringOrNull(key));
    }
    members.push(`"${key}":${value}`);
  }

  if (record.hasMessages()) {
    const messages = record.messages().map((m) => encodeMessage(m, catalog));
    members.push(`"_msg":[${messages.join(',')}]`);
    members.push(`"_has_err":${record.hasErrorMessage()}`);
  }
  return `{${members.join(',')}}`;
}

/**
 * Serialize a record as compact JSON. Scalar-only records produce a flat
 * object; composite records include every namespace and their messages.
 *
 * @throws {StructuralFormatError} If the record nests deeper than 3 levels
 *
 * @example
 * ```ts
 * const rec = new CompositeRecord({ name: 'a/b', note: null });
 * rec.putList('ids', ['1', '2']);
 * encodeJson(rec); // {"name":"a\/b","note":null,"ids":["1","2"]}
 * ```
 */
export function encodeJson(record: ScalarRecord, options: JsonEncodeOptions = {}): string {
  if (record instanceof CompositeRecord) {
    return encodeComposite(record, 1, options.catalog);
  }
  return encodeFlat(record);
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/** `null` ⇒ null, quoted ⇒ unescaped interior, any other literal verbatim. */
function decodeScalar(raw: string): ScalarValue {
  if (raw === 'null') {
    return null;
  }
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return jsonUnescape(raw.slice(1, -1));
  }
  return raw;
}

function isContainer(raw: string): boolean {
  return looksLikeJsonObject(raw) || looksLikeJsonArray(raw);
}

/** Keyed members of one object, skipping keyless and reserved entries. */
function* members(text: string): Generator<[string, string]> {
  for (const member of new JsonObjectFinder(text)) {
    const pair = splitJsonKeyValue(member);
    if (pair === null) {
      logSkipped('json', 'member without key', { member });
      continue;
    }
    if (RESERVED_JSON_KEYS.has(pair[0])) {
      logSkipped('json', 'reserved key', { key: pair[0] });
      continue;
    }
    yield pair;
  }
}

type ArrayKind = 'list' | 'rows' | 'grid';

function elementKind(raw: string): ArrayKind {
  if (looksLikeJsonObject(raw)) return 'rows';
  if (looksLikeJsonArray(raw)) return 'grid';
  return 'list';
}

/**
 * Non-blank elements of an array and the collection kind they form.
 * A bare `null` takes no part in choosing the kind; in rows and grids it is
 * dropped.
 */
function classifyArray(key: string, raw: string): { kind: ArrayKind; elements: string[] } {
  const elements: string[] = [];
  let kind: ArrayKind | null = null;

  for (const element of new JsonArrayFinder(raw)) {
    if (element.trim().length === 0) {
      logSkipped('json', 'blank array element', { key });
      continue;
    }
    if (element.trim() === 'null') {
      elements.push(element);
      continue;
    }
    const current = elementKind(element);
    if (kind === null) {
      kind = current;
    } else if (kind !== current) {
      throw new StructuralFormatError(
        `JSON array "${key}" mixes ${kind} and ${current} elements`,
        raw,
      );
    }
    elements.push(element);
  }
  if (kind === null || kind === 'list') {
    return { kind: 'list', elements };
  }
  const present = elements.filter((element) => element.trim() !== 'null');
  for (let i = present.length; i < elements.length; i++) {
    logSkipped('json', `null ${kind === 'rows' ? 'row' : 'grid row'}`, { key });
  }
  return { kind, elements: present };
}

function decodeRow(raw: string, level: number): ScalarRecord {
  const row = new ScalarRecord();
  for (const [key, value] of members(raw)) {
    if (isContainer(value)) {
      checkDepth(level + 1, value);
    }
    row.put(key, decodeScalar(value));
  }
  return row;
}

function decodeGridRow(raw: string, level: number): ScalarValue[] {
  const cells: ScalarValue[] = [];
  for (const cell of new JsonArrayFinder(raw)) {
    if (isContainer(cell)) {
      checkDepth(level + 1, cell);
    }
    cells.push(decodeScalar(cell));
  }
  return cells;
}

function decodeArrayInto(record: CompositeRecord, key: string, raw: string, level: number): void {
  const { kind, elements } = classifyArray(key, raw);
  switch (kind) {
    case 'list':
      record.putList(key, elements.map(decodeScalar));
      return;
    case 'rows': {
      checkDepth(level + 1, raw);
      const rows = new RowList();
      for (const element of elements) {
        rows.add(decodeRow(element, level + 1));
      }
      record.putRows(key, rows);
      return;
    }
    case 'grid': {
      checkDepth(level + 1, raw);
      const grid = new Grid();
      for (const element of elements) {
        grid.add(decodeGridRow(element, level + 1));
      }
      record.putGrid(key, grid);
      return;
    }
  }
}

function decodeObjectInto(text: string, record: CompositeRecord, level: number): void {
  for (const [key, raw] of members(text)) {
    if (looksLikeJsonObject(raw)) {
      checkDepth(level + 1, raw);
      const nested = new CompositeRecord();
      decodeObjectInto(raw, nested, level + 1);
      record.putRecord(key, nested);
    } else if (looksLikeJsonArray(raw)) {
      checkDepth(level + 1, raw);
      decodeArrayInto(record, key, raw, level + 1);
    } else {
      record.put(key, decodeScalar(raw));
    }
  }
}

/**
 * Read a JSON object into a composite record.
 *
 * Blank input leaves the record empty. Members without a key and the
 * reserved `_msg` / `_has_err` members are skipped.
 *
 * @param target - Record to fill; a new one is created when omitted
 * @throws {StructuralFormatError} On non-object input, mixed array kinds or nesting deeper than 3
 * @throws {DuplicateKeyError} If a key repeats or already exists in `target`
 *
 * @example
 * ```ts
 * const rec = decodeJson('{"x":1,"y":[1,2]}');
 * rec.getString('x'); // '1'
 * rec.getList('y');   // ['1', '2']
 * ```
 */
export function decodeJson(
  text: string,
  target: CompositeRecord = new CompositeRecord(),
): CompositeRecord {
  const clock = text.length > getConfig().scanBufferThreshold ? timer('json: decode') : null;
  decodeObjectInto(text, target, 1);
  clock?.endWith({ chars: text.length, keys: target.allKeys().length });
  return target;
}

/**
 * Read a JSON object of scalar members into a flat record.
 * @throws {StructuralFormatError} If any member value is an object or array
 */
export function decodeJsonFlat(
  text: string,
  target: ScalarRecord = new ScalarRecord(),
): ScalarRecord {
  for (const [key, raw] of members(text)) {
    if (isContainer(raw)) {
      throw new StructuralFormatError(
        `Member "${key}" holds a nested value; a flat record takes scalars only`,
        raw,
      );
    }
    target.put(key, decodeScalar(raw));
  }
  return target;
}
