// ============================================================================
// @tabula/core — CSV Codec
// ============================================================================
//
// One record ⇄ one CSV line. Only scalar entries take part; list, record,
// row list and grid entries are left out.
//
// | mode               | quoting                      | line breaks in values |
// |--------------------|------------------------------|-----------------------|
// | plain              | none                         | collapsed to a space  |
// | quoted             | every field                  | collapsed to a space  |
// | minimal            | fields with , " CR or LF     | collapsed to a space  |
// | quoted-multiline   | every field                  | kept, as LF           |
// | minimal-multiline  | fields with , " CR or LF     | kept, as LF           |
//
// Null is written as an empty field and read back as ''.
// ============================================================================

import { z } from 'zod';
import { logSkipped } from '../logger.js';
import { ScalarRecord } from '../record/scalar_record.js';
import { CsvFinder, unquoteCsvField } from '../scan/csv_finder.js';
import { SimpleFinder } from '../scan/simple_finder.js';
import type { CsvMode, ScalarValue } from '../types.js';

/** Accepted CSV modes. */
export const csvModeSchema = z.enum([
  'plain',
  'quoted',
  'minimal',
  'quoted-multiline',
  'minimal-multiline',
]);

/** Whether `mode` keeps line breaks inside quoted values. */
export function isMultilineMode(mode: CsvMode): boolean {
  return mode === 'quoted-multiline' || mode === 'minimal-multiline';
}

function normalizeLineBreaks(value: string, mode: CsvMode): string {
  return isMultilineMode(mode)
    ? value.replace(/\r\n?/g, '\n')
    : value.replace(/\r\n|\r|\n/g, ' ');
}

function needsQuotes(value: string): boolean {
  return /[,"\r\n]/.test(value);
}

function encodeField(value: ScalarValue, mode: CsvMode): string {
  const text = normalizeLineBreaks(value ?? '', mode);
  switch (mode) {
    case 'plain':
      return text;
    case 'quoted':
    case 'quoted-multiline':
      return `"${text.replaceAll('"', '""')}"`;
    case 'minimal':
    case 'minimal-multiline':
      return needsQuotes(text) ? `"${text.replaceAll('"', '""')}"` : text;
  }
}

/**
 * Join values into one CSV line.
 *
 * @example
 * ```ts
 * joinCsv(['a', 'b,c', null], 'minimal'); // 'a,"b,c",'
 * joinCsv(['say "hi"'], 'quoted');         // '"say ""hi"""'
 * ```
 */
export function joinCsv(values: readonly ScalarValue[], mode: CsvMode): string {
  return values.map((value) => encodeField(value, mode)).join(',');
}

/** The scalar values of `record`, in insertion order, as one CSV line. */
export function encodeCsv(record: ScalarRecord, mode: CsvMode): string {
  return joinCsv(record.values(), mode);
}

/**
 * Split one CSV line into field values. `plain` splits on every comma;
 * other modes honour double quotes and unfold `""`.
 */
export function splitCsv(line: string, mode: CsvMode): string[] {
  if (mode === 'plain') {
    return new SimpleFinder(line, ',').toArray();
  }
  return new CsvFinder(line).toArray().map(unquoteCsvField);
}

/**
 * Read one CSV line into a record, pairing fields with `keys` by position.
 *
 * Fields beyond `keys` are ignored, keys beyond the fields stay unset, and a
 * blank key skips its column.
 *
 * @param target - Record to fill; a new one is created when omitted
 * @throws {KeyFormatError} If a non-blank key is invalid
 * @throws {DuplicateKeyError} If `target` already holds one of the keys
 *
 * @example
 * ```ts
 * decodeCsv(['a', 'b', 'c'], 'a,"b,c",d', 'minimal').toObject();
 * // { a: 'a', b: 'b,c', c: 'd' }
 * ```
 */
export function decodeCsv(
  keys: readonly string[],
  line: string,
  mode: CsvMode,
  target: ScalarRecord = new ScalarRecord(),
): ScalarRecord {
  const fields = splitCsv(line, mode);

  if (fields.length !== keys.length) {
    logSkipped('csv', 'column count mismatch', { keys: keys.length, fields: fields.length });
  }

  const count = Math.min(fields.length, keys.length);
  for (let i = 0; i < count; i++) {
    const key = keys[i].trim();
    if (key.length === 0) {
      continue;
    }
    target.put(key, fields[i]);
  }
  return target;
}
