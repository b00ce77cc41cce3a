// ============================================================================
// @tabula/core — CSV Row Reader
// ============================================================================
//
// Turns a source of physical lines into records. In the multiline modes a
// line that ends inside an open quote is joined with the next one by "\n"
// until the quote closes or the source runs out:
//
//   a,"b        ┐
//   c"          ┘ → a,"b\nc"  → { a: 'a', b: 'b\nc' }
//
// The core never opens files; callers hand in any iterable of lines.
// ============================================================================

import { z } from 'zod';
import { csvModeSchema, decodeCsv, isMultilineMode, splitCsv } from '../codec/csv.js';
import { logSkipped } from '../logger.js';
import type { ScalarRecord } from '../record/scalar_record.js';
import { CsvFinder } from '../scan/csv_finder.js';
import type { CsvMode } from '../types.js';

/** Physical lines, without their terminators. */
export type LineSource = Iterable<string>;

/**
 * Split text into lines on CRLF or LF. A trailing line break does not
 * produce a final empty line.
 */
export function linesOf(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export const csvReaderOptionsSchema = z.object({
  mode: csvModeSchema,
  /** Column keys; when omitted the first line supplies them. */
  keys: z.array(z.string()).min(1).optional(),
});

export type CsvReaderOptions = z.infer<typeof csvReaderOptionsSchema>;

/**
 * Iterates one record per logical CSV line.
 *
 * @example
 * ```ts
 * const reader = new CsvRowReader(linesOf('id,name\n1,"Ann"\n2,Bo\n'), { mode: 'minimal' });
 * for (const row of reader) {
 *   row.getInt('id');
 * }
 * reader.readCount; // 2
 * ```
 */
export class CsvRowReader implements Iterable<ScalarRecord> {
  private readonly source: LineSource;
  private readonly mode: CsvMode;
  private readonly givenKeys: readonly string[] | undefined;
  private resolvedKeys: readonly string[] | null = null;
  private count = 0;

  /**
   * @throws {z.ZodError} If `options` is malformed
   */
  constructor(source: LineSource, options: CsvReaderOptions) {
    const parsed = csvReaderOptionsSchema.parse(options);
    this.source = source;
    this.mode = parsed.mode;
    this.givenKeys = parsed.keys;
  }

  /** Records yielded so far. */
  get readCount(): number {
    return this.count;
  }

  /** Column keys in use; `null` until the header line has been read. */
  get keys(): readonly string[] | null {
    return this.givenKeys ?? this.resolvedKeys;
  }

  *[Symbol.iterator](): Iterator<ScalarRecord> {
    const lines = this.source[Symbol.iterator]();

    let keys = this.givenKeys;
    if (keys === undefined) {
      const header = this.nextLogicalLine(lines);
      if (header === null) {
        return;
      }
      keys = splitCsv(header, this.mode);
      this.resolvedKeys = keys;
    }

    let line = this.nextLogicalLine(lines);
    while (line !== null) {
      if (line.length === 0) {
        logSkipped('csv', 'empty line', { after: this.count });
      } else {
        const record = decodeCsv(keys, line, this.mode);
        this.count++;
        yield record;
      }
      line = this.nextLogicalLine(lines);
    }
  }

  private nextLogicalLine(lines: Iterator<string>): string | null {
    const first = lines.next();
    if (first.done) {
      return null;
    }
    let line = first.value;
    if (!isMultilineMode(this.mode)) {
      return line;
    }
    while (new CsvFinder(line).hasUnclosedQuote()) {
      const next = lines.next();
      if (next.done) {
        break;
      }
      line = `${line}\n${next.value}`;
    }
    return line;
  }
}
