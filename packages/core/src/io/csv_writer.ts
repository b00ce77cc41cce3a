import { z } from 'zod';
import { csvModeSchema, encodeCsv, joinCsv } from '../codec/csv.js';
import type { ScalarRecord } from '../record/scalar_record.js';
import type { CsvMode, ScalarValue } from '../types.js';

/** Receives one CSV line at a time, without a terminator. */
export type LineSink = (line: string) => void;

export const csvWriterOptionsSchema = z.object({
  mode: csvModeSchema,
});

export type CsvWriterOptions = z.infer<typeof csvWriterOptionsSchema>;

/**
 * Writes records or raw values as CSV lines to a sink.
 *
 * @example
 * ```ts
 * const lines: string[] = [];
 * const writer = new CsvRowWriter((line) => lines.push(line), { mode: 'minimal' });
 * writer.writeValues(['id', 'note']);
 * writer.writeRecord(new ScalarRecord({ id: '1', note: 'a,b' }));
 * lines; // ['id,note', '1,"a,b"']
 * ```
 */
export class CsvRowWriter {
  private readonly sink: LineSink;
  private readonly mode: CsvMode;
  private lines = 0;

  /**
   * @throws {z.ZodError} If `options` is malformed
   */
  constructor(sink: LineSink, options: CsvWriterOptions) {
    this.sink = sink;
    this.mode = csvWriterOptionsSchema.parse(options).mode;
  }

  /** Lines written so far. */
  get lineCount(): number {
    return this.lines;
  }

  writeValues(values: readonly ScalarValue[]): void {
    this.emit(joinCsv(values, this.mode));
  }

  /** Write the scalar keys of `record` as a header line. */
  writeHeader(record: ScalarRecord): void {
    this.writeValues(record.keys());
  }

  writeRecord(record: ScalarRecord): void {
    this.emit(encodeCsv(record, this.mode));
  }

  private emit(line: string): void {
    this.sink(line);
    this.lines++;
  }
}
