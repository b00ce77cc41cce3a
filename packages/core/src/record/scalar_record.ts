// ============================================================================
// @tabula/core — Scalar Record
// ============================================================================
//
// Insertion-ordered key → text map with typed accessors. Every value is held
// in its canonical text form (see values.ts); typed getters parse on read.
//
//   put*      write-once; an existing key raises DuplicateKeyError
//   put*Force replace in place (insertion position kept), returns the prior value
//   get*      absent key raises NotFoundError
//   get*OrDefault / get*OrNullDefault   absent key returns the default
// ============================================================================

import { DuplicateKeyError, NotFoundError, ReadOnlyRecordError } from '../errors.js';
import type {
  CalendarDate,
  CalendarTimestamp,
  EntryKind,
  ScalarInput,
  ScalarSource,
  ScalarValue,
} from '../types.js';
import {
  formatDate,
  formatDecimal,
  formatTimestamp,
  isBlank,
  isCalendarTimestamp,
  isTrue,
  parseDate,
  parseDecimal,
  parseInt32,
  parseLong,
  parseTimestamp,
  validateKey,
} from '../values.js';
import type { CompositeRecord } from './composite_record.js';
import type { Grid } from './grid.js';
import type { RowList } from './row_list.js';

/** One slot of the shared key ledger. */
export type RecordEntry =
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'list'; value: ScalarValue[] }
  | { kind: 'record'; value: CompositeRecord }
  | { kind: 'rows'; value: RowList }
  | { kind: 'grid'; value: Grid };

export type EntryOf<K extends EntryKind> = Extract<RecordEntry, { kind: K }>;

function isKind<K extends EntryKind>(entry: RecordEntry, kind: K): entry is EntryOf<K> {
  return entry.kind === kind;
}

function isEntryIterable(source: ScalarSource): source is Iterable<readonly [string, ScalarValue]> {
  return Symbol.iterator in source;
}

/**
 * Canonical text for a typed scalar input.
 * @throws {ValueFormatError} For non-finite numbers and impossible calendar values
 */
export function toScalarText(key: string, value: ScalarInput): ScalarValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
      return formatDecimal(key, value);
    case 'bigint':
      return value.toString();
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      return isCalendarTimestamp(value) ? formatTimestamp(key, value) : formatDate(key, value);
  }
}

/**
 * Ordered map of scalar values.
 *
 * @example
 * ```ts
 * const rec = new ScalarRecord({ qty: '12', price: null });
 * rec.put('active', true);
 * rec.getInt('qty');              // 12
 * rec.getDecimalOrNull('price');  // null
 * rec.getBoolean('active');       // true
 * rec.toString();                 // {qty=12,price=null,active=true}
 * ```
 */
export class ScalarRecord {
  protected readonly ledger: Map<string, RecordEntry> = new Map();
  private readOnly = false;

  /**
   * @param source - Values to copy in; a record source contributes its scalars only
   */
  constructor(source?: ScalarRecord | ScalarSource) {
    if (source !== undefined) {
      this.copyScalars(source, false);
    }
  }

  /** Whether this record was produced by `freeze()`. */
  public get isReadOnly(): boolean {
    return this.readOnly;
  }

  /** Number of scalar entries. */
  public get size(): number {
    let count = 0;
    for (const entry of this.ledger.values()) {
      if (entry.kind === 'scalar') count++;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Store a value under a new key.
   * @throws {DuplicateKeyError} If the key already exists
   */
  put(key: string, value: ScalarInput): void {
    this.store(key, 'scalar', { kind: 'scalar', value: toScalarText(key, value) }, false, 'put');
  }

  /**
   * Store or replace a value.
   * @returns The replaced value, or `undefined` if the key was new
   */
  putForce(key: string, value: ScalarInput): ScalarValue | undefined {
    const entry = { kind: 'scalar', value: toScalarText(key, value) } as const;
    return this.store(key, 'scalar', entry, true, 'putForce')?.value;
  }

  putNull(key: string): void {
    this.put(key, null);
  }

  putNullForce(key: string): ScalarValue | undefined {
    return this.putForce(key, null);
  }

  /** Copy every scalar of `source` in; any existing key raises DuplicateKeyError. */
  putAll(source: ScalarRecord | ScalarSource): void {
    this.copyScalars(source, false);
  }

  /** Copy every scalar of `source` in, replacing existing values. */
  putAllForce(source: ScalarRecord | ScalarSource): void {
    this.copyScalars(source, true);
  }

  /**
   * Remove a scalar.
   * @returns The removed value, or `undefined` if there was no scalar under `key`
   */
  remove(key: string): ScalarValue | undefined {
    return this.discard(key, 'scalar', 'remove')?.value;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  has(key: string): boolean {
    return this.lookup(key, 'scalar') !== undefined;
  }

  /** Stored text; null is returned as `''`. */
  getString(key: string): string {
    return this.require(key) ?? '';
  }

  getStringOrDefault(key: string, defaultValue: string): string {
    return this.has(key) ? this.getString(key) : defaultValue;
  }

  getStringOrNull(key: string): string | null {
    return this.require(key);
  }

  getStringOrNullDefault(key: string, defaultValue: string | null): string | null {
    return this.has(key) ? this.getStringOrNull(key) : defaultValue;
  }

  /** Decimal value; blank or null reads as 0. */
  getDecimal(key: string): number {
    return this.getDecimalOrNull(key) ?? 0;
  }

  getDecimalOrDefault(key: string, defaultValue: number): number {
    return this.has(key) ? this.getDecimal(key) : defaultValue;
  }

  getDecimalOrNull(key: string): number | null {
    const text = this.require(key);
    return text === null || isBlank(text) ? null : parseDecimal(key, text);
  }

  getDecimalOrNullDefault(key: string, defaultValue: number | null): number | null {
    return this.has(key) ? this.getDecimalOrNull(key) : defaultValue;
  }

  /**
   * Exact 32-bit integer; blank or null reads as 0.
   * @throws {ValueFormatError} On a fraction or out-of-range value
   */
  getInt(key: string): number {
    const text = this.require(key);
    return text === null || isBlank(text) ? 0 : parseInt32(key, text);
  }

  getIntOrDefault(key: string, defaultValue: number): number {
    return this.has(key) ? this.getInt(key) : defaultValue;
  }

  /**
   * Exact 64-bit integer; blank or null reads as `0n`.
   * @throws {ValueFormatError} On a fraction or out-of-range value
   */
  getLong(key: string): bigint {
    const text = this.require(key);
    return text === null || isBlank(text) ? 0n : parseLong(key, text);
  }

  getLongOrDefault(key: string, defaultValue: bigint): bigint {
    return this.has(key) ? this.getLong(key) : defaultValue;
  }

  /**
   * Strict `YYYYMMDD` date; blank or null reads as null.
   * @throws {ValueFormatError} If the text is not a valid date
   */
  getDateOrNull(key: string): CalendarDate | null {
    const text = this.require(key);
    return text === null || isBlank(text) ? null : parseDate(key, text);
  }

  getDateOrNullDefault(key: string, defaultValue: CalendarDate | null): CalendarDate | null {
    return this.has(key) ? this.getDateOrNull(key) : defaultValue;
  }

  /**
   * Strict `YYYYMMDD'T'HHMMSSffffff` timestamp; blank or null reads as null.
   * @throws {ValueFormatError} If the text is not a valid timestamp
   */
  getTimestampOrNull(key: string): CalendarTimestamp | null {
    const text = this.require(key);
    return text === null || isBlank(text) ? null : parseTimestamp(key, text);
  }

  getTimestampOrNullDefault(
    key: string,
    defaultValue: CalendarTimestamp | null,
  ): CalendarTimestamp | null {
    return this.has(key) ? this.getTimestampOrNull(key) : defaultValue;
  }

  /** True for `1`, `true`, `yes`, `on` (trimmed, any case). */
  getBoolean(key: string): boolean {
    return isTrue(this.require(key));
  }

  getBooleanOrDefault(key: string, defaultValue: boolean): boolean {
    return this.has(key) ? this.getBoolean(key) : defaultValue;
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  /** Scalar keys in insertion order. */
  keys(): string[] {
    return this.entries().map(([key]) => key);
  }

  values(): ScalarValue[] {
    return this.entries().map(([, value]) => value);
  }

  /** Scalar `[key, value]` pairs in insertion order. */
  entries(): Array<[string, ScalarValue]> {
    const out: Array<[string, ScalarValue]> = [];
    for (const [key, entry] of this.ledger) {
      if (entry.kind === 'scalar') out.push([key, entry.value]);
    }
    return out;
  }

  toObject(): Record<string, ScalarValue> {
    return Object.fromEntries(this.entries());
  }

  /** A read-only copy; every write on it raises ReadOnlyRecordError. */
  freeze(): ScalarRecord {
    const copy = new ScalarRecord(this);
    copy.readOnly = true;
    return copy;
  }

  /** Diagnostic form, e.g. `{a=1,b=null}`. */
  toString(): string {
    return `{${this.entries()
      .map(([key, value]) => `${key}=${value ?? 'null'}`)
      .join(',')}}`;
  }

  // -------------------------------------------------------------------------
  // Ledger access for subclasses
  // -------------------------------------------------------------------------

  protected markReadOnly(): void {
    this.readOnly = true;
  }

  protected assertWritable(operation: string): void {
    if (this.readOnly) {
      throw new ReadOnlyRecordError(operation);
    }
  }

  protected lookup<K extends EntryKind>(key: string, kind: K): EntryOf<K> | undefined {
    const entry = this.ledger.get(key);
    return entry !== undefined && isKind(entry, kind) ? entry : undefined;
  }

  /**
   * Write one ledger slot. A forced write may only replace a slot of the
   * same kind.
   */
  protected store<K extends EntryKind>(
    key: string,
    kind: K,
    entry: EntryOf<K>,
    force: boolean,
    operation: string,
  ): EntryOf<K> | undefined {
    this.assertWritable(operation);
    validateKey(key);
    const prior = this.ledger.get(key);
    if (prior === undefined) {
      this.ledger.set(key, entry);
      return undefined;
    }
    if (!force || !isKind(prior, kind)) {
      throw new DuplicateKeyError(key, prior.kind);
    }
    this.ledger.set(key, entry);
    return prior;
  }

  protected discard<K extends EntryKind>(
    key: string,
    kind: K,
    operation: string,
  ): EntryOf<K> | undefined {
    this.assertWritable(operation);
    const prior = this.lookup(key, kind);
    if (prior !== undefined) {
      this.ledger.delete(key);
    }
    return prior;
  }

  private require(key: string): ScalarValue {
    const entry = this.lookup(key, 'scalar');
    if (entry === undefined) {
      throw new NotFoundError(key, 'scalar');
    }
    return entry.value;
  }

  private copyScalars(source: ScalarRecord | ScalarSource, force: boolean): void {
    const operation = force ? 'putAllForce' : 'putAll';
    const pairs: Iterable<readonly [string, ScalarValue]> =
      source instanceof ScalarRecord
        ? source.entries()
        : isEntryIterable(source)
          ? source
          : Object.entries(source);
    for (const [key, value] of pairs) {
      this.store(key, 'scalar', { kind: 'scalar', value }, force, operation);
    }
  }
}
