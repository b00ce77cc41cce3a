// ============================================================================
// @tabula/core — Composite Record
// ============================================================================
//
// A scalar record that can also hold named sub-collections. All namespaces
// share one ordered key ledger, so a key is unique across:
//
//   scalar   string | null
//   list     (string | null)[]
//   record   nested CompositeRecord
//   rows     RowList
//   grid     Grid
//
// Sub-collections are deep-copied on every read and write. A forced write
// replaces a value only within its own namespace.
// ============================================================================

import { NotFoundError } from '../errors.js';
import type { EntryKind, MessageSeverity, ScalarSource, ScalarValue } from '../types.js';
import type { Grid } from './grid.js';
import { type Message, MessageList, type MessageOptions, createMessage } from './messages.js';
import type { RowList } from './row_list.js';
import { type EntryOf, type RecordEntry, ScalarRecord } from './scalar_record.js';

function copyEntry(entry: RecordEntry): RecordEntry {
  switch (entry.kind) {
    case 'scalar':
      return { kind: 'scalar', value: entry.value };
    case 'list':
      return { kind: 'list', value: [...entry.value] };
    case 'record':
      return { kind: 'record', value: new CompositeRecord(entry.value) };
    case 'rows':
      return { kind: 'rows', value: entry.value.copy() };
    case 'grid':
      return { kind: 'grid', value: entry.value.copy() };
  }
}

/**
 * Scalar record plus List, Record, RowList and Grid namespaces and a
 * diagnostic message channel.
 *
 * @example
 * ```ts
 * const order = new CompositeRecord({ id: '42' });
 * order.putList('tags', ['new', 'gift']);
 * order.putRows('lines', new RowList([{ sku: 'A1', qty: '2' }]));
 * order.putMessage('ERROR', 'qty.range', { rowList: 'lines', row: 0, item: 'qty' });
 * order.allKeys();          // ['id', 'tags', 'lines']
 * order.hasErrorMessage();  // true
 * ```
 */
export class CompositeRecord extends ScalarRecord {
  private readonly messageList = new MessageList();

  /**
   * @param source - Copied in deeply; a CompositeRecord source also brings its messages
   */
  constructor(source?: ScalarRecord | ScalarSource) {
    super();
    if (source !== undefined) {
      this.putAll(source);
    }
  }

  /** Namespace holding `key`, or `undefined`. */
  kindOf(key: string): EntryKind | undefined {
    return this.ledger.get(key)?.kind;
  }

  /** Keys of every namespace in insertion order. */
  allKeys(): string[] {
    return [...this.ledger.keys()];
  }

  /**
   * Copy `source` in. A CompositeRecord source contributes every namespace
   * and its messages; any other source contributes scalars only.
   * @throws {DuplicateKeyError} If any key already exists
   */
  putAll(source: ScalarRecord | ScalarSource): void {
    if (source instanceof CompositeRecord) {
      this.copyFrom(source, false);
    } else {
      super.putAll(source);
    }
  }

  /** As {@link putAll}, replacing values held under the same namespace. */
  putAllForce(source: ScalarRecord | ScalarSource): void {
    if (source instanceof CompositeRecord) {
      this.copyFrom(source, true);
    } else {
      super.putAllForce(source);
    }
  }

  freeze(): CompositeRecord {
    const copy = new CompositeRecord(this);
    copy.markReadOnly();
    return copy;
  }

  // -------------------------------------------------------------------------
  // List namespace
  // -------------------------------------------------------------------------

  putList(key: string, values: readonly ScalarValue[]): void {
    this.store(key, 'list', { kind: 'list', value: [...values] }, false, 'putList');
  }

  /** @returns A copy of the replaced list, or `undefined` */
  putListForce(key: string, values: readonly ScalarValue[]): ScalarValue[] | undefined {
    return this.store(key, 'list', { kind: 'list', value: [...values] }, true, 'putListForce')
      ?.value;
  }

  /**
   * @throws {NotFoundError} If there is no list under `key`
   */
  getList(key: string): ScalarValue[] {
    return [...this.need(key, 'list').value];
  }

  hasList(key: string): boolean {
    return this.lookup(key, 'list') !== undefined;
  }

  removeList(key: string): ScalarValue[] | undefined {
    return this.discard(key, 'list', 'removeList')?.value;
  }

  // -------------------------------------------------------------------------
  // Record namespace
  // -------------------------------------------------------------------------

  putRecord(key: string, record: CompositeRecord): void {
    const entry = { kind: 'record', value: new CompositeRecord(record) } as const;
    this.store(key, 'record', entry, false, 'putRecord');
  }

  putRecordForce(key: string, record: CompositeRecord): CompositeRecord | undefined {
    const entry = { kind: 'record', value: new CompositeRecord(record) } as const;
    return this.store(key, 'record', entry, true, 'putRecordForce')?.value;
  }

  /**
   * @throws {NotFoundError} If there is no nested record under `key`
   */
  getRecord(key: string): CompositeRecord {
    return new CompositeRecord(this.need(key, 'record').value);
  }

  hasRecord(key: string): boolean {
    return this.lookup(key, 'record') !== undefined;
  }

  removeRecord(key: string): CompositeRecord | undefined {
    return this.discard(key, 'record', 'removeRecord')?.value;
  }

  // -------------------------------------------------------------------------
  // RowList namespace
  // -------------------------------------------------------------------------

  putRows(key: string, rows: RowList): void {
    this.store(key, 'rows', { kind: 'rows', value: rows.copy() }, false, 'putRows');
  }

  putRowsForce(key: string, rows: RowList): RowList | undefined {
    return this.store(key, 'rows', { kind: 'rows', value: rows.copy() }, true, 'putRowsForce')
      ?.value;
  }

  /**
   * @throws {NotFoundError} If there is no row list under `key`
   */
  getRows(key: string): RowList {
    return this.need(key, 'rows').value.copy();
  }

  hasRows(key: string): boolean {
    return this.lookup(key, 'rows') !== undefined;
  }

  removeRows(key: string): RowList | undefined {
    return this.discard(key, 'rows', 'removeRows')?.value;
  }

  // -------------------------------------------------------------------------
  // Grid namespace
  // -------------------------------------------------------------------------

  putGrid(key: string, grid: Grid): void {
    this.store(key, 'grid', { kind: 'grid', value: grid.copy() }, false, 'putGrid');
  }

  putGridForce(key: string, grid: Grid): Grid | undefined {
    return this.store(key, 'grid', { kind: 'grid', value: grid.copy() }, true, 'putGridForce')
      ?.value;
  }

  /**
   * @throws {NotFoundError} If there is no grid under `key`
   */
  getGrid(key: string): Grid {
    return this.need(key, 'grid').value.copy();
  }

  hasGrid(key: string): boolean {
    return this.lookup(key, 'grid') !== undefined;
  }

  removeGrid(key: string): Grid | undefined {
    return this.discard(key, 'grid', 'removeGrid')?.value;
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  /**
   * Attach a diagnostic message. An identical message is added only once.
   * @throws {MessageFormatError} On a blank id or an incomplete field reference
   */
  putMessage(severity: MessageSeverity, id: string, options?: MessageOptions): void {
    this.assertWritable('putMessage');
    this.messageList.add(createMessage(severity, id, options));
  }

  messages(): Message[] {
    return this.messageList.toArray();
  }

  hasMessages(): boolean {
    return this.messageList.size > 0;
  }

  hasErrorMessage(): boolean {
    return this.messageList.hasError();
  }

  clearMessages(): void {
    this.assertWritable('clearMessages');
    this.messageList.clear();
  }

  // -------------------------------------------------------------------------

  private need<K extends EntryKind>(key: string, kind: K): EntryOf<K> {
    const entry = this.lookup(key, kind);
    if (entry === undefined) {
      throw new NotFoundError(key, kind);
    }
    return entry;
  }

  private copyFrom(source: CompositeRecord, force: boolean): void {
    const operation = force ? 'putAllForce' : 'putAll';
    this.assertWritable(operation);
    for (const [key, entry] of source.ledger) {
      this.storeEntry(key, copyEntry(entry), force, operation);
    }
    this.messageList.addAll(source.messageList);
  }

  private storeEntry(key: string, entry: RecordEntry, force: boolean, operation: string): void {
    switch (entry.kind) {
      case 'scalar':
        this.store(key, 'scalar', entry, force, operation);
        break;
      case 'list':
        this.store(key, 'list', entry, force, operation);
        break;
      case 'record':
        this.store(key, 'record', entry, force, operation);
        break;
      case 'rows':
        this.store(key, 'rows', entry, force, operation);
        break;
      case 'grid':
        this.store(key, 'grid', entry, force, operation);
        break;
    }
  }
}
