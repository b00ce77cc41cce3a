// ============================================================================
// @tabula/core — Diagnostic Messages
// ============================================================================
//
// Messages travel with a composite record and are written out by the JSON
// codec under `_msg` / `_has_err`. A message may point at a field:
//
//   item                   a top-level key
//   rowList + row + item   one field of one row in a row list
//
// Adding a message identical to one already held is a no-op.
// ============================================================================

import { MessageFormatError } from '../errors.js';
import type { MessageCatalog, MessageSeverity } from '../types.js';
import { isBlank } from '../values.js';

/** Optional parts of a message. */
export interface MessageOptions {
  /** Values for `{0}`, `{1}`… in the catalog text. */
  args?: readonly string[];
  /** Field the message refers to. */
  item?: string;
  /** Row list holding the field; requires `item` and `row`. */
  rowList?: string;
  /** Zero-based row index inside `rowList`. */
  row?: number;
}

export interface Message {
  readonly severity: MessageSeverity;
  readonly id: string;
  readonly args: readonly string[];
  readonly item: string | null;
  readonly rowList: string | null;
  /** `-1` when the message does not refer to a row. */
  readonly row: number;
}

/**
 * Build a validated message.
 * @throws {MessageFormatError} On a blank id or an incomplete field reference
 */
export function createMessage(
  severity: MessageSeverity,
  id: string,
  options: MessageOptions = {},
): Message {
  const item = isBlank(options.item) ? null : (options.item ?? null);
  const rowList = isBlank(options.rowList) ? null : (options.rowList ?? null);
  const row = options.row ?? -1;

  if (isBlank(id)) {
    throw new MessageFormatError(id, 'Message id must not be blank');
  }
  if (row >= 0 && rowList === null) {
    throw new MessageFormatError(id, `Row ${row} given without a row list`);
  }
  if (rowList !== null && row < 0) {
    throw new MessageFormatError(id, `Row list "${rowList}" given without a valid row`);
  }
  if (rowList !== null && item === null) {
    throw new MessageFormatError(id, `Row list "${rowList}" given without an item`);
  }

  return Object.freeze({
    severity,
    id,
    args: Object.freeze([...(options.args ?? [])]),
    item,
    rowList,
    row,
  });
}

function identityOf(message: Message): string {
  return JSON.stringify([
    message.severity,
    message.id,
    message.args,
    message.item,
    message.rowList,
    message.row,
  ]);
}

/**
 * Resolve display text. A catalog entry has its placeholders filled and any
 * leftover `{n}` removed; without an entry the arguments are joined with `,`.
 */
export function formatMessageText(message: Message, catalog?: MessageCatalog): string {
  const template = catalog?.[message.id];
  if (template === undefined) {
    return message.args.join(',');
  }
  return template.replace(
    /\{(\d+)\}/g,
    (_placeholder, index: string) => message.args[Number(index)] ?? '',
  );
}

/** Insertion-ordered, de-duplicated message set. */
export class MessageList implements Iterable<Message> {
  private readonly byIdentity: Map<string, Message> = new Map();
  private errorSeen = false;

  get size(): number {
    return this.byIdentity.size;
  }

  /**
   * @returns false if an identical message was already held
   */
  add(message: Message): boolean {
    const identity = identityOf(message);
    if (this.byIdentity.has(identity)) {
      return false;
    }
    this.byIdentity.set(identity, message);
    if (message.severity === 'ERROR') {
      this.errorSeen = true;
    }
    return true;
  }

  addAll(messages: Iterable<Message>): void {
    for (const message of messages) {
      this.add(message);
    }
  }

  hasError(): boolean {
    return this.errorSeen;
  }

  clear(): void {
    this.byIdentity.clear();
    this.errorSeen = false;
  }

  toArray(): Message[] {
    return [...this.byIdentity.values()];
  }

  [Symbol.iterator](): Iterator<Message> {
    return this.byIdentity.values();
  }
}
