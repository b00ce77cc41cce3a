// ============================================================================
// @tabula/core — Error Types
// ============================================================================

/**
 * Base error class for all Tabula errors.
 */
export class TabulaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TabulaError';
  }
}

// ---------------------------------------------------------------------------
// Key Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a key contains characters outside `[a-z0-9_.-]` or is blank.
 */
export class KeyFormatError extends TabulaError {
  public readonly key: string;

  constructor(key: string) {
    super(
      `Invalid key "${key}". Only lowercase letters, digits, underscores, hyphens and dots are allowed.`,
    );
    this.name = 'KeyFormatError';
    this.key = key;
  }
}

/**
 * Thrown when an unforced write hits a key that already exists,
 * or when any write hits a key owned by another namespace.
 */
export class DuplicateKeyError extends TabulaError {
  public readonly key: string;
  public readonly existingKind: string;

  constructor(key: string, existingKind: string) {
    super(`Key "${key}" already exists as ${existingKind}.`);
    this.name = 'DuplicateKeyError';
    this.key = key;
    this.existingKind = existingKind;
  }
}

/**
 * Thrown when a key is read without a default and does not exist.
 */
export class NotFoundError extends TabulaError {
  public readonly key: string;
  public readonly kind: string;

  constructor(key: string, kind: string) {
    super(`Key "${key}" does not exist as ${kind}.`);
    this.name = 'NotFoundError';
    this.key = key;
    this.kind = kind;
  }
}

// ---------------------------------------------------------------------------
// Value & Format Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a stored or decoded value cannot be converted to the
 * requested type (number, date, timestamp, percent-escape).
 */
export class ValueFormatError extends TabulaError {
  public readonly key: string;
  public readonly value: string;
  public readonly reason: string;

  constructor(key: string, value: string, reason: string) {
    super(`Invalid ${reason} for key "${key}": "${value}"`);
    this.name = 'ValueFormatError';
    this.key = key;
    this.value = value;
    this.reason = reason;
  }
}

/**
 * Thrown when serialized text has the wrong shape: missing brackets,
 * nesting deeper than supported, or conflicting key kinds.
 */
export class StructuralFormatError extends TabulaError {
  public readonly excerpt: string;

  constructor(message: string, source = '') {
    const excerpt = source.length > 80 ? `${source.slice(0, 80)}...` : source;
    super(excerpt ? `${message} (near: ${excerpt})` : message);
    this.name = 'StructuralFormatError';
    this.excerpt = excerpt;
  }
}

/**
 * Thrown when a finder produces a span outside its source text.
 * Signals a defect in the scanner, not bad input.
 */
export class ConsistencyError extends TabulaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConsistencyError';
  }
}

// ---------------------------------------------------------------------------
// Record Errors
// ---------------------------------------------------------------------------

/**
 * Thrown on any write to a record produced by `freeze()`.
 */
export class ReadOnlyRecordError extends TabulaError {
  constructor(operation: string) {
    super(`Record is read-only; "${operation}" is not allowed.`);
    this.name = 'ReadOnlyRecordError';
  }
}

/**
 * Thrown when a diagnostic message has an incomplete field reference.
 */
export class MessageFormatError extends TabulaError {
  public readonly messageId: string;

  constructor(messageId: string, message: string) {
    super(`${message} (message id: "${messageId}")`);
    this.name = 'MessageFormatError';
    this.messageId = messageId;
  }
}
