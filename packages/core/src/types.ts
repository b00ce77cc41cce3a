// ============================================================================
// @tabula/core — Type Definitions
// ============================================================================
//
// Shared shapes for the scanner, the record containers and the codecs.
// ============================================================================

/** A stored scalar: text, or an explicit null. Absence is modelled by the key not existing. */
export type ScalarValue = string | null;

/** A half-open `[begin, end)` offset pair into a source string. */
export interface Span {
  begin: number;
  end: number;
}

/** Zone-less calendar date; canonical text `YYYYMMDD`. */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

/** Zone-less timestamp with microsecond precision; canonical text `YYYYMMDD'T'HHMMSSffffff`. */
export interface CalendarTimestamp extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
  /** 0-999999 */
  microsecond: number;
}

/** Anything `ScalarRecord.put` can turn into canonical text. */
export type ScalarInput =
  | string
  | number
  | bigint
  | boolean
  | CalendarDate
  | CalendarTimestamp
  | null;

/** Namespaces sharing one key space inside a composite record. */
export type EntryKind = 'scalar' | 'list' | 'record' | 'rows' | 'grid';

/**
 * CSV dialects.
 *
 * - `plain`: no quoting; line breaks in values collapse to a space
 * - `quoted`: every field quoted; line breaks collapse to a space
 * - `minimal`: quote only fields with comma, quote or line break; line breaks
 *   collapse to a space
 * - `quoted-multiline`: every field quoted; line breaks kept as LF
 * - `minimal-multiline`: minimal quoting; line breaks kept as LF
 */
export type CsvMode = 'plain' | 'quoted' | 'minimal' | 'quoted-multiline' | 'minimal-multiline';

/** Severity of a diagnostic message. */
export type MessageSeverity = 'ERROR' | 'WARN' | 'INFO';

/** Message id → template text with `{0}`, `{1}`… placeholders. */
export type MessageCatalog = Readonly<Record<string, string>>;

/** Plain-object source accepted by record constructors and `putAll`. */
export type ScalarSource =
  | Readonly<Record<string, ScalarValue>>
  | Iterable<readonly [string, ScalarValue]>;
