// ============================================================================
// @tabula/core — Public API
// ============================================================================

// Records
export { ScalarRecord, toScalarText } from './record/scalar_record.js';
export type { RecordEntry } from './record/scalar_record.js';
export { CompositeRecord } from './record/composite_record.js';
export { RowList } from './record/row_list.js';
export type { RowListPaging } from './record/row_list.js';
export { Grid } from './record/grid.js';
export { MessageList, createMessage, formatMessageText } from './record/messages.js';
export type { Message, MessageOptions } from './record/messages.js';

// Codecs
export {
  csvModeSchema,
  decodeCsv,
  encodeCsv,
  isMultilineMode,
  joinCsv,
  splitCsv,
} from './codec/csv.js';
export {
  MAX_JSON_DEPTH,
  RESERVED_JSON_KEYS,
  decodeJson,
  decodeJsonFlat,
  encodeJson,
} from './codec/json.js';
export type { JsonEncodeOptions } from './codec/json.js';
export { decodeUrlQuery, decodeUrlQueryFlat, encodeUrlQuery } from './codec/url.js';

// Row reader / writer
export { CsvRowReader, csvReaderOptionsSchema, linesOf } from './io/csv_reader.js';
export type { CsvReaderOptions, LineSource } from './io/csv_reader.js';
export { CsvRowWriter, csvWriterOptionsSchema } from './io/csv_writer.js';
export type { CsvWriterOptions, LineSink } from './io/csv_writer.js';

// Finders
export { SpanFinder } from './scan/finder.js';
export { SimpleFinder } from './scan/simple_finder.js';
export { CsvFinder, unquoteCsvField } from './scan/csv_finder.js';
export {
  JsonArrayFinder,
  JsonKeyValueFinder,
  JsonObjectFinder,
  splitJsonKeyValue,
} from './scan/json_finders.js';
export { isEscaped, isEscapedInBuffer, toCharBuffer, trimQuotedSpan } from './scan/position.js';

// Value helpers
export {
  formatDate,
  formatDecimal,
  formatTimestamp,
  isBlank,
  isDateText,
  isTrue,
  isValidKey,
  jsonEscape,
  jsonUnescape,
  parseDate,
  parseDecimal,
  parseInt32,
  parseLong,
  parseTimestamp,
  urlDecode,
  urlEncode,
  validateKey,
} from './values.js';

// Errors
export {
  TabulaError,
  KeyFormatError,
  DuplicateKeyError,
  NotFoundError,
  ValueFormatError,
  StructuralFormatError,
  ConsistencyError,
  ReadOnlyRecordError,
  MessageFormatError,
} from './errors.js';

// Configuration & logging
export {
  configure,
  getConfig,
  loadConfig,
  resetConfig,
  DEFAULT_SCAN_BUFFER_THRESHOLD,
} from './config.js';
export type { TabulaConfig } from './config.js';
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogEntry, LogCallback, LogLevel } from './logger.js';

// Types
export type {
  CalendarDate,
  CalendarTimestamp,
  CsvMode,
  EntryKind,
  MessageCatalog,
  MessageSeverity,
  ScalarInput,
  ScalarSource,
  ScalarValue,
  Span,
} from './types.js';
