// ============================================================================
// @tabula/core — CSV Finder (double-quote aware)
// ============================================================================
//
// Rules:
//   - a comma separates fields only outside double quotes
//   - \" is a literal quote and does not toggle quoting
//   - "" inside quotes is a literal quote and does not toggle quoting
//   - spaces around a field (outside its quotes) are dropped
//   - one layer of surrounding quotes is stripped from each field
//
// A line whose scan ends inside quotes reports hasUnclosedQuote(); the row
// reader then appends the next physical line with "\n" and scans again.
// ============================================================================

import type { Span } from '../types.js';
import { SpanFinder } from './finder.js';
import { DOUBLE_QUOTE, isEscaped, trimQuotedSpan } from './position.js';

const COMMA = 0x2c;
const SPACE = 0x20;

export class CsvFinder extends SpanFinder {
  private unclosed = false;

  protected findSpans(text: string): Span[] {
    const spans: Span[] = [];
    this.unclosed = false;
    if (text.trim().length === 0) {
      return spans;
    }

    let begin = 0;
    let end = 0;
    let inToken = false;
    let inQuote = false;

    for (let i = 0; i < text.length; i++) {
      const c = text.charCodeAt(i);

      if (c !== SPACE && c !== COMMA) {
        if (!inToken) {
          inToken = true;
          begin = i;
        }
        end = i + 1;
      }

      if (c === DOUBLE_QUOTE) {
        if (isEscaped(text, i)) {
          continue;
        }
        if (inQuote && i + 1 < text.length && text.charCodeAt(i + 1) === DOUBLE_QUOTE) {
          // "" inside quotes
          i++;
          end = i + 1;
          continue;
        }
        inQuote = !inQuote;
        continue;
      }
      if (inQuote) {
        continue;
      }

      if (c === COMMA) {
        spans.push(trimQuotedSpan(text, begin, end));
        begin = i + 1;
        end = begin;
        inToken = false;
      }
    }

    spans.push(trimQuotedSpan(text, begin, end));
    this.unclosed = inQuote;
    return spans;
  }

  /**
   * Whether the source ends inside an open double quote, meaning the record
   * continues on the next physical line.
   */
  hasUnclosedQuote(): boolean {
    this.spans();
    return this.unclosed;
  }
}

/** Collapse the `""` quote escape inside a CSV field. */
export function unquoteCsvField(field: string): string {
  return field.replaceAll('""', '"');
}
