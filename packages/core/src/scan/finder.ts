// ============================================================================
// @tabula/core — Span Finder Contract
// ============================================================================
//
// A finder owns one source string and the ordered list of token spans in it.
// The list is computed on first use and cached; every later iteration reuses
// it. Subclasses only implement `findSpans`.
//
//   unparsed ──spans()/iterate──▶ computed (validated, frozen, cached)
//
// A span that falls outside the source is a scanner defect and surfaces as
// ConsistencyError rather than as a data error.
// ============================================================================

import { ConsistencyError } from '../errors.js';
import type { Span } from '../types.js';

export abstract class SpanFinder implements Iterable<string> {
  protected readonly text: string;
  private cached: readonly Span[] | null = null;

  /**
   * @param text - Source text; `null`/`undefined` behaves as a source with no tokens
   */
  constructor(text: string | null | undefined) {
    this.text = text ?? '';
    if (text === null || text === undefined) {
      this.cached = [];
    }
  }

  /**
   * Compute all token spans of `text`, in order.
   */
  protected abstract findSpans(text: string): Span[];

  /** The source text this finder scans. */
  get source(): string {
    return this.text;
  }

  /**
   * Ordered token spans, computed once.
   * @throws {ConsistencyError} If the scanner produced an out-of-bounds span
   */
  spans(): readonly Span[] {
    if (this.cached === null) {
      const found = this.findSpans(this.text);
      for (const span of found) {
        this.checkSpan(span);
      }
      this.cached = Object.freeze(found.map((s) => Object.freeze({ begin: s.begin, end: s.end })));
    }
    return this.cached;
  }

  /** Number of tokens. */
  get size(): number {
    return this.spans().length;
  }

  /** Token substrings as an array. */
  toArray(): string[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<string> {
    for (const span of this.spans()) {
      yield this.text.slice(span.begin, span.end);
    }
  }

  private checkSpan(span: Span): void {
    const { begin, end } = span;
    if (
      !Number.isInteger(begin) ||
      !Number.isInteger(end) ||
      begin < 0 ||
      begin > end ||
      end > this.text.length
    ) {
      const length = this.text.length;
      throw new ConsistencyError(
        `${this.constructor.name} produced invalid span [${begin}, ${end}) for text of length ${length}`,
      );
    }
  }
}
