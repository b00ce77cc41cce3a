import { ConsistencyError } from '../errors.js';
import type { Span } from '../types.js';
import { SpanFinder } from './finder.js';

/**
 * Splits on a literal delimiter, ignoring quotes entirely.
 *
 * Consecutive delimiters yield empty tokens, and an empty source yields a
 * single empty token. Used for unquoted CSV and for `&`-separated URL
 * parameters.
 *
 * @example
 * ```ts
 * new SimpleFinder('a,,b', ',').toArray(); // ['a', '', 'b']
 * new SimpleFinder('x::y', '::').toArray(); // ['x', 'y']
 * ```
 */
export class SimpleFinder extends SpanFinder {
  private readonly delimiter: string;

  constructor(text: string | null | undefined, delimiter: string) {
    super(text);
    if (delimiter.length === 0) {
      throw new ConsistencyError('SimpleFinder delimiter must not be empty');
    }
    this.delimiter = delimiter;
  }

  protected findSpans(text: string): Span[] {
    const spans: Span[] = [];
    const step = this.delimiter.length;
    let begin = 0;
    let end = text.indexOf(this.delimiter, begin);

    while (end !== -1) {
      spans.push({ begin, end });
      begin = end + step;
      end = text.indexOf(this.delimiter, begin);
    }

    spans.push({ begin, end: text.length });
    return spans;
  }
}
