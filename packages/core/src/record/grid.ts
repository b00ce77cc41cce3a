import type { ScalarValue } from '../types.js';

/**
 * Ordered rows of scalar cells. Rows may differ in length.
 *
 * @example
 * ```ts
 * const grid = new Grid([['a', 'b'], ['c', null]]);
 * grid.get(1); // ['c', null]
 * ```
 */
export class Grid implements Iterable<ScalarValue[]> {
  private readonly rows: ScalarValue[][] = [];

  constructor(rows: Iterable<readonly ScalarValue[]> = []) {
    for (const row of rows) {
      this.add(row);
    }
  }

  get size(): number {
    return this.rows.length;
  }

  /** Append a copy of `row`. */
  add(row: readonly ScalarValue[]): void {
    this.rows.push([...row]);
  }

  /**
   * @throws {RangeError} If `index` is out of bounds
   */
  get(index: number): ScalarValue[] {
    const row = this.rows[index];
    if (row === undefined) {
      throw new RangeError(`Grid row ${index} out of bounds (size ${this.rows.length})`);
    }
    return row;
  }

  copy(): Grid {
    return new Grid(this.rows);
  }

  /** Rows as nested arrays (copied). */
  toArray(): ScalarValue[][] {
    return this.rows.map((row) => [...row]);
  }

  [Symbol.iterator](): Iterator<ScalarValue[]> {
    return this.rows[Symbol.iterator]();
  }
}
