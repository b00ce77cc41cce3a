import type { ScalarSource } from '../types.js';
import { ScalarRecord } from './scalar_record.js';

/** Paging window a row list was cut from. `-1` means unknown. */
export interface RowListPaging {
  beginRowNo: number;
  endRowNo: number;
  /** More rows matched than the list holds. */
  limitOver: boolean;
}

/**
 * Ordered rows of scalar records, plus the paging window they came from.
 *
 * Rows are copied on the way in. `get()` returns the stored row, so a caller
 * may fill it in place; `copy()` detaches the whole list.
 *
 * @example
 * ```ts
 * const rows = new RowList([{ id: '1' }, { id: '2' }], { endRowNo: 2 });
 * rows.size;                   // 2
 * rows.get(1).getInt('id');    // 2
 * ```
 */
export class RowList implements Iterable<ScalarRecord> {
  public beginRowNo = -1;
  public endRowNo = -1;
  public limitOver = false;

  private readonly rows: ScalarRecord[] = [];

  constructor(
    rows: Iterable<ScalarRecord | ScalarSource> = [],
    paging: Partial<RowListPaging> = {},
  ) {
    for (const row of rows) {
      this.add(row);
    }
    this.setPaging(paging);
  }

  get size(): number {
    return this.rows.length;
  }

  get paging(): RowListPaging {
    return { beginRowNo: this.beginRowNo, endRowNo: this.endRowNo, limitOver: this.limitOver };
  }

  setPaging(paging: Partial<RowListPaging>): void {
    this.beginRowNo = paging.beginRowNo ?? this.beginRowNo;
    this.endRowNo = paging.endRowNo ?? this.endRowNo;
    this.limitOver = paging.limitOver ?? this.limitOver;
  }

  /** Append a copy of `row`. */
  add(row: ScalarRecord | ScalarSource): void {
    this.rows.push(new ScalarRecord(row));
  }

  /**
   * @throws {RangeError} If `index` is out of bounds
   */
  get(index: number): ScalarRecord {
    const row = this.rows[index];
    if (row === undefined) {
      throw new RangeError(`Row index ${index} out of bounds (size ${this.rows.length})`);
    }
    return row;
  }

  /** Deep copy, paging included. */
  copy(): RowList {
    return new RowList(this.rows, this.paging);
  }

  [Symbol.iterator](): Iterator<ScalarRecord> {
    return this.rows[Symbol.iterator]();
  }
}
