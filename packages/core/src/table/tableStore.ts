/**
 * packages/core/src/table/tableStore.ts: Ordered row model for table views.
 *
 * The store carries an explicit cursor (`rewind` / `valid` / `current` /
 * `next`) for callers that walk it step by step. JS iteration goes through a
 * separate iterator and leaves the cursor where it is.
 */

import { FormworkError } from "../errors.js";

/** Read side of a table model. */
export interface TableModel<T> extends Iterable<T> {
  count(): number;
  getRows(): readonly T[];
}

// Rows are boxed so that `undefined` rows stay distinguishable from gaps.
type RowSlot<T> = Readonly<{ row: T }>;

export class TableStore<T> implements TableModel<T> {
  private slots: RowSlot<T>[] = [];
  private currentIndex = 0;

  constructor(rows?: Iterable<T>) {
    if (rows !== undefined) {
      for (const row of rows) this.add(row);
    }
  }

  count(): number {
    return this.slots.length;
  }

  /**
   * Row under the cursor.
   *
   * @throws FormworkError FW_NOT_FOUND when the cursor is past either end
   */
  current(): T {
    const slot = this.slots[this.currentIndex];
    if (slot === undefined) {
      throw new FormworkError("FW_NOT_FOUND", `No row at index ${this.currentIndex}.`, {
        key: String(this.currentIndex),
      });
    }
    return slot.row;
  }

  key(): number {
    return this.currentIndex;
  }

  next(): void {
    this.currentIndex++;
  }

  prev(): void {
    this.currentIndex--;
  }

  rewind(): void {
    this.currentIndex = 0;
  }

  valid(): boolean {
    return this.currentIndex >= 0 && this.currentIndex < this.slots.length;
  }

  add(row: T): void {
    this.slots.push({ row });
  }

  /** Prepend a row. The cursor moves with the row it was on. */
  addToStart(row: T): void {
    this.slots.unshift({ row });
    this.currentIndex++;
  }

  /** Same as `add`. */
  addRow(row: T): void {
    this.add(row);
  }

  getRowCount(): number {
    return this.slots.length;
  }

  getRows(): readonly T[] {
    return this.slots.map((slot) => slot.row);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const slot of this.slots) yield slot.row;
  }
}
