/**
 * packages/core/src/table/tableViewRow.ts: Extra rows written after the
 * model rows of a table view.
 */

import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import { UIObject } from "../ui/uiObject.js";
import type { Widget } from "../widgets/widget.js";
import type { InputCell } from "./inputCell.js";
import type { TableView } from "./tableView.js";

export abstract class TableViewRow extends UIObject {
  id: string | null;

  /** The table view this row belongs to; set when the row is added. */
  view: TableView | null = null;

  constructor(id: string | null = null) {
    super();
    this.id = id;
  }

  init(): void {}

  process(): void {}

  abstract display(out: HtmlWriter): void;

  getMessages(): readonly Message[] {
    return [];
  }

  hasMessage(): boolean {
    return false;
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    if (idSuffix !== "" && copy.id !== null) copy.id = `${copy.id}${idSuffix}`;
    copy.view = null;
    return copy;
  }
}

/**
 * Rows of input widgets. Each column with an input cell contributes one
 * widget per row; columns without one get an empty cell.
 */
export class TableViewInputRow extends TableViewRow {
  readonly kind: string = "tableViewInputRow";

  /** Number of input rows displayed and processed. */
  numberOfRows = 1;

  private inputCells = new Map<string, InputCell>();

  /**
   * Register the input cell of the column `columnId`. Called by columns
   * during init.
   *
   * @throws FormworkError FW_DUPLICATE_ID when the column already has a cell
   */
  addInputCell(cell: InputCell, columnId: string): void {
    const existing = this.inputCells.get(columnId);
    if (existing === cell) return;
    if (existing !== undefined) {
      throw new FormworkError(
        "FW_DUPLICATE_ID",
        `An input cell for the column '${columnId}' already exists in this row.`,
        { key: columnId },
      );
    }
    this.inputCells.set(columnId, cell);
  }

  /**
   * @throws FormworkError FW_NOT_FOUND when no cell is registered for `columnId`
   */
  getInputCell(columnId: string): InputCell {
    const cell = this.inputCells.get(columnId);
    if (cell === undefined) {
      throw new FormworkError(
        "FW_NOT_FOUND",
        `The column '${columnId}' does not have an input cell.`,
        { key: columnId },
      );
    }
    return cell;
  }

  hasInputCell(columnId: string): boolean {
    return this.inputCells.has(columnId);
  }

  /** Widget of column `columnId` for input row `row`. */
  getWidget(columnId: string, row: number): Widget {
    return this.getInputCell(columnId).getWidget(row);
  }

  override init(): void {
    for (const cell of this.inputCells.values()) {
      cell.init();
    }
  }

  override process(): void {
    for (let row = 0; row < this.numberOfRows; row++) {
      for (const cell of this.inputCells.values()) {
        cell.process(row);
      }
    }
  }

  display(out: HtmlWriter): void {
    if (!this.visible || this.view === null) return;
    const columns = this.view.getVisibleColumns();

    for (let row = 0; row < this.numberOfRows; row++) {
      const tr = new HtmlTag("tr", { id: this.id === null ? null : `${this.id}_${row}`, class: this.getCSSClassString() });
      tr.open(out);
      for (const column of columns) {
        const td = new HtmlTag("td", column.getTdAttributes());
        td.open(out);
        const columnId = column.id;
        if (columnId !== null && this.inputCells.has(columnId)) {
          this.getInputCell(columnId).display(row, out);
        } else {
          out.write("&nbsp;");
        }
        td.close(out);
      }
      tr.close(out);
    }
  }

  override getMessages(): readonly Message[] {
    const messages: Message[] = [];
    for (const cell of this.inputCells.values()) {
      for (const row of cell.getRowIds()) {
        messages.push(...cell.getMessages(row));
      }
    }
    return messages;
  }

  override hasMessage(): boolean {
    for (const cell of this.inputCells.values()) {
      for (const row of cell.getRowIds()) {
        if (cell.hasMessage(row)) return true;
      }
    }
    return false;
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    for (const cell of this.inputCells.values()) {
      set.addEntrySet(cell.getHtmlHeadEntrySet());
    }
    return set;
  }

  /** Cells are registered again when the copied columns initialize. */
  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.inputCells = new Map();
    return copy;
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-table-view-input-row", ...super.getCSSClassNames()];
  }
}
