/**
 * packages/core/src/table/tableView.ts: Widget that displays a table model.
 *
 * Output:
 *   <table class="formwork-table-view" id="…">
 *     <thead><tr><th scope="col">…</th>…</tr></thead>   (when a column has a title)
 *     <tbody>
 *       <tr><td>…</td>…</tr>                           (one per model row)
 *       …extra rows (input rows)…
 *     </tbody>
 *   </table>
 */

import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import type { UIObject, UiMatcher } from "../ui/uiObject.js";
import type { UIParent } from "../ui/uiParent.js";
import { Widget } from "../widgets/widget.js";
import type { TableModel } from "./tableStore.js";
import { TableViewColumn } from "./tableViewColumn.js";
import { TableViewRow } from "./tableViewRow.js";

export class TableView<T extends object = object> extends Widget implements UIParent {
  readonly kind: string = "tableView";

  model: TableModel<T> | null = null;

  protected columns: TableViewColumn[] = [];
  protected extraRows: TableViewRow[] = [];

  constructor(id: string | null = null) {
    super(id);
    this.requiresId = true;
  }

  /**
   * @throws FormworkError FW_DUPLICATE_ID when a column with the same id exists
   * @throws FormworkError FW_CONSTRUCTION when the column belongs to another view
   */
  appendColumn(column: TableViewColumn): void {
    if (column.parent !== null) {
      throw new FormworkError("FW_CONSTRUCTION", "Cannot add a column that already has a parent.");
    }
    const id = column.id;
    if (id !== null && this.hasColumn(id)) {
      throw new FormworkError(
        "FW_DUPLICATE_ID",
        `A column with the id '${id}' already exists in this table view.`,
        { key: id },
      );
    }
    this.columns.push(column);
    column.parent = this;
    column.view = this;
  }

  appendRow(row: TableViewRow): void {
    if (row.parent !== null) {
      throw new FormworkError("FW_CONSTRUCTION", "Cannot add a row that already has a parent.");
    }
    this.extraRows.push(row);
    row.parent = this;
    row.view = this;
  }

  hasColumn(id: string): boolean {
    return this.columns.some((column) => column.id === id);
  }

  /**
   * @throws FormworkError FW_NOT_FOUND when no column has `id`
   */
  getColumn(id: string): TableViewColumn {
    const column = this.columns.find((c) => c.id === id);
    if (column === undefined) {
      throw new FormworkError("FW_NOT_FOUND", `Column with an id of '${id}' not found.`, { key: id });
    }
    return column;
  }

  getColumns(): readonly TableViewColumn[] {
    return this.columns.slice();
  }

  getVisibleColumns(): readonly TableViewColumn[] {
    return this.columns.filter((column) => column.visible);
  }

  getColumnCount(): number {
    return this.columns.length;
  }

  getRows(): readonly TableViewRow[] {
    return this.extraRows.slice();
  }

  getFirstRow<R extends TableViewRow>(match: UiMatcher<R>): R | null {
    for (const row of this.extraRows) {
      if (match(row)) return row;
    }
    return null;
  }

  /**
   * Columns and rows are accepted.
   *
   * @throws FormworkError FW_INVALID_CLASS for any other kind of child
   */
  addChild(child: UIObject): void {
    if (child instanceof TableViewColumn) {
      this.appendColumn(child);
    } else if (child instanceof TableViewRow) {
      this.appendRow(child);
    } else {
      throw new FormworkError(
        "FW_INVALID_CLASS",
        "Only table-view columns and rows may be nested within table views.",
        { value: child },
      );
    }
  }

  /** Columns first: they register their input cells with the input row. */
  override init(): void {
    super.init();
    for (const column of this.columns) column.init();
    for (const row of this.extraRows) row.init();
  }

  override process(): void {
    super.process();
    for (const column of this.columns) column.process();
    for (const row of this.extraRows) row.process();
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);

    const table = new HtmlTag("table", { id: this.id, class: this.getCSSClassString() });
    this.applyDataAttributes(table);
    table.open(out);

    if (this.hasHeader()) this.displayHeader(out);

    out.write("<tbody>");
    this.displayBody(out);
    for (const row of this.extraRows) row.display(out);
    out.write("</tbody>");

    table.close(out);
  }

  hasHeader(): boolean {
    return this.columns.some((column) => column.hasHeader());
  }

  override getMessages(): readonly Message[] {
    const messages = [...super.getMessages()];
    if (this.model !== null) {
      for (const row of this.model) {
        for (const column of this.columns) messages.push(...column.getMessages(row));
      }
    }
    for (const row of this.extraRows) messages.push(...row.getMessages());
    return messages;
  }

  override hasMessage(): boolean {
    if (super.hasMessage()) return true;
    if (this.model !== null) {
      for (const row of this.model) {
        if (this.columns.some((column) => column.hasMessage(row))) return true;
      }
    }
    return this.extraRows.some((row) => row.hasMessage());
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    for (const column of this.columns) set.addEntrySet(column.getHtmlHeadEntrySet());
    for (const row of this.extraRows) set.addEntrySet(row.getHtmlHeadEntrySet());
    return set;
  }

  override getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getAvailableHtmlHeadEntrySet();
    for (const column of this.columns) set.addEntrySet(column.getAvailableHtmlHeadEntrySet());
    for (const row of this.extraRows) set.addEntrySet(row.getAvailableHtmlHeadEntrySet());
    return set;
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.columns = [];
    copy.extraRows = [];
    for (const column of this.columns) copy.appendColumn(column.copy(idSuffix));
    for (const row of this.extraRows) copy.appendRow(row.copy(idSuffix));
    return copy;
  }

  protected displayHeader(out: HtmlWriter): void {
    out.write("<thead><tr>");
    for (const column of this.columns) column.displayHeaderCell(out);
    out.write("</tr></thead>");
  }

  protected displayBody(out: HtmlWriter): void {
    if (this.model === null) return;

    let count = 0;
    for (const row of this.model) {
      const tr = new HtmlTag("tr", { class: count % 2 === 1 ? "odd" : null });
      for (const column of this.columns) {
        for (const [name, value] of Object.entries(column.getTrAttributes(row))) {
          tr.setAttribute(name, value);
        }
      }
      tr.open(out);
      for (const column of this.columns) column.display(row, out);
      tr.close(out);
      count++;
    }
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-table-view", ...super.getCSSClassNames()];
  }

  override describeTree(depth: number): string[] {
    const lines = super.describeTree(depth);
    const indent = "  ".repeat(depth + 1);
    for (const column of this.columns) {
      lines.push(`${indent}${column.kind}${column.id === null ? "" : `#${column.id}`}`);
    }
    return lines;
  }
}
