/**
 * packages/core/src/table/tableViewColumn.ts: One column of a table view.
 *
 * A column owns an ordered set of cell renderers and at most one input cell.
 * For each row it applies the row's mappings to the renderers and writes
 * their output, separated by single spaces, inside one `<td>`.
 *
 * Cell classes compose in a fixed order that stylesheets depend on:
 *   1. the column id with underscores as dashes (only for ids set by hand)
 *   2. base classes of the column type
 *   3. user classes
 *   4. from the first renderer: inheritance classes, base classes,
 *      data-specific classes (only once mappings were applied) and user classes
 */

import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import { idToClassName, minimizeEntities } from "../html/escape.js";
import { HtmlTag, type HtmlAttributes } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import { UIObject, ofType } from "../ui/uiObject.js";
import type { UIParent } from "../ui/uiParent.js";
import { CellRenderer } from "./cellRenderer.js";
import { CellRendererSet, type CellRendererMapping } from "./cellRendererSet.js";
import { InputCell } from "./inputCell.js";
import type { TableView } from "./tableView.js";
import { TableViewInputRow } from "./tableViewRow.js";

export class TableViewColumn extends UIObject implements UIParent {
  readonly kind: string = "tableViewColumn";

  id: string | null;
  title = "";
  abbreviatedTitle: string | null = null;

  /** The table view this column belongs to; set when the column is added. */
  view: TableView | null = null;

  protected renderers = new CellRendererSet();
  protected inputCell: InputCell | null = null;
  private hasAutoId = false;

  constructor(id: string | null = null, title = "") {
    super();
    this.id = id;
    this.title = title;
  }

  addRenderer(renderer: CellRenderer, mappings: readonly CellRendererMapping[] = []): void {
    this.renderers.addRendererWithMappings(renderer, mappings);
    renderer.parent = this;
  }

  addMappingToRenderer(renderer: CellRenderer, field: string, property: string): void {
    this.renderers.addMappingToRenderer(renderer, field, property);
  }

  getRenderers(): readonly CellRenderer[] {
    return this.renderers.getRenderers();
  }

  getRendererSet(): CellRendererSet {
    return this.renderers;
  }

  /**
   * @throws FormworkError FW_NOT_FOUND when no renderer has `id`
   */
  getRenderer(id: string): CellRenderer {
    const renderer = this.renderers.getRenderer(id);
    if (renderer === null) {
      throw new FormworkError("FW_NOT_FOUND", `Cell renderer with an id of '${id}' not found.`, { key: id });
    }
    return renderer;
  }

  /**
   * Initialize renderers, assign an id when none was set, and register the
   * input cell with the view's input row.
   *
   * @throws FormworkError FW_CONSTRUCTION when the column has an input cell
   *   and the view has no input row
   */
  init(): void {
    for (const renderer of this.renderers) {
      renderer.init();
    }

    if (this.id === null) {
      this.id = this.getUniqueId();
      this.hasAutoId = true;
    }

    if (this.inputCell !== null) {
      const inputRow = this.view?.getFirstRow(ofType(TableViewInputRow)) ?? null;
      if (inputRow === null) {
        throw new FormworkError("FW_CONSTRUCTION", "Table-view does not have an input row.");
      }
      inputRow.addInputCell(this.inputCell, this.id);
    }
  }

  process(): void {
    for (const renderer of this.renderers) {
      renderer.process();
    }
  }

  hasHeader(): boolean {
    return this.visible && this.title.length > 0;
  }

  displayHeaderCell(out: HtmlWriter): void {
    if (!this.visible) return;

    const th = new HtmlTag("th", this.getThAttributes());
    th.setAttribute("scope", "col");
    th.open(out);
    this.displayHeader(out);
    th.close(out);
  }

  displayHeader(out: HtmlWriter): void {
    const title = this.title.length === 0 ? "&nbsp;" : this.title;

    if (this.abbreviatedTitle === null) {
      out.write(minimizeEntities(title));
    } else {
      new HtmlTag("abbr", { title }).setContent(this.abbreviatedTitle).display(out);
    }
  }

  /**
   * Write the cell for `row`.
   *
   * @throws FormworkError FW_CONSTRUCTION when the column has no renderers
   */
  display(row: object, out: HtmlWriter): void {
    if (!this.visible) return;
    this.setupRenderers(row);
    this.displayRenderers(row, out);
  }

  getMessages(row: object): readonly Message[] {
    for (const renderer of this.renderers) {
      this.renderers.applyMappingsToRenderer(renderer, row);
    }
    const messages: Message[] = [];
    for (const renderer of this.renderers) {
      messages.push(...renderer.getMessages());
    }
    return messages;
  }

  hasMessage(row: object): boolean {
    for (const renderer of this.renderers) {
      this.renderers.applyMappingsToRenderer(renderer, row);
    }
    for (const renderer of this.renderers) {
      if (renderer.hasMessage()) return true;
    }
    return false;
  }

  setInputCell(cell: InputCell): void {
    this.inputCell = cell;
    cell.parent = this;
  }

  getInputCell(): InputCell | null {
    return this.inputCell;
  }

  /**
   * Renderers are appended; an input cell is accepted once.
   *
   * @throws FormworkError FW_CONSTRUCTION for a second input cell
   * @throws FormworkError FW_INVALID_CLASS for any other kind of child
   */
  addChild(child: UIObject): void {
    if (child instanceof CellRenderer) {
      this.addRenderer(child);
    } else if (child instanceof InputCell) {
      if (this.inputCell !== null) {
        throw new FormworkError("FW_CONSTRUCTION", "Only one input cell may be added to a table-view column.");
      }
      this.setInputCell(child);
    } else {
      throw new FormworkError(
        "FW_INVALID_CLASS",
        "Only cell renderers and input cells may be nested within table-view columns.",
        { value: child },
      );
    }
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    for (const renderer of this.renderers) {
      set.addEntrySet(renderer.getHtmlHeadEntrySet());
    }
    if (this.inputCell !== null) set.addEntrySet(this.inputCell.getHtmlHeadEntrySet());
    return set;
  }

  override getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getAvailableHtmlHeadEntrySet();
    for (const renderer of this.renderers) {
      set.addEntrySet(renderer.getAvailableHtmlHeadEntrySet());
    }
    if (this.inputCell !== null) set.addEntrySet(this.inputCell.getAvailableHtmlHeadEntrySet());
    return set;
  }

  getTdAttributes(): HtmlAttributes {
    return { class: this.getCSSClassString() };
  }

  getThAttributes(): HtmlAttributes {
    return { class: this.getCSSClassString() };
  }

  /** Extra attributes for the row element; none by default. */
  getTrAttributes(_row: object): HtmlAttributes {
    return {};
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    if (idSuffix !== "" && copy.id !== null && !this.hasAutoId) copy.id = `${copy.id}${idSuffix}`;
    copy.view = null;
    copy.renderers = this.renderers.copy(idSuffix);
    for (const renderer of copy.renderers) renderer.parent = copy;
    copy.inputCell = null;
    if (this.inputCell !== null) copy.setInputCell(this.inputCell.copy(idSuffix));
    return copy;
  }

  protected setupRenderers(row: object): void {
    if (this.renderers.getCount() === 0) {
      throw new FormworkError("FW_CONSTRUCTION", "No renderer has been provided for this column.");
    }

    const sensitive = this.view?.isSensitive() ?? true;
    for (const renderer of this.renderers) {
      this.renderers.applyMappingsToRenderer(renderer, row);
      renderer.sensitive = renderer.sensitive && sensitive;
    }
  }

  protected displayRenderers(row: object, out: HtmlWriter): void {
    const td = new HtmlTag("td", this.getTdAttributes());
    td.open(out);
    this.displayRenderersInternal(row, out);
    td.close(out);
  }

  protected displayRenderersInternal(_row: object, out: HtmlWriter): void {
    let first = true;
    for (const renderer of this.renderers) {
      if (first) {
        first = false;
      } else {
        out.write(" ");
      }
      renderer.render(out);
    }
  }

  protected override getCSSClassNames(): readonly string[] {
    const classes: string[] = [];

    if (this.id !== null && !this.hasAutoId) {
      classes.push(idToClassName(this.id));
    }

    classes.push(...this.getBaseCSSClassNames());
    classes.push(...this.classes);

    const firstRenderer = this.renderers.getFirst();
    if (firstRenderer !== null) {
      classes.push(...firstRenderer.getInheritanceCSSClassNames());
      classes.push(...firstRenderer.getBaseCSSClassNames());
      if (this.renderers.mappingsApplied()) {
        classes.push(...firstRenderer.getDataSpecificCSSClassNames());
      }
      classes.push(...firstRenderer.classes);
    }

    return classes;
  }

  protected getBaseCSSClassNames(): readonly string[] {
    return [];
  }
}
