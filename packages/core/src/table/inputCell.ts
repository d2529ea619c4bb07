/**
 * packages/core/src/table/inputCell.ts: Per-row input widgets for a column.
 *
 * The cell holds one prototype widget. Each input row gets its own copy,
 * with `_<row>` appended to every id in the copied tree so rows submit under
 * distinct field names. Copies are parented to the cell so they find the
 * enclosing form and column.
 */

import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import { UIObject } from "../ui/uiObject.js";
import type { UIParent } from "../ui/uiParent.js";
import { Widget } from "../widgets/widget.js";

export class InputCell extends UIObject implements UIParent {
  readonly kind: string = "inputCell";

  private prototypeWidget: Widget | null = null;
  private clones = new Map<number, Widget>();

  constructor(widget?: Widget) {
    super();
    if (widget !== undefined) this.setWidget(widget);
  }

  /**
   * @throws FormworkError FW_CONSTRUCTION when a widget is already set
   */
  setWidget(widget: Widget): void {
    if (this.prototypeWidget !== null) {
      throw new FormworkError("FW_CONSTRUCTION", "Only one widget may be nested within an input cell.");
    }
    widget.parent = this;
    this.prototypeWidget = widget;
  }

  /**
   * @throws FormworkError FW_INVALID_CLASS for anything other than a Widget
   */
  addChild(child: UIObject): void {
    if (!(child instanceof Widget)) {
      throw new FormworkError("FW_INVALID_CLASS", "Only widgets may be nested within an input cell.", {
        value: child,
      });
    }
    this.setWidget(child);
  }

  getPrototypeWidget(): Widget {
    if (this.prototypeWidget === null) {
      throw new FormworkError("FW_CONSTRUCTION", "Input cell does not have a widget.");
    }
    return this.prototypeWidget;
  }

  init(): void {
    this.getPrototypeWidget().init();
  }

  /** The widget for `row`, copied from the prototype on first request. */
  getWidget(row: number): Widget {
    const existing = this.clones.get(row);
    if (existing !== undefined) return existing;

    const widget = this.getPrototypeWidget().copy(`_${row}`);
    widget.parent = this;
    widget.init();
    this.clones.set(row, widget);
    return widget;
  }

  /** Rows that have a widget copy, in creation order. */
  getRowIds(): readonly number[] {
    return [...this.clones.keys()];
  }

  process(row: number): void {
    this.getWidget(row).process();
  }

  display(row: number, out: HtmlWriter): void {
    if (!this.visible) return;
    this.getWidget(row).display(out);
  }

  getMessages(row: number): readonly Message[] {
    return this.getWidget(row).getMessages();
  }

  hasMessage(row: number): boolean {
    return this.getWidget(row).hasMessage();
  }

  /** The copy gets its own prototype and makes its own row widgets. */
  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.clones = new Map();
    if (this.prototypeWidget !== null) {
      const widget = this.prototypeWidget.copy(idSuffix);
      widget.parent = copy;
      copy.prototypeWidget = widget;
    }
    return copy;
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    if (this.prototypeWidget !== null) set.addEntrySet(this.prototypeWidget.getHtmlHeadEntrySet());
    return set;
  }

  override getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getAvailableHtmlHeadEntrySet();
    if (this.prototypeWidget !== null) {
      set.addEntrySet(this.prototypeWidget.getAvailableHtmlHeadEntrySet());
    }
    return set;
  }
}
