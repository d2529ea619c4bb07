/**
 * packages/core/src/widgets/container.ts: Widget with public child widgets.
 *
 * Children are kept in display order and each child's parent is the
 * container. Lifecycle calls run the base Widget behaviour first, then recurse
 * over the children in order.
 */

import { warnDev } from "../debug/trace.js";
import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import type { UIObject, UiMatcher } from "../ui/uiObject.js";
import type { UIParent } from "../ui/uiParent.js";
import { Widget } from "./widget.js";

export class Container extends Widget implements UIParent {
  readonly kind: string = "container";

  protected children: Widget[] = [];

  /** Append `widget`. Same as `packEnd`. */
  add(widget: Widget): void {
    this.packEnd(widget);
  }

  packEnd(widget: Widget): void {
    this.adopt(widget);
    this.children.push(widget);
  }

  packStart(widget: Widget): void {
    this.adopt(widget);
    this.children.unshift(widget);
  }

  /**
   * Insert `widget` before `reference`.
   *
   * @throws FormworkError FW_NOT_FOUND when `reference` is not a child
   */
  insertBefore(widget: Widget, reference: Widget): void {
    const index = this.indexOfChild(reference);
    this.adopt(widget);
    this.children.splice(index, 0, widget);
  }

  /**
   * Remove `widget` from this container and clear its parent.
   *
   * @throws FormworkError FW_NOT_FOUND when `widget` is not a child
   */
  remove(widget: Widget): Widget {
    const index = this.indexOfChild(widget);
    this.children.splice(index, 1);
    widget.parent = null;
    return widget;
  }

  /**
   * Put `replacement` where `widget` is. The removed widget loses its parent.
   *
   * @throws FormworkError FW_NOT_FOUND when `widget` is not a child
   */
  replace(widget: Widget, replacement: Widget): Widget {
    const index = this.indexOfChild(widget);
    this.adopt(replacement);
    this.children[index] = replacement;
    widget.parent = null;
    return widget;
  }

  /**
   * Add a child of unknown type. Containers accept widgets only.
   *
   * @throws FormworkError FW_INVALID_CLASS for anything other than a Widget
   */
  addChild(child: UIObject): void {
    if (child instanceof Widget) {
      this.add(child);
      return;
    }
    throw new FormworkError(
      "FW_INVALID_CLASS",
      `Only widgets may be nested within a ${this.kind}; got '${child.kind}'.`,
      { value: child },
    );
  }

  getChildren(): readonly Widget[];
  getChildren<T extends Widget>(match: UiMatcher<T>): readonly T[];
  getChildren<T extends Widget>(match?: UiMatcher<T>): readonly (Widget | T)[] {
    if (match === undefined) return this.children.slice();
    return this.children.filter(match);
  }

  getFirst(): Widget | null {
    return this.children[0] ?? null;
  }

  /**
   * Every widget below this container, depth first, optionally narrowed by
   * `match`. Composite widgets are private and are not included.
   */
  getDescendants(): readonly Widget[];
  getDescendants<T extends Widget>(match: UiMatcher<T>): readonly T[];
  getDescendants<T extends Widget>(match?: UiMatcher<T>): readonly (Widget | T)[] {
    const out: Widget[] = [];
    const visit = (container: Container): void => {
      for (const child of container.children) {
        if (match === undefined || match(child)) out.push(child);
        if (child instanceof Container) visit(child);
      }
    };
    visit(this);
    return out;
  }

  getFirstDescendant<T extends Widget>(match: UiMatcher<T>): T | null {
    for (const child of this.children) {
      if (match(child)) return child;
      if (child instanceof Container) {
        const found = child.getFirstDescendant(match);
        if (found !== null) return found;
      }
    }
    return null;
  }

  getDescendantById(id: string): Widget | null {
    return this.getFirstDescendant((w: UIObject): w is Widget => w instanceof Widget && w.id === id);
  }

  override init(): void {
    super.init();
    for (const child of this.children) {
      child.init();
    }
  }

  override process(): void {
    super.process();
    this.processChildren();
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);
    this.displayChildren(out);
  }

  override getMessages(): readonly Message[] {
    const messages = [...super.getMessages()];
    for (const child of this.children) {
      messages.push(...child.getMessages());
    }
    return messages;
  }

  override hasMessage(): boolean {
    if (super.hasMessage()) return true;
    return this.children.some((child) => child.hasMessage());
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    for (const child of this.children) {
      set.addEntrySet(child.getHtmlHeadEntrySet());
    }
    return set;
  }

  override getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getAvailableHtmlHeadEntrySet();
    for (const child of this.children) {
      set.addEntrySet(child.getAvailableHtmlHeadEntrySet());
    }
    return set;
  }

  override getFocusableHtmlId(): string | null {
    for (const child of this.children) {
      const id = child.getFocusableHtmlId();
      if (id !== null) return id;
    }
    return null;
  }

  /** Deep copy: every child is copied with the same suffix. */
  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.children = this.children.map((child) => {
      const childCopy = child.copy(idSuffix);
      childCopy.parent = copy;
      return childCopy;
    });
    return copy;
  }

  protected processChildren(): void {
    for (const child of this.children) {
      if (!child.isProcessed()) child.process();
    }
  }

  protected displayChildren(out: HtmlWriter): void {
    for (const child of this.children) {
      child.display(out);
    }
  }

  override describeTree(depth: number): string[] {
    const lines = super.describeTree(depth);
    for (const child of this.children) {
      lines.push(...child.describeTree(depth + 1));
    }
    return lines;
  }

  private adopt(widget: Widget): void {
    if (widget.parent !== null) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        `Cannot add a ${widget.kind} that already has a parent to a ${this.kind}.`,
      );
    }
    if (widget.id !== null && this.getDescendantById(widget.id) !== null) {
      warnDev(`[formwork] duplicate widget id "${widget.id}" added to ${this.kind}.`);
    }
    widget.parent = this;
  }

  private indexOfChild(widget: Widget): number {
    const index = this.children.indexOf(widget);
    if (index < 0) {
      throw new FormworkError(
        "FW_NOT_FOUND",
        `The ${widget.kind} is not a child of this ${this.kind}.`,
        widget.id === null ? undefined : { key: widget.id },
      );
    }
    return index;
  }
}

/**
 * Replace `widget` in its parent container with `container` and move
 * `widget` into it. Returns the container.
 *
 * @throws FormworkError FW_CONSTRUCTION when `widget` has no parent container
 */
export function replaceWithContainer<C extends Container>(widget: Widget, container: C): C;
export function replaceWithContainer(widget: Widget): Container;
export function replaceWithContainer(widget: Widget, container?: Container): Container {
  const parent = widget.parent;
  if (!(parent instanceof Container)) {
    throw new FormworkError(
      "FW_CONSTRUCTION",
      "Widget does not have a parent container, unable to replace this widget with a container.",
    );
  }
  const wrapper = container ?? new Container();
  parent.replace(widget, wrapper);
  wrapper.add(widget);
  return wrapper;
}
