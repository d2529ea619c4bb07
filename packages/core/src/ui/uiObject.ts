/**
 * packages/core/src/ui/uiObject.ts: Base of every node in a UI tree.
 *
 * Why: Widgets, table columns, cell renderers and input cells all share the
 * same small surface: a non-owning parent link, a visibility flag that is
 * AND-ed up the parent chain, user CSS classes and data attributes, and a set
 * of page-level resources (head entries) the node needs when it is shown.
 *
 * Ancestor lookups take typed matchers rather than class names:
 *
 *   const form = widget.getFirstAncestor(ofType(Form));
 */

import { FormworkError } from "../errors.js";
import {
  commentEntry,
  externalJavaScriptEntry,
  inlineScriptEntry,
  javaScriptEntry,
  styleSheetEntry,
} from "../head/entries.js";
import { HtmlHeadEntrySet } from "../head/entrySet.js";
import type { HtmlTag } from "../html/tag.js";
import { nextUniqueId } from "./uniqueId.js";

/** A concrete or abstract UI object class, usable with `instanceof`. */
export type UiObjectClass<T extends UIObject> = abstract new (...args: never[]) => T;

/** Typed predicate over UI objects, used for ancestor and child lookups. */
export type UiMatcher<T extends UIObject> = (object: UIObject) => object is T;

export function ofType<T extends UIObject>(type: UiObjectClass<T>): UiMatcher<T> {
  return (object: UIObject): object is T => object instanceof type;
}

export abstract class UIObject {
  /** Name of the concrete type; also the prefix of generated ids. */
  abstract readonly kind: string;

  /** The object that contains this object. Not an owning reference. */
  parent: UIObject | null = null;

  /**
   * Whether this object is displayed. Effective visibility also depends on
   * every ancestor; see `isVisible()`.
   */
  visible = true;

  /** User-specified CSS classes, in output order. */
  classes: string[] = [];

  /** User-specified data attributes, rendered as `data-<key>`. */
  dataAttributes: Record<string, string> = {};

  /**
   * Resources needed in the page head by this object. Subclasses that replace
   * the set must assign a new one; a null set is a construction error.
   */
  protected htmlHeadEntrySet: HtmlHeadEntrySet | null = new HtmlHeadEntrySet();

  addStyleSheet(uri: string): void {
    this.requireHtmlHeadEntrySet().addEntry(styleSheetEntry(uri));
  }

  addJavaScript(uri: string): void {
    this.requireHtmlHeadEntrySet().addEntry(javaScriptEntry(uri));
  }

  addExternalJavaScript(url: string): void {
    this.requireHtmlHeadEntrySet().addEntry(externalJavaScriptEntry(url));
  }

  addInlineScript(script: string): void {
    this.requireHtmlHeadEntrySet().addEntry(inlineScriptEntry(script));
  }

  addComment(comment: string): void {
    this.requireHtmlHeadEntrySet().addEntry(commentEntry(comment));
  }

  /**
   * First ancestor accepted by `match`, or null when the root is reached
   * without a match.
   */
  getFirstAncestor<T extends UIObject>(match: UiMatcher<T>): T | null {
    let node = this.parent;
    while (node !== null) {
      if (match(node)) return node;
      node = node.parent;
    }
    return null;
  }

  /**
   * Head entries needed to display this object. Empty when the object is not
   * visible, so hidden subtrees cost no extra requests.
   */
  getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    if (this.isVisible()) {
      return new HtmlHeadEntrySet(this.htmlHeadEntrySet ?? undefined);
    }
    return new HtmlHeadEntrySet();
  }

  /**
   * Head entries this object may need, whether or not it is visible. Used to
   * preload resources for content revealed on the client.
   */
  getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    return new HtmlHeadEntrySet(this.htmlHeadEntrySet ?? undefined);
  }

  isVisible(): boolean {
    if (this.parent !== null) {
      return this.visible && this.parent.isVisible();
    }
    return this.visible;
  }

  /**
   * Copy the UI tree starting at this object. The copy has no parent and can
   * be inserted into another tree.
   *
   * @param idSuffix - Appended to ids in the copied tree so the original and
   *   the copy can be displayed in the same page.
   */
  copy(idSuffix = ""): this {
    const proto: object | null = Object.getPrototypeOf(this);
    const copy: this = Object.assign(Object.create(proto), this);
    copy.parent = null;
    copy.classes = [...this.classes];
    copy.dataAttributes = { ...this.dataAttributes };
    copy.htmlHeadEntrySet =
      this.htmlHeadEntrySet === null ? null : new HtmlHeadEntrySet(this.htmlHeadEntrySet);
    return copy;
  }

  /** CSS classes applied to this object. Subclasses prepend their own. */
  protected getCSSClassNames(): readonly string[] {
    return this.classes;
  }

  /** Space-separated CSS classes, or null when there are none. */
  protected getCSSClassString(): string | null {
    const names = this.getCSSClassNames();
    if (names.length === 0) return null;
    return names.join(" ");
  }

  protected getDataAttributes(): Readonly<Record<string, string>> {
    const data: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.dataAttributes)) {
      data[`data-${key}`] = value;
    }
    return data;
  }

  protected applyDataAttributes(tag: HtmlTag): void {
    for (const [name, value] of Object.entries(this.getDataAttributes())) {
      tag.setAttribute(name, value);
    }
  }

  /** Inline JavaScript written after this object's markup. */
  protected getInlineJavaScript(): string {
    return "";
  }

  /**
   * A new id unique among objects of this kind. Each call returns a new id,
   * so call it once and keep the result.
   */
  protected getUniqueId(): string {
    return nextUniqueId(this.kind);
  }

  private requireHtmlHeadEntrySet(): HtmlHeadEntrySet {
    if (this.htmlHeadEntrySet === null) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        `UI object '${this.kind}' did not instantiate a HTML head entry set. ` +
          "Assign one in the constructor before adding head entries.",
      );
    }
    return this.htmlHeadEntrySet;
  }
}
