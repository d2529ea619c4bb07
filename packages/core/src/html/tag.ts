/**
 * packages/core/src/html/tag.ts: Builder for a single HTML element.
 *
 * Attributes render in insertion order. `null`, `undefined` and `false`
 * values are omitted; `true` renders as `name="name"` (XHTML boolean form).
 * Void elements display self-closed (`<input a="b" />`); every other element
 * displays with an explicit close tag even when empty.
 */

import { escapeHtml } from "./escape.js";
import type { HtmlWriter } from "./writer.js";

export type HtmlAttributeValue = string | number | boolean | null | undefined;

export type HtmlAttributes = Readonly<Record<string, HtmlAttributeValue>>;

/** `text/plain` content is escaped; `text/xml` content is written as-is. */
export type ContentType = "text/plain" | "text/xml";

const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "br",
  "col",
  "hr",
  "img",
  "input",
  "link",
  "meta",
]);

export class HtmlTag {
  readonly name: string;
  private readonly attributes = new Map<string, string | number | true>();
  private content: string | null = null;
  private contentType: ContentType = "text/plain";

  constructor(name: string, attributes?: HtmlAttributes) {
    this.name = name;
    if (attributes) {
      for (const [key, value] of Object.entries(attributes)) {
        this.setAttribute(key, value);
      }
    }
  }

  setAttribute(name: string, value: HtmlAttributeValue): this {
    if (value === null || value === undefined || value === false) {
      this.attributes.delete(name);
    } else {
      this.attributes.set(name, value);
    }
    return this;
  }

  removeAttribute(name: string): this {
    this.attributes.delete(name);
    return this;
  }

  getAttribute(name: string): string | null {
    const value = this.attributes.get(name);
    if (value === undefined) return null;
    return value === true ? name : String(value);
  }

  setContent(content: string, contentType: ContentType = "text/plain"): this {
    this.content = content;
    this.contentType = contentType;
    return this;
  }

  open(out: HtmlWriter): void {
    out.write(`<${this.name}${this.renderAttributes()}>`);
  }

  close(out: HtmlWriter): void {
    out.write(`</${this.name}>`);
  }

  display(out: HtmlWriter): void {
    if (VOID_ELEMENTS.has(this.name)) {
      out.write(`<${this.name}${this.renderAttributes()} />`);
      return;
    }
    this.open(out);
    this.displayContent(out);
    this.close(out);
  }

  displayContent(out: HtmlWriter): void {
    if (this.content === null) return;
    out.write(this.contentType === "text/plain" ? escapeHtml(this.content) : this.content);
  }

  toString(): string {
    const parts: string[] = [];
    this.display({ write: (chunk) => parts.push(chunk) });
    return parts.join("");
  }

  private renderAttributes(): string {
    let out = "";
    for (const [key, value] of this.attributes) {
      const text = value === true ? key : String(value);
      out += ` ${key}="${escapeHtml(text)}"`;
    }
    return out;
  }
}
