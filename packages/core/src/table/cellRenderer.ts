/**
 * packages/core/src/table/cellRenderer.ts: Per-cell rendering units.
 *
 * A renderer is configured once and rendered for every row; between rows the
 * owning column copies row fields onto renderer properties through the
 * renderer set's mappings. Only properties a renderer declares as mappable
 * can be targeted.
 */

import { FormworkError } from "../errors.js";
import { escapeHtml } from "../html/escape.js";
import { HtmlTag, type ContentType } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { formatMessage } from "../i18n/translate.js";
import type { Message } from "../ui/message.js";
import { UIObject } from "../ui/uiObject.js";

export abstract class CellRenderer extends UIObject {
  id: string | null = null;

  /** Insensitive renderers display without interactive markup. */
  sensitive = true;

  protected messages: Message[] = [];

  init(): void {}

  process(): void {}

  abstract render(out: HtmlWriter): void;

  addMessage(message: Message): void {
    this.messages.push(message);
  }

  getMessages(): readonly Message[] {
    return this.messages.slice();
  }

  hasMessage(): boolean {
    return this.messages.length > 0;
  }

  /** Property names a data mapping may set on this renderer. */
  getMappableProperties(): readonly string[] {
    return ["visible", "sensitive"];
  }

  isMappableProperty(property: string): boolean {
    return this.getMappableProperties().includes(property);
  }

  /**
   * Set a mappable property from row data.
   *
   * @throws FormworkError FW_INVALID_PROPERTY for a property this renderer
   *   does not declare
   */
  setMappedProperty(property: string, value: unknown): void {
    switch (property) {
      case "visible":
        this.visible = Boolean(value);
        return;
      case "sensitive":
        this.sensitive = Boolean(value);
        return;
      default:
        throw new FormworkError(
          "FW_INVALID_PROPERTY",
          `Cannot map to property '${property}' of ${this.kind}.`,
          { key: property },
        );
    }
  }

  /**
   * Classes naming the renderer's type chain, most general first. Table
   * columns mirror these on their cells.
   */
  getInheritanceCSSClassNames(): readonly string[] {
    return [];
  }

  /** Classes every instance of this renderer type carries. */
  getBaseCSSClassNames(): readonly string[] {
    return [];
  }

  /** Classes that depend on the mapped row values. */
  getDataSpecificCSSClassNames(): readonly string[] {
    return [];
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    if (idSuffix !== "" && copy.id !== null) copy.id = `${copy.id}${idSuffix}`;
    copy.messages = this.messages.slice();
    return copy;
  }
}

function textOf(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export class TextCellRenderer extends CellRenderer {
  readonly kind: string = "textCellRenderer";

  text = "";
  contentType: ContentType = "text/plain";

  constructor(text = "") {
    super();
    this.text = text;
  }

  override getMappableProperties(): readonly string[] {
    return [...super.getMappableProperties(), "text"];
  }

  override setMappedProperty(property: string, value: unknown): void {
    if (property === "text") {
      this.text = textOf(value);
      return;
    }
    super.setMappedProperty(property, value);
  }

  render(out: HtmlWriter): void {
    if (!this.visible) return;
    out.write(this.contentType === "text/plain" ? escapeHtml(this.text) : this.text);
  }

  override getInheritanceCSSClassNames(): readonly string[] {
    return [...super.getInheritanceCSSClassNames(), "formwork-text-cell-renderer"];
  }
}

export class BooleanCellRenderer extends CellRenderer {
  readonly kind: string = "booleanCellRenderer";

  value = false;

  /** Written for true values. */
  trueContent = "✓";
  /** Written for false values. */
  falseContent = "";
  contentType: ContentType = "text/plain";

  override getMappableProperties(): readonly string[] {
    return [...super.getMappableProperties(), "value"];
  }

  override setMappedProperty(property: string, value: unknown): void {
    if (property === "value") {
      this.value = Boolean(value);
      return;
    }
    super.setMappedProperty(property, value);
  }

  render(out: HtmlWriter): void {
    if (!this.visible) return;
    const content = this.value ? this.trueContent : this.falseContent;
    out.write(this.contentType === "text/plain" ? escapeHtml(content) : content);
  }

  override getInheritanceCSSClassNames(): readonly string[] {
    return [...super.getInheritanceCSSClassNames(), "formwork-boolean-cell-renderer"];
  }

  override getDataSpecificCSSClassNames(): readonly string[] {
    return [this.value ? "formwork-boolean-cell-renderer-true" : "formwork-boolean-cell-renderer-false"];
  }
}

/**
 * Renders an anchor. `link` may contain `%s` placeholders filled from
 * `linkValue`. Insensitive links render their text in a span.
 */
export class LinkCellRenderer extends CellRenderer {
  readonly kind: string = "linkCellRenderer";

  link: string | null = null;
  linkValue: string | number | null = null;
  text = "";
  title: string | null = null;

  override getMappableProperties(): readonly string[] {
    return [...super.getMappableProperties(), "link", "linkValue", "text", "title"];
  }

  override setMappedProperty(property: string, value: unknown): void {
    switch (property) {
      case "link":
        this.link = value === null || value === undefined ? null : String(value);
        return;
      case "linkValue":
        this.linkValue = typeof value === "number" ? value : value === null || value === undefined ? null : String(value);
        return;
      case "text":
        this.text = textOf(value);
        return;
      case "title":
        this.title = value === null || value === undefined ? null : String(value);
        return;
      default:
        super.setMappedProperty(property, value);
    }
  }

  render(out: HtmlWriter): void {
    if (!this.visible) return;

    if (this.sensitive && this.link !== null) {
      new HtmlTag("a", { href: this.getLink(), title: this.title })
        .setContent(this.text)
        .display(out);
    } else {
      new HtmlTag("span", { class: "formwork-link-cell-renderer-insensitive", title: this.title })
        .setContent(this.text)
        .display(out);
    }
  }

  getLink(): string {
    const link = this.link ?? "";
    if (this.linkValue === null) return link;
    return formatMessage(link, this.linkValue);
  }

  override getInheritanceCSSClassNames(): readonly string[] {
    return [...super.getInheritanceCSSClassNames(), "formwork-link-cell-renderer"];
  }
}
