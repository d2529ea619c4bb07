import type { ContentType } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { escapeHtml } from "../html/escape.js";
import { Widget } from "./widget.js";

/** Writes a block of text or markup with no wrapper element. */
export class ContentBlock extends Widget {
  readonly kind: string = "contentBlock";

  content: string;
  contentType: ContentType;

  constructor(content = "", contentType: ContentType = "text/plain", id: string | null = null) {
    super(id);
    this.content = content;
    this.contentType = contentType;
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);
    out.write(this.contentType === "text/plain" ? escapeHtml(this.content) : this.content);
  }
}
