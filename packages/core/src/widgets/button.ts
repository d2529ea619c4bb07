/**
 * packages/core/src/widgets/button.ts: Submit button.
 *
 * The client script (`formwork-button.js`) can ask for confirmation and
 * disable the button while the form posts. A disabled button is not
 * submitted, so the script adds a hidden field with the button's name before
 * posting; `process()` treats either as a click.
 */

import { gettext } from "../i18n/translate.js";
import { quoteJavaScriptString, displayInlineJavaScript } from "../html/inlineScript.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { Widget } from "./widget.js";

export const BUTTON_JAVASCRIPT = "packages/formwork/javascript/formwork-button.js";

export class Button extends Widget {
  readonly kind: string = "button";

  /** Visible label. Defaults to a translated "Submit". */
  title: string | null = null;

  /** Asked through `confirm()` before the form is submitted. */
  confirmationMessage: string | null = null;

  /** Disable the button and show a throbber while the form posts. */
  showProcessingThrobber = false;

  /** Text shown beside the throbber. */
  processingMessage: string | null = null;

  /** Access key for the button, if any. */
  accessKey: string | null = null;

  private clicked = false;

  constructor(id: string | null = null) {
    super(id);
    this.requiresId = true;
    this.addJavaScript(BUTTON_JAVASCRIPT);
  }

  override process(): void {
    super.process();
    if (this.id !== null && this.getSubmittedValue(this.id) !== undefined) {
      this.clicked = true;
    }
  }

  hasBeenClicked(): boolean {
    return this.clicked;
  }

  getTitle(): string {
    return this.title ?? gettext("Submit");
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);

    const input = new HtmlTag("input", {
      type: "submit",
      name: this.id,
      id: this.id,
      value: this.getTitle(),
      class: this.getCSSClassString(),
      accesskey: this.accessKey,
      disabled: !this.isSensitive(),
    });
    this.applyDataAttributes(input);
    input.display(out);

    displayInlineJavaScript(out, this.getInlineJavaScript());
  }

  override getFocusableHtmlId(): string | null {
    return this.visible ? this.id : null;
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-button", ...super.getCSSClassNames()];
  }

  protected override getInlineJavaScript(): string {
    if (this.confirmationMessage === null && !this.showProcessingThrobber) return "";
    if (this.id === null) return "";

    const objectId = this.id;
    const lines = [
      `var ${objectId}_obj = new FormworkButton(${quoteJavaScriptString(this.id)}, ${String(this.showProcessingThrobber)});`,
    ];
    if (this.processingMessage !== null) {
      lines.push(`${objectId}_obj.setProcessingMessage(${quoteJavaScriptString(this.processingMessage)});`);
    }
    if (this.confirmationMessage !== null) {
      lines.push(
        `${objectId}_obj.setConfirmationMessage(${quoteJavaScriptString(this.confirmationMessage)});`,
      );
    }
    return lines.join("\n");
  }
}
