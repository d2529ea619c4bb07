/**
 * packages/core/src/widgets/entry.ts: Single-line text inputs.
 */

import { FormworkError, isFormworkError } from "../errors.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { formatMessage, gettext } from "../i18n/translate.js";
import { createMessage } from "../ui/message.js";
import { Widget } from "./widget.js";

export class Entry extends Widget {
  readonly kind: string = "entry";

  value: string | null = null;
  required = false;
  maxlength: number | null = null;
  size = 50;

  /** Label used in validation messages, e.g. "Name". */
  label: string | null = null;

  protected inputType = "text";

  constructor(id: string | null = null) {
    super(id);
    this.requiresId = true;
  }

  override process(): void {
    super.process();

    const raw = this.getSubmittedText();
    if (raw === undefined) return;

    const text = raw.trim();
    this.value = text === "" ? null : text;

    if (this.value === null) {
      if (this.required) {
        this.addMessage(
          createMessage(formatMessage(gettext("The %s field is required."), this.getLabel()), "error"),
        );
      }
      return;
    }

    if (this.maxlength !== null && text.length > this.maxlength) {
      this.addMessage(
        createMessage(
          formatMessage(
            gettext("The %s field can be at most %s characters long."),
            this.getLabel(),
            this.maxlength,
          ),
          "error",
        ),
      );
      return;
    }

    this.processValue(text);
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);

    const input = new HtmlTag("input", {
      type: this.inputType,
      name: this.id,
      id: this.id,
      class: this.getCSSClassString(),
      value: this.getDisplayValue(),
      size: this.size,
      maxlength: this.maxlength,
      disabled: !this.isSensitive(),
    });
    this.applyDataAttributes(input);
    input.display(out);
  }

  override getFocusableHtmlId(): string | null {
    return this.visible ? this.id : null;
  }

  /** Validate trimmed, non-empty submitted text. */
  protected processValue(_text: string): void {}

  protected getDisplayValue(): string {
    return this.value ?? "";
  }

  protected getLabel(): string {
    return this.label ?? this.id ?? gettext("entry");
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-entry", ...super.getCSSClassNames()];
  }
}

/**
 * Parse base-10 integer text. Leading `+` / `-` and surrounding whitespace
 * are accepted; anything else returns null.
 *
 * @throws FormworkError FW_INTEGER_OVERFLOW when the value is outside the
 *   safe-integer range; `detail.sign` tells which end overflowed
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    const sign = trimmed.startsWith("-") ? -1 : 1;
    throw new FormworkError(
      "FW_INTEGER_OVERFLOW",
      `Integer value '${trimmed}' is outside the supported range.`,
      { sign },
    );
  }
  return value;
}

export class IntegerEntry extends Entry {
  override readonly kind: string = "integerEntry";

  /** Parsed value; null until a valid integer is submitted. */
  integerValue: number | null = null;

  override size = 5;

  protected override processValue(text: string): void {
    let parsed: number | null;
    try {
      parsed = parseInteger(text);
    } catch (err) {
      if (!isFormworkError(err, "FW_INTEGER_OVERFLOW")) throw err;
      const key =
        err.detail.sign === -1
          ? "The %s field is too small."
          : "The %s field is too large.";
      this.addMessage(createMessage(formatMessage(gettext(key), this.getLabel()), "error"));
      return;
    }

    if (parsed === null) {
      this.addMessage(
        createMessage(formatMessage(gettext("The %s field must be an integer."), this.getLabel()), "error"),
      );
      return;
    }
    this.integerValue = parsed;
  }

  protected override getDisplayValue(): string {
    if (this.integerValue !== null) return String(this.integerValue);
    return super.getDisplayValue();
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-integer-entry", ...super.getCSSClassNames()];
  }
}
