/**
 * packages/core/src/widgets/flydown.ts: Single-select drop-down.
 *
 * Option values are arbitrary JSON values. They are serialized with
 * JSON.stringify into `<option value>` and parsed back on submission, so a
 * flydown can select numbers, booleans, nulls or structured keys.
 */

import { FormworkError } from "../errors.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { formatMessage, gettext } from "../i18n/translate.js";
import { createMessage } from "../ui/message.js";
import { Widget } from "./widget.js";

export type FlydownValue =
  | string
  | number
  | boolean
  | null
  | readonly FlydownValue[]
  | { readonly [key: string]: FlydownValue };

export type FlydownOption = Readonly<{
  value: FlydownValue;
  title: string;
  /** Dividers display as disabled options and can never be selected. */
  divider: boolean;
}>;

export const FLYDOWN_DIVIDER_CLASS = "formwork-flydown-option-divider";

export function flydownOption(value: FlydownValue, title: string): FlydownOption {
  return Object.freeze({ value, title, divider: false });
}

export function flydownDivider(title = "──────────"): FlydownOption {
  return Object.freeze({ value: null, title, divider: true });
}

export function isFlydownValue(value: unknown): value is FlydownValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isFlydownValue);
      return Object.values(value).every(isFlydownValue);
    default:
      return false;
  }
}

export function serializeFlydownValue(value: FlydownValue): string {
  return JSON.stringify(value);
}

/**
 * @throws FormworkError FW_INVALID_SERIALIZED_DATA when `data` is not JSON
 *   or holds something other than a flydown value
 */
export function unserializeFlydownValue(data: string): FlydownValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new FormworkError(
      "FW_INVALID_SERIALIZED_DATA",
      `Submitted flydown data could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { data },
    );
  }
  if (!isFlydownValue(parsed)) {
    throw new FormworkError("FW_INVALID_SERIALIZED_DATA", "Submitted flydown data is not a valid value.", {
      data,
    });
  }
  return parsed;
}

export function flydownValuesEqual(a: FlydownValue, b: FlydownValue): boolean {
  return serializeFlydownValue(a) === serializeFlydownValue(b);
}

export class Flydown extends Widget {
  readonly kind: string = "flydown";

  value: FlydownValue = null;

  showBlank = true;

  /** Title of the blank option. Defaults to a translated "Choose One…". */
  blankTitle: string | null = null;

  required = false;

  /** Label used in validation messages. */
  label: string | null = null;

  protected options: FlydownOption[] = [];

  constructor(id: string | null = null) {
    super(id);
    this.requiresId = true;
  }

  addOption(value: FlydownValue, title: string): void {
    this.options.push(flydownOption(value, title));
  }

  addDivider(title?: string): void {
    this.options.push(flydownDivider(title));
  }

  /** Add one option per entry of `titles`, keyed by value. */
  addOptionsByArray(titles: Readonly<Record<string, string>>): void {
    for (const [value, title] of Object.entries(titles)) {
      this.addOption(value, title);
    }
  }

  removeOptionsByValue(value: FlydownValue): number {
    const before = this.options.length;
    this.options = this.options.filter((option) => !flydownValuesEqual(option.value, value));
    return before - this.options.length;
  }

  /** Selectable options, not counting the blank option. */
  getOptions(): readonly FlydownOption[] {
    return this.options.slice();
  }

  getBlankTitle(): string {
    return this.blankTitle ?? gettext("Choose One…");
  }

  override process(): void {
    super.process();

    const raw = this.getSubmittedText();
    if (raw === undefined) return;

    this.value = this.parseSubmittedValue(raw);

    if (this.required && this.value === null && this.isSensitive()) {
      this.addMessage(
        createMessage(formatMessage(gettext("The %s field is required."), this.getLabel()), "error"),
      );
    }
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    super.display(out);
    this.displayControl(out);
  }

  override getFocusableHtmlId(): string | null {
    return this.visible ? this.id : null;
  }

  /** Write the select element, or the single-option form. */
  protected displayControl(out: HtmlWriter): void {
    const options = this.getDisplayOptions();
    if (options.length > 1) {
      const select = new HtmlTag("select", {
        name: this.id,
        id: this.id,
        class: this.getCSSClassString(),
        disabled: !this.isSensitive(),
      });
      this.applyDataAttributes(select);
      select.open(out);
      let selected = false;
      for (const option of options) {
        const isSelected = !selected && !option.divider && flydownValuesEqual(this.value, option.value);
        if (isSelected) selected = true;
        this.displayOption(out, option, isSelected);
      }
      select.close(out);
    } else {
      const [single] = options;
      if (single !== undefined) this.displaySingle(out, single);
    }
  }

  /** Options in display order, blank first when shown. */
  protected getDisplayOptions(): readonly FlydownOption[] {
    const options = this.getOptions();
    return this.showBlank ? [this.getBlankOption(), ...options] : options;
  }

  protected getBlankOption(): FlydownOption {
    return flydownOption(null, this.getBlankTitle());
  }

  protected parseSubmittedValue(raw: string): FlydownValue {
    return unserializeFlydownValue(raw);
  }

  protected displayOption(out: HtmlWriter, option: FlydownOption, selected: boolean): void {
    const tag = new HtmlTag("option", { value: serializeFlydownValue(option.value) });
    if (option.divider) {
      tag.setAttribute("disabled", true);
      tag.setAttribute("class", FLYDOWN_DIVIDER_CLASS);
    }
    tag.setAttribute("selected", selected);
    tag.setContent(option.title);
    tag.display(out);
  }

  /** A single option displays as its title with the value in a hidden input. */
  protected displaySingle(out: HtmlWriter, option: FlydownOption): void {
    new HtmlTag("input", {
      type: "hidden",
      name: this.id,
      value: serializeFlydownValue(option.value),
    }).display(out);
    new HtmlTag("span", { class: "formwork-flydown-single" }).setContent(option.title).display(out);
  }

  protected getLabel(): string {
    return this.label ?? this.id ?? gettext("flydown");
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-flydown", ...super.getCSSClassNames()];
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.options = this.options.slice();
    return copy;
  }
}
