/**
 * packages/core/src/widgets/form.ts: Container that owns submitted data.
 *
 * A form recognizes its own submission through a hidden `_formwork_form_id`
 * field carrying the form id. Widgets inside the form read submitted values
 * through the FormDataProvider capability.
 */

import { FormworkError } from "../errors.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { Container } from "./container.js";
import {
  type FormDataProvider,
  type SubmittedFormData,
  type SubmittedValue,
  firstSubmittedValue,
  normalizeFormData,
} from "./formData.js";

/** Name of the hidden field that identifies the submitted form. */
export const FORM_ID_FIELD = "_formwork_form_id";

export type FormMethod = "post" | "get";

const EMPTY_FORM_DATA: SubmittedFormData = Object.freeze({});

export class Form extends Container implements FormDataProvider {
  override readonly kind: string = "form";
  readonly providesFormData = true as const;

  action = "#";
  method: FormMethod = "post";

  private submittedData: SubmittedFormData | null = null;
  private hiddenFields = new Map<string, string>();

  constructor(id: string | null = null) {
    super(id);
    this.requiresId = true;
  }

  /**
   * Install the data submitted with the current request.
   *
   * @throws FormworkError FW_INVALID_CHARACTER_ENCODING when a name or value
   *   is not well-formed text
   */
  setSubmittedData(data: Readonly<Record<string, SubmittedValue>>): void {
    this.submittedData = normalizeFormData(data);
  }

  /** Whether the current request is a submission of this form. */
  isSubmitted(): boolean {
    if (this.submittedData === null) return false;
    const formId = firstSubmittedValue(this.submittedData[FORM_ID_FIELD]);
    return formId !== undefined && formId === this.getId();
  }

  getFormData(): SubmittedFormData {
    return this.submittedData ?? EMPTY_FORM_DATA;
  }

  /** Submitted value for `name`, or undefined when this form was not submitted. */
  getValue(name: string): SubmittedValue | undefined {
    if (!this.isSubmitted()) return undefined;
    return this.getFormData()[name];
  }

  /**
   * Add a hidden field written after the form's children. Setting the same
   * name again replaces the value.
   */
  addHiddenField(name: string, value: string): void {
    if (name === FORM_ID_FIELD) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        `The hidden field name '${FORM_ID_FIELD}' is reserved by the form.`,
        { key: name },
      );
    }
    this.hiddenFields.set(name, value);
  }

  getHiddenField(name: string): string | null {
    return this.hiddenFields.get(name) ?? null;
  }

  /** Subtree processing only happens for a submission of this form. */
  override process(): void {
    if (!this.isInitialized()) this.init();
    if (!this.isSubmitted()) {
      this.markProcessed();
      return;
    }
    super.process();
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.hiddenFields = new Map(this.hiddenFields);
    copy.submittedData = null;
    return copy;
  }

  protected override displayChildren(out: HtmlWriter): void {
    const form = new HtmlTag("form", {
      id: this.id,
      method: this.method,
      action: this.action,
      class: this.getCSSClassString(),
    });
    this.applyDataAttributes(form);
    form.open(out);
    this.displayFormContent(out);
    this.displayHiddenFields(out);
    form.close(out);
  }

  /** Markup inside the form element, before the hidden fields. */
  protected displayFormContent(out: HtmlWriter): void {
    super.displayChildren(out);
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-form", ...super.getCSSClassNames()];
  }

  protected displayHiddenFields(out: HtmlWriter): void {
    const div = new HtmlTag("div", { class: "formwork-hidden" });
    div.open(out);
    new HtmlTag("input", { type: "hidden", name: FORM_ID_FIELD, value: this.getId() }).display(out);
    for (const [name, value] of this.hiddenFields) {
      new HtmlTag("input", { type: "hidden", name, value }).display(out);
    }
    div.close(out);
  }

  private getId(): string {
    if (this.id === null) this.init();
    return this.id ?? "";
  }
}
