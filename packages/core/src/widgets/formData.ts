/**
 * packages/core/src/widgets/formData.ts: Submitted form data.
 *
 * Widgets read submitted values from the nearest ancestor that provides form
 * data (normally a Form). The capability is checked structurally so widget
 * modules do not import the Form class.
 */

import { FormworkError } from "../errors.js";
import type { UIObject } from "../ui/uiObject.js";

/** One submitted field. Repeated names (multi-selects) submit arrays. */
export type SubmittedValue = string | readonly string[];

export type SubmittedFormData = Readonly<Record<string, SubmittedValue>>;

export interface FormDataProvider {
  readonly providesFormData: true;
  isSubmitted(): boolean;
  getFormData(): SubmittedFormData;
}

export function isFormDataProvider(object: UIObject): object is UIObject & FormDataProvider {
  return "providesFormData" in object && object.providesFormData === true;
}

/** The first value of a submitted field, or undefined when absent. */
export function firstSubmittedValue(value: SubmittedValue | undefined): string | undefined {
  if (value === undefined || typeof value === "string") return value;
  return value[0];
}

// Lone surrogates cannot be encoded as UTF-8 and indicate a mangled request.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function assertWellFormed(name: string, text: string): void {
  if (LONE_SURROGATE.test(text)) {
    throw new FormworkError(
      "FW_INVALID_CHARACTER_ENCODING",
      `Submitted value for "${name}" is not valid UTF-8 text.`,
      { key: name },
    );
  }
}

/** Validate and freeze submitted data. */
export function normalizeFormData(data: Readonly<Record<string, SubmittedValue>>): SubmittedFormData {
  const out: Record<string, SubmittedValue> = {};
  for (const [name, value] of Object.entries(data)) {
    assertWellFormed(name, name);
    if (typeof value === "string") {
      assertWellFormed(name, value);
      out[name] = value;
    } else {
      for (const item of value) assertWellFormed(name, item);
      out[name] = Object.freeze(value.slice());
    }
  }
  return Object.freeze(out);
}
