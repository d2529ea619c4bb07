/**
 * Error type for Formwork.
 *
 * Every contract violation in tree assembly, configuration or submitted data
 * surfaces as a FormworkError. The `code` identifies the violation; `detail`
 * carries the offending key, value or payload where one exists.
 */

// =============================================================================
// FormworkErrorCode Union
// =============================================================================

/**
 * Deterministic error codes.
 *
 *   - FW_CONSTRUCTION: a UI tree was assembled or configured incorrectly
 *   - FW_DUPLICATE_ID: a key or id is already registered
 *   - FW_NOT_FOUND: a key or id was never registered
 *   - FW_INVALID_CLASS: a parent was given a child kind it does not accept
 *   - FW_INVALID_PROPS: configuration values failed validation
 *   - FW_INVALID_PROPERTY: a data mapping names an unknown property or field
 *   - FW_UNDEFINED_MESSAGE_TYPE: a message was created with an unknown type
 *   - FW_INVALID_SERIALIZED_DATA: submitted serialized data could not be read
 *   - FW_INVALID_CHARACTER_ENCODING: submitted text is not well-formed UTF-16
 *   - FW_INTEGER_OVERFLOW: integer text outside the safe-integer range
 */
export type FormworkErrorCode =
  | "FW_CONSTRUCTION"
  | "FW_DUPLICATE_ID"
  | "FW_NOT_FOUND"
  | "FW_INVALID_CLASS"
  | "FW_INVALID_PROPS"
  | "FW_INVALID_PROPERTY"
  | "FW_UNDEFINED_MESSAGE_TYPE"
  | "FW_INVALID_SERIALIZED_DATA"
  | "FW_INVALID_CHARACTER_ENCODING"
  | "FW_INTEGER_OVERFLOW";

export type FormworkErrorDetail = Readonly<{
  /** Key or id involved in a duplicate / not-found violation. */
  key?: string | undefined;
  /** Offending value for invalid-class violations. */
  value?: unknown;
  /** Sign of an overflowing integer. */
  sign?: 1 | -1 | undefined;
  /** Raw serialized data that failed to decode. */
  data?: string | undefined;
  /** Message type name that is not defined. */
  messageType?: string | undefined;
}>;

// =============================================================================
// FormworkError Class
// =============================================================================

export class FormworkError extends Error {
  override readonly name = "FormworkError";
  readonly code: FormworkErrorCode;
  readonly detail: FormworkErrorDetail;

  constructor(code: FormworkErrorCode, message?: string, detail?: FormworkErrorDetail) {
    super(message ?? code);
    this.code = code;
    this.detail = Object.freeze({ ...detail });

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormworkError);
    }
  }
}

/** True when `err` is a FormworkError, optionally with the given code. */
export function isFormworkError(err: unknown, code?: FormworkErrorCode): err is FormworkError {
  if (!(err instanceof FormworkError)) return false;
  return code === undefined || err.code === code;
}
