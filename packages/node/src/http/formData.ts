/**
 * packages/node/src/http/formData.ts: Request bodies → submitted form data.
 */

import type { SubmittedFormData, SubmittedValue } from "@formwork/core";
import { normalizeFormData } from "@formwork/core";

/** Default limit for `readRequestBody`. */
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export type ReadRequestBodyOptions = Readonly<{
  maxBytes?: number | undefined;
}>;

/**
 * Parse an `application/x-www-form-urlencoded` body. Names submitted more
 * than once (multi-selects, checkbox lists) become arrays in submission order.
 *
 * @throws FormworkError FW_INVALID_CHARACTER_ENCODING when the decoded text
 *   holds lone surrogates
 */
export function parseUrlEncodedBody(body: string): SubmittedFormData {
  const params = new URLSearchParams(body);
  const out: Record<string, SubmittedValue> = {};
  for (const name of new Set(params.keys())) {
    const values = params.getAll(name);
    const [first] = values;
    out[name] = values.length === 1 && first !== undefined ? first : values;
  }
  return normalizeFormData(out);
}

/**
 * Collect a request body as UTF-8 text.
 *
 * @throws RangeError when the body is larger than `maxBytes`
 */
export async function readRequestBody(
  stream: AsyncIterable<Uint8Array | string>,
  opts: ReadRequestBodyOptions = {},
): Promise<string> {
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_BODY_BYTES;
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    total += buf.byteLength;
    if (total > maxBytes) {
      throw new RangeError(`request body exceeds ${String(maxBytes)} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
}
