/**
 * packages/core/src/html/escape.ts: Text escaping for markup output.
 */

const ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
});

/** Escape text for use in element content or a quoted attribute value. */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * Escape `<`, `>` and bare ampersands, leaving well-formed entities such as
 * `&nbsp;` or `&#8230;` intact.
 */
export function minimizeEntities(text: string): string {
  return text
    .replace(/&(?!(?:[a-zA-Z][a-zA-Z0-9]*|#[0-9]+|#x[0-9a-fA-F]+);)/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Convert an identifier to a CSS class name: `price_column` → `price-column`. */
export function idToClassName(id: string): string {
  return id.replace(/_/g, "-");
}
