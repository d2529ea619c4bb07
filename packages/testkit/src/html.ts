/**
 * packages/testkit/src/html.ts: Capture and compare rendered markup.
 *
 * Why: Widget tests write into an HTML sink and assert on the exact string.
 * The recorder is structurally compatible with `HtmlWriter` from
 * `@formwork/core` without depending on it.
 */

export type HtmlRecorder = Readonly<{
  write: (chunk: string) => void;
  /** Concatenated output so far. */
  text: () => string;
  /** Individual write calls, in order. */
  chunks: () => readonly string[];
}>;

export function createHtmlRecorder(): HtmlRecorder {
  const parts: string[] = [];
  return Object.freeze({
    write: (chunk: string) => {
      parts.push(chunk);
    },
    text: () => parts.join(""),
    chunks: () => Object.freeze(parts.slice()),
  });
}

/**
 * Drop whitespace that sits only between tags so multi-line fixtures can be
 * compared with single-line output.
 */
export function collapseTagWhitespace(html: string): string {
  return html.replace(/>\s+</g, "><").trim();
}
