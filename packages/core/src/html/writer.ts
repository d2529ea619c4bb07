/**
 * packages/core/src/html/writer.ts: Output sink for rendered markup.
 */

/** Anything markup can be written to: a string buffer, a response stream. */
export type HtmlWriter = Readonly<{
  write: (chunk: string) => void;
}>;

export type HtmlBuffer = HtmlWriter &
  Readonly<{
    toString: () => string;
  }>;

export function createHtmlBuffer(): HtmlBuffer {
  const parts: string[] = [];
  return Object.freeze({
    write: (chunk: string) => {
      parts.push(chunk);
    },
    toString: () => parts.join(""),
  });
}

/** Run `render` against a fresh buffer and return what it wrote. */
export function renderToString(render: (out: HtmlWriter) => void): string {
  const buffer = createHtmlBuffer();
  render(buffer);
  return buffer.toString();
}
