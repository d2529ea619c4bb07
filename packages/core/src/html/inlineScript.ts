import type { HtmlWriter } from "./writer.js";

/**
 * Write inline JavaScript wrapped in a CDATA section. Nothing is written for
 * an empty script.
 */
export function displayInlineJavaScript(out: HtmlWriter, javascript: string): void {
  if (javascript === "") return;
  out.write(
    `<script type="text/javascript">\n//<![CDATA[\n${javascript.trimEnd()}\n//]]>\n</script>`,
  );
}

/** Encode a value as a JavaScript literal safe to embed in a script element. */
export function quoteJavaScriptString(value: string): string {
  return JSON.stringify(value).replace(/</g, "\\u003c").replace(/>/g, "\\u003e");
}
