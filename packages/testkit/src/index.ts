export { assert, describe, test } from "./nodeTest.js";
export { collapseTagWhitespace, createHtmlRecorder, type HtmlRecorder } from "./html.js";
export { withEnv } from "./env.js";
