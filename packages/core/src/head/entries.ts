/**
 * packages/core/src/head/entries.ts: Page-level resources needed by UI objects.
 *
 * Each entry names one resource. Two entries are the same resource when both
 * their kind and their resource string match; see `headEntryKey`.
 */

import { escapeHtml } from "../html/escape.js";
import { displayInlineJavaScript } from "../html/inlineScript.js";
import type { HtmlWriter } from "../html/writer.js";

export type HtmlHeadEntry =
  | Readonly<{ kind: "stylesheet"; uri: string }>
  | Readonly<{ kind: "javascript"; uri: string }>
  | Readonly<{ kind: "externalJavascript"; uri: string }>
  | Readonly<{ kind: "inlineScript"; script: string }>
  | Readonly<{ kind: "comment"; comment: string }>;

export type HtmlHeadEntryKind = HtmlHeadEntry["kind"];

/** Order in which entry kinds are written inside `<head>`. */
export const HEAD_ENTRY_DISPLAY_ORDER: readonly HtmlHeadEntryKind[] = Object.freeze([
  "comment",
  "stylesheet",
  "externalJavascript",
  "javascript",
  "inlineScript",
]);

export function styleSheetEntry(uri: string): HtmlHeadEntry {
  return Object.freeze({ kind: "stylesheet", uri });
}

export function javaScriptEntry(uri: string): HtmlHeadEntry {
  return Object.freeze({ kind: "javascript", uri });
}

export function externalJavaScriptEntry(uri: string): HtmlHeadEntry {
  return Object.freeze({ kind: "externalJavascript", uri });
}

export function inlineScriptEntry(script: string): HtmlHeadEntry {
  return Object.freeze({ kind: "inlineScript", script });
}

export function commentEntry(comment: string): HtmlHeadEntry {
  return Object.freeze({ kind: "comment", comment });
}

/** The resource string an entry refers to. */
export function headEntryResource(entry: HtmlHeadEntry): string {
  switch (entry.kind) {
    case "stylesheet":
    case "javascript":
    case "externalJavascript":
      return entry.uri;
    case "inlineScript":
      return entry.script;
    case "comment":
      return entry.comment;
  }
}

/** Identity used for deduplication. */
export function headEntryKey(entry: HtmlHeadEntry): string {
  return `${entry.kind}\u0000${headEntryResource(entry)}`;
}

function isAbsoluteUri(uri: string): boolean {
  return /^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(uri) || uri.startsWith("/");
}

function resolveUri(uri: string, baseUri: string): string {
  return isAbsoluteUri(uri) ? uri : `${baseUri}${uri}`;
}

export function displayHeadEntry(out: HtmlWriter, entry: HtmlHeadEntry, baseUri = ""): void {
  switch (entry.kind) {
    case "stylesheet":
      out.write(
        `<link rel="stylesheet" type="text/css" href="${escapeHtml(resolveUri(entry.uri, baseUri))}" />`,
      );
      return;
    case "javascript":
      out.write(
        `<script type="text/javascript" src="${escapeHtml(resolveUri(entry.uri, baseUri))}"></script>`,
      );
      return;
    case "externalJavascript":
      out.write(`<script type="text/javascript" src="${escapeHtml(entry.uri)}"></script>`);
      return;
    case "inlineScript":
      displayInlineJavaScript(out, entry.script);
      return;
    case "comment":
      // "--" may not appear inside an HTML comment.
      out.write(`<!-- ${entry.comment.replace(/--/g, "- -")} -->`);
      return;
  }
}
