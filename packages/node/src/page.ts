/**
 * packages/node/src/page.ts: Render a widget tree as a complete document.
 *
 * The body is rendered first so that widgets created during display still
 * contribute head entries; the head is assembled afterwards.
 */

import {
  type HtmlHeadEntrySet,
  type Widget,
  createHtmlBuffer,
  escapeHtml,
  getToolkitConfig,
} from "@formwork/core";

export type RenderDocumentOptions = Readonly<{
  title?: string | undefined;
  lang?: string | undefined;
  /** Prefix for relative head-entry URIs. Defaults to the toolkit config. */
  baseUri?: string | undefined;
  /** Include head entries of hidden widgets (for client-side reveal). */
  includeHiddenResources?: boolean | undefined;
}>;

export function renderDocument(root: Widget, opts: RenderDocumentOptions = {}): string {
  const body = createHtmlBuffer();
  root.display(body);

  const entries: HtmlHeadEntrySet = opts.includeHiddenResources
    ? root.getAvailableHtmlHeadEntrySet()
    : root.getHtmlHeadEntrySet();
  const head = createHtmlBuffer();
  entries.display(head, { baseUri: opts.baseUri ?? getToolkitConfig().resourceBaseUri });

  const lang = opts.lang ?? getToolkitConfig().locale;
  const title = opts.title ?? "";

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" "http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd">',
    `<html xmlns="http://www.w3.org/1999/xhtml" xml:lang="${escapeHtml(lang)}" lang="${escapeHtml(lang)}">`,
    "<head>",
    '<meta http-equiv="Content-Type" content="text/html; charset=UTF-8" />',
    `<title>${escapeHtml(title)}</title>`,
    `${head.toString()}</head>`,
    `<body>${body.toString()}</body>`,
    "</html>",
    "",
  ].join("\n");
}
