/**
 * @formwork/node
 *
 * Node.js adapter for @formwork/core: request bodies, full-page rendering,
 * translation catalogs on disk and trace sinks.
 */

export {
  DEFAULT_MAX_BODY_BYTES,
  type ReadRequestBodyOptions,
  parseUrlEncodedBody,
  readRequestBody,
} from "./http/formData.js";
export { type RenderDocumentOptions, renderDocument } from "./page.js";
export {
  BUNDLED_LOCALE_DIR,
  type NodeTranslationOptions,
  initNodeTranslations,
  loadTranslationCatalog,
} from "./i18n/translations.js";
export { createFileTraceSink, createStderrTraceSink } from "./trace/sinks.js";
