/**
 * @formwork/core
 *
 * Runtime-agnostic TypeScript core for Formwork.
 * This package MUST NOT use Node-specific APIs (Buffer, streams, node:* imports).
 */

// =============================================================================
// Errors and configuration
// =============================================================================

export {
  FormworkError,
  type FormworkErrorCode,
  type FormworkErrorDetail,
  isFormworkError,
} from "./errors.js";

export {
  DEFAULT_TOOLKIT_CONFIG,
  type ResolvedToolkitConfig,
  type ToolkitConfig,
  configureToolkit,
  getToolkitConfig,
  resolveToolkitConfig,
} from "./config.js";

// =============================================================================
// Diagnostics and translation
// =============================================================================

export {
  type TraceLogger,
  type TraceRecord,
  type TraceSink,
  createTraceLogger,
  isTraceEnabled,
  setTraceSink,
  warnDev,
} from "./debug/trace.js";

export {
  type TranslationCatalog,
  _,
  formatMessage,
  getTranslationLocale,
  gettext,
  initTranslations,
  isTranslationInitialized,
  ngettext,
} from "./i18n/translate.js";

// =============================================================================
// HTML output and head entries
// =============================================================================

export { type HtmlBuffer, type HtmlWriter, createHtmlBuffer, renderToString } from "./html/writer.js";
export { escapeHtml, idToClassName, minimizeEntities } from "./html/escape.js";
export { displayInlineJavaScript, quoteJavaScriptString } from "./html/inlineScript.js";
export {
  type ContentType,
  type HtmlAttributeValue,
  type HtmlAttributes,
  HtmlTag,
} from "./html/tag.js";

export {
  HEAD_ENTRY_DISPLAY_ORDER,
  type HtmlHeadEntry,
  type HtmlHeadEntryKind,
  commentEntry,
  displayHeadEntry,
  externalJavaScriptEntry,
  headEntryKey,
  headEntryResource,
  inlineScriptEntry,
  javaScriptEntry,
  styleSheetEntry,
} from "./head/entries.js";
export { type HeadEntryDisplayOptions, HtmlHeadEntrySet } from "./head/entrySet.js";

// =============================================================================
// UI objects
// =============================================================================

export { UIObject, type UiMatcher, type UiObjectClass, ofType } from "./ui/uiObject.js";
export { type UIParent, isUIParent } from "./ui/uiParent.js";
export {
  MESSAGE_TYPES,
  type Message,
  type MessageOptions,
  type MessageType,
  createMessage,
  displayMessage,
  getMessageCSSClassNames,
  isErrorMessage,
  isMessageType,
} from "./ui/message.js";

// =============================================================================
// Widgets
// =============================================================================

export { INSENSITIVE_CLASS, Widget } from "./widgets/widget.js";
export {
  type FormDataProvider,
  type SubmittedFormData,
  type SubmittedValue,
  firstSubmittedValue,
  isFormDataProvider,
  normalizeFormData,
} from "./widgets/formData.js";
export { Container, replaceWithContainer } from "./widgets/container.js";
export { FORM_ID_FIELD, Form, type FormMethod } from "./widgets/form.js";
export { ContentBlock } from "./widgets/contentBlock.js";
export { BUTTON_JAVASCRIPT, Button } from "./widgets/button.js";
export { Entry, IntegerEntry, parseInteger } from "./widgets/entry.js";
export {
  FLYDOWN_DIVIDER_CLASS,
  Flydown,
  type FlydownOption,
  type FlydownValue,
  flydownDivider,
  flydownOption,
  flydownValuesEqual,
  isFlydownValue,
  serializeFlydownValue,
  unserializeFlydownValue,
} from "./widgets/flydown.js";
export { TreeFlydown, TreeFlydownNode } from "./widgets/treeFlydown.js";
export { GroupedFlydown } from "./widgets/groupedFlydown.js";
export {
  WizardForm,
  WizardNavigation,
  WizardNavigationSteps,
  WizardStep,
} from "./widgets/wizard.js";

// =============================================================================
// Tables
// =============================================================================

export { type TableModel, TableStore } from "./table/tableStore.js";
export {
  BooleanCellRenderer,
  CellRenderer,
  LinkCellRenderer,
  TextCellRenderer,
} from "./table/cellRenderer.js";
export { type CellRendererMapping, CellRendererSet } from "./table/cellRendererSet.js";
export { InputCell } from "./table/inputCell.js";
export { TableViewColumn } from "./table/tableViewColumn.js";
export { TableViewInputRow, TableViewRow } from "./table/tableViewRow.js";
export { TableView } from "./table/tableView.js";
