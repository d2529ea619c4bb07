/**
 * packages/core/src/config.ts: Process-wide toolkit configuration.
 *
 * Why: A handful of settings (the stylesheet every widget pulls in, the base
 * URI for head-entry resources, tracing, the fallback locale) are shared by
 * the whole UI tree. They are resolved once against frozen defaults and
 * validated up front so a bad value fails at startup, not mid-render.
 */

import { FormworkError } from "./errors.js";

export type ToolkitConfig = Readonly<{
  /** Stylesheet added by every widget at construction. `null` disables it. */
  baseStylesheet?: string | null;
  /** Prefix for relative stylesheet and script URIs in displayed head entries. */
  resourceBaseUri?: string;
  /** Emit lifecycle trace records. */
  trace?: boolean;
  /** Locale for plural rules when no translation catalog is installed. */
  locale?: string;
}>;

export type ResolvedToolkitConfig = Readonly<{
  baseStylesheet: string | null;
  resourceBaseUri: string;
  trace: boolean;
  locale: string;
}>;

/** Default configuration values. */
export const DEFAULT_TOOLKIT_CONFIG: ResolvedToolkitConfig = Object.freeze({
  baseStylesheet: "packages/formwork/styles/formwork.css",
  resourceBaseUri: "",
  trace: false,
  locale: "en",
});

let activeConfig: ResolvedToolkitConfig = DEFAULT_TOOLKIT_CONFIG;

function invalidProps(detail: string): never {
  throw new FormworkError("FW_INVALID_PROPS", detail);
}

function requireNonEmptyString(name: string, v: unknown): string {
  if (typeof v !== "string" || v.trim().length === 0) {
    invalidProps(`${name} must be a non-empty string`);
  }
  return v;
}

function isLocaleTag(v: string): boolean {
  try {
    return Intl.getCanonicalLocales(v).length === 1;
  } catch {
    return false;
  }
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveToolkitConfig(config: ToolkitConfig | undefined): ResolvedToolkitConfig {
  if (!config) return DEFAULT_TOOLKIT_CONFIG;

  let baseStylesheet = DEFAULT_TOOLKIT_CONFIG.baseStylesheet;
  if (config.baseStylesheet === null) {
    baseStylesheet = null;
  } else if (config.baseStylesheet !== undefined) {
    baseStylesheet = requireNonEmptyString("baseStylesheet", config.baseStylesheet);
  }

  let resourceBaseUri = DEFAULT_TOOLKIT_CONFIG.resourceBaseUri;
  if (config.resourceBaseUri !== undefined) {
    if (typeof config.resourceBaseUri !== "string") {
      invalidProps("resourceBaseUri must be a string");
    }
    resourceBaseUri = config.resourceBaseUri;
  }

  let trace = DEFAULT_TOOLKIT_CONFIG.trace;
  if (config.trace !== undefined) {
    if (typeof config.trace !== "boolean") invalidProps("trace must be a boolean");
    trace = config.trace;
  }

  let locale = DEFAULT_TOOLKIT_CONFIG.locale;
  if (config.locale !== undefined) {
    locale = requireNonEmptyString("locale", config.locale);
    if (!isLocaleTag(locale)) invalidProps(`locale "${locale}" is not a valid BCP 47 tag`);
  }

  return Object.freeze({ baseStylesheet, resourceBaseUri, trace, locale });
}

/** Install the process-wide configuration. Returns the resolved values. */
export function configureToolkit(config: ToolkitConfig | undefined): ResolvedToolkitConfig {
  activeConfig = resolveToolkitConfig(config);
  return activeConfig;
}

export function getToolkitConfig(): ResolvedToolkitConfig {
  return activeConfig;
}
