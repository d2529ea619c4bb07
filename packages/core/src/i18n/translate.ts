/**
 * packages/core/src/i18n/translate.ts: Message translation.
 *
 * Why: Widgets carry user-visible default strings ("Submit", "Choose One…",
 * required-field messages). Those strings are looked up in one process-wide
 * catalog, installed once at startup. Until a catalog is installed, strings
 * pass through untranslated.
 *
 * Catalog format:
 *   { "locale": "fr", "messages": { "Submit": "Envoyer", "%s item": ["%s article", "%s articles"] } }
 * An array value holds plural forms indexed by the locale's plural category
 * order (one, other; or one, few, many, other, ...). Missing trailing forms
 * fall back to the last form given.
 */

import { getToolkitConfig } from "../config.js";
import { FormworkError } from "../errors.js";

export type TranslationCatalog = Readonly<{
  locale: string;
  messages: Readonly<Record<string, string | readonly string[]>>;
}>;

const PLURAL_CATEGORY_ORDER: readonly Intl.LDMLPluralRule[] = Object.freeze([
  "zero",
  "one",
  "two",
  "few",
  "many",
  "other",
]);

let initialized = false;
let activeCatalog: TranslationCatalog | null = null;
let pluralRules: Intl.PluralRules | null = null;
let pluralCategories: readonly Intl.LDMLPluralRule[] = Object.freeze(["one", "other"]);

function validateCatalog(catalog: TranslationCatalog): TranslationCatalog {
  if (typeof catalog.locale !== "string" || catalog.locale.length === 0) {
    throw new FormworkError("FW_INVALID_PROPS", "translation catalog locale must be a non-empty string");
  }
  for (const [source, translated] of Object.entries(catalog.messages)) {
    if (typeof translated === "string") continue;
    if (!Array.isArray(translated) || translated.some((form) => typeof form !== "string")) {
      throw new FormworkError(
        "FW_INVALID_PROPS",
        `translation for "${source}" must be a string or an array of strings`,
      );
    }
  }
  return Object.freeze({ locale: catalog.locale, messages: Object.freeze({ ...catalog.messages }) });
}

/**
 * Install the process-wide catalog. Only the first call has an effect; later
 * calls return without touching the installed catalog.
 */
export function initTranslations(catalog?: TranslationCatalog): void {
  if (initialized) return;

  if (catalog !== undefined) {
    activeCatalog = validateCatalog(catalog);
    pluralRules = new Intl.PluralRules(activeCatalog.locale);
    const supported = new Set(pluralRules.resolvedOptions().pluralCategories);
    pluralCategories = Object.freeze(PLURAL_CATEGORY_ORDER.filter((c) => supported.has(c)));
  }

  initialized = true;
}

export function isTranslationInitialized(): boolean {
  return initialized;
}

/** Locale of the installed catalog, or the configured fallback locale. */
export function getTranslationLocale(): string {
  return activeCatalog?.locale ?? getToolkitConfig().locale;
}

export function gettext(message: string): string {
  const translated = activeCatalog?.messages[message];
  if (typeof translated === "string") return translated;
  if (translated !== undefined) return translated[0] ?? message;
  return message;
}

/** Alias for `gettext`. */
export const _ = gettext;

export function ngettext(singular: string, plural: string, n: number): string {
  const translated = activeCatalog?.messages[singular];
  if (translated !== undefined && typeof translated !== "string" && pluralRules !== null) {
    const index = pluralCategories.indexOf(pluralRules.select(n));
    // Catalogs may list fewer forms than the locale has categories.
    const form = translated[index] ?? translated[translated.length - 1];
    if (form !== undefined) return form;
  }
  return n === 1 ? singular : plural;
}

/** Replace each `%s` in `template` with the next argument. */
export function formatMessage(template: string, ...args: readonly (string | number)[]): string {
  let next = 0;
  return template.replace(/%s/g, () => {
    const arg = args[next++];
    return arg === undefined ? "" : String(arg);
  });
}
