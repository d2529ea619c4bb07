/**
 * packages/node/src/i18n/translations.ts: Translation catalogs on disk.
 *
 * Catalogs are JSON files named `<locale>.json`:
 *   { "locale": "fr", "messages": { "Submit": "Envoyer" } }
 * The package ships its own catalogs under `locale/`.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { FormworkError, type TranslationCatalog, initTranslations } from "@formwork/core";

/** Directory of the catalogs bundled with this package. */
export const BUNDLED_LOCALE_DIR = fileURLToPath(new URL("../../locale/", import.meta.url));

function readEnv(name: string): string | null {
  const raw = process.env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function isMessages(value: unknown): value is Record<string, string | readonly string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (v) => typeof v === "string" || (Array.isArray(v) && v.every((form) => typeof form === "string")),
  );
}

/**
 * Read `<dir>/<locale>.json`.
 *
 * @throws FormworkError FW_INVALID_PROPS when the locale is not a plain tag or
 *   the file is not a catalog
 */
export function loadTranslationCatalog(dir: string, locale: string): TranslationCatalog {
  if (!/^[A-Za-z]{2,8}(?:[-_][A-Za-z0-9]{1,8})*$/.test(locale)) {
    throw new FormworkError("FW_INVALID_PROPS", `locale "${locale}" is not a valid locale tag`);
  }
  const path = join(dir, `${locale}.json`);
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (typeof parsed !== "object" || parsed === null || !("messages" in parsed) || !isMessages(parsed.messages)) {
    throw new FormworkError("FW_INVALID_PROPS", `translation catalog ${path} must have a "messages" object`);
  }
  const catalogLocale = "locale" in parsed && typeof parsed.locale === "string" ? parsed.locale : locale;
  return Object.freeze({ locale: catalogLocale, messages: parsed.messages });
}

export type NodeTranslationOptions = Readonly<{
  /** Catalog directory. Defaults to the bundled catalogs. */
  dir?: string | undefined;
  /** Locale to load. Defaults to FORMWORK_LOCALE; none means untranslated. */
  locale?: string | undefined;
}>;

/**
 * Install the catalog for the requested locale once per process. Returns the
 * installed locale, or null when strings stay untranslated.
 */
export function initNodeTranslations(opts: NodeTranslationOptions = {}): string | null {
  const locale = opts.locale ?? readEnv("FORMWORK_LOCALE");
  if (locale === null || locale === "en") {
    initTranslations();
    return null;
  }
  const catalog = loadTranslationCatalog(opts.dir ?? BUNDLED_LOCALE_DIR, locale);
  initTranslations(catalog);
  return catalog.locale;
}
