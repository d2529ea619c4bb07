import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Button, getTranslationLocale, gettext, isFormworkError, ngettext } from "@formwork/core";
import { assert, describe, test, withEnv } from "@formwork/testkit";
import { BUNDLED_LOCALE_DIR, initNodeTranslations, loadTranslationCatalog } from "../translations.js";

function withCatalogDir(files: Readonly<Record<string, string>>, fn: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "formwork-locale-"));
  try {
    for (const [name, content] of Object.entries(files)) writeFileSync(join(dir, name), content);
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

describe("loadTranslationCatalog", () => {
  test("reads the bundled catalog", () => {
    const catalog = loadTranslationCatalog(BUNDLED_LOCALE_DIR, "fr");
    assert.equal(catalog.locale, "fr");
    assert.equal(catalog.messages["Submit"], "Envoyer");
  });

  test("the file name supplies a missing locale", () => {
    withCatalogDir({ "de.json": '{"messages":{"Submit":"Absenden"}}' }, (dir) => {
      const catalog = loadTranslationCatalog(dir, "de");
      assert.equal(catalog.locale, "de");
      assert.deepEqual(catalog.messages, { Submit: "Absenden" });
    });
  });

  test("malformed catalogs are rejected", () => {
    withCatalogDir({ "xx.json": '{"messages":{"Submit":1}}' }, (dir) => {
      assert.throws(
        () => loadTranslationCatalog(dir, "xx"),
        (err: unknown) => isFormworkError(err, "FW_INVALID_PROPS"),
      );
    });
  });

  test("locales that are not tags are rejected before any file is read", () => {
    assert.throws(
      () => loadTranslationCatalog(BUNDLED_LOCALE_DIR, "../fr"),
      (err: unknown) => isFormworkError(err, "FW_INVALID_PROPS"),
    );
  });
});

// Installation is once per process, so these run in order.
describe("initNodeTranslations", () => {
  test("installs the catalog named by FORMWORK_LOCALE", () => {
    const locale = withEnv("FORMWORK_LOCALE", " fr ", () => initNodeTranslations());
    assert.equal(locale, "fr");
    assert.equal(getTranslationLocale(), "fr");
    assert.equal(gettext("Submit"), "Envoyer");
    assert.equal(new Button("b").getTitle(), "Envoyer");
  });

  test("plural forms follow the catalog locale", () => {
    assert.equal(ngettext("%s row", "%s rows", 1), "%s ligne");
    assert.equal(ngettext("%s row", "%s rows", 3), "%s lignes");
    assert.equal(ngettext("%s box", "%s boxes", 3), "%s boxes");
  });

  test("later calls keep the installed catalog", () => {
    assert.equal(initNodeTranslations({ locale: "en" }), null);
    assert.equal(gettext("Submit"), "Envoyer");
  });
});
