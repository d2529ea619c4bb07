import { assert, describe, test } from "@formwork/testkit";
import { isFormworkError } from "../../errors.js";
import {
  _,
  formatMessage,
  getTranslationLocale,
  gettext,
  initTranslations,
  isTranslationInitialized,
  ngettext,
} from "../translate.js";

// Translation state is process-wide: the tests below run in file order.

describe("translate before a catalog is installed", () => {
  test("strings pass through", () => {
    assert.equal(isTranslationInitialized(), false);
    assert.equal(gettext("Submit"), "Submit");
    assert.equal(ngettext("%s row", "%s rows", 1), "%s row");
    assert.equal(ngettext("%s row", "%s rows", 0), "%s rows");
    assert.equal(getTranslationLocale(), "en");
  });

  test("an invalid catalog is rejected and leaves state untouched", () => {
    assert.throws(
      () => initTranslations({ locale: "", messages: {} }),
      (err: unknown) => isFormworkError(err, "FW_INVALID_PROPS"),
    );
    assert.equal(isTranslationInitialized(), false);
  });
});

describe("translate with a catalog", () => {
  test("first catalog wins, later calls are ignored", () => {
    initTranslations({
      locale: "fr",
      messages: {
        Submit: "Envoyer",
        "%s row": ["%s ligne", "%s lignes"],
      },
    });
    initTranslations({ locale: "de", messages: { Submit: "Senden" } });

    assert.equal(isTranslationInitialized(), true);
    assert.equal(getTranslationLocale(), "fr");
    assert.equal(gettext("Submit"), "Envoyer");
    assert.equal(_("Submit"), "Envoyer");
    assert.equal(gettext("Cancel"), "Cancel");
  });

  test("plural forms follow the catalog locale", () => {
    // French treats 0 as singular. Categories past the forms given use the last form.
    assert.equal(ngettext("%s row", "%s rows", 0), "%s ligne");
    assert.equal(ngettext("%s row", "%s rows", 1), "%s ligne");
    assert.equal(ngettext("%s row", "%s rows", 2), "%s lignes");
    assert.equal(ngettext("%s row", "%s rows", 1000000), "%s lignes");
  });
});

describe("formatMessage", () => {
  test("replaces placeholders in order", () => {
    assert.equal(formatMessage("%s of %s", 2, "ten"), "2 of ten");
  });

  test("missing arguments become empty", () => {
    assert.equal(formatMessage("[%s|%s]", "a"), "[a|]");
  });
});
