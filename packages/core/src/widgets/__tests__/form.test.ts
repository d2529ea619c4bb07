import { assert, createHtmlRecorder, describe, test } from "@formwork/testkit";
import { configureToolkit } from "../../config.js";
import { isFormworkError } from "../../errors.js";
import { javaScriptEntry } from "../../head/entries.js";
import { BUTTON_JAVASCRIPT, Button } from "../button.js";
import { Container } from "../container.js";
import { Entry, IntegerEntry, parseInteger } from "../entry.js";
import { FORM_ID_FIELD, Form } from "../form.js";
import type { Widget } from "../widget.js";

configureToolkit({ baseStylesheet: null });

function render(widget: Widget): string {
  const out = createHtmlRecorder();
  widget.display(out);
  return out.text();
}

function submit(form: Form, data: Readonly<Record<string, string>>): void {
  form.setSubmittedData({ [FORM_ID_FIELD]: form.id ?? "", ...data });
  form.process();
}

function messages(widget: Widget): readonly string[] {
  return widget.getMessages().map((m) => m.primaryContent);
}

class CountingForm extends Form {
  runs = 0;

  override process(): void {
    this.runs++;
    super.process();
  }
}

describe("Form", () => {
  test("renders children and the hidden form id", () => {
    const form = new Form("signup");
    form.add(new Entry("name"));
    assert.equal(
      render(form),
      '<form id="signup" method="post" action="#" class="formwork-form">' +
        '<input type="text" name="name" id="name" class="formwork-entry" value="" size="50" />' +
        '<div class="formwork-hidden">' +
        '<input type="hidden" name="_formwork_form_id" value="signup" />' +
        "</div></form>",
    );
  });

  test("hidden fields follow the form id field", () => {
    const form = new Form("f");
    form.method = "get";
    form.action = "/save?a=1&b=2";
    form.addHiddenField("token", "test-token");
    form.addHiddenField("token", "replaced");
    assert.equal(form.getHiddenField("token"), "replaced");
    assert.equal(
      render(form),
      '<form id="f" method="get" action="/save?a=1&amp;b=2" class="formwork-form">' +
        '<div class="formwork-hidden">' +
        '<input type="hidden" name="_formwork_form_id" value="f" />' +
        '<input type="hidden" name="token" value="replaced" />' +
        "</div></form>",
    );
  });

  test("the form id field name is reserved", () => {
    assert.throws(
      () => new Form("f").addHiddenField(FORM_ID_FIELD, "x"),
      (err: unknown) => isFormworkError(err, "FW_CONSTRUCTION"),
    );
  });

  test("a generated id identifies the submission", () => {
    const form = new Form();
    form.init();
    const id = form.id ?? "";
    assert.match(id, /^form\d+$/);
    form.setSubmittedData({ [FORM_ID_FIELD]: id });
    assert.equal(form.isSubmitted(), true);
  });

  test("data for another form is not processed", () => {
    const form = new Form("mine");
    const entry = new Entry("name");
    form.add(entry);
    form.setSubmittedData({ [FORM_ID_FIELD]: "theirs", name: "x" });
    form.process();

    assert.equal(form.isSubmitted(), false);
    assert.equal(form.getValue("name"), undefined);
    assert.equal(entry.isProcessed(), false);
    assert.equal(entry.value, null);
  });

  test("process marks the form processed without a submission", () => {
    const form = new Form("f");
    const entry = new Entry("name");
    form.add(entry);
    form.process();

    assert.equal(form.isProcessed(), true);
    assert.equal(entry.isProcessed(), false);
  });

  test("an enclosing container processes an unsubmitted form once", () => {
    const outer = new Container();
    const form = new CountingForm("f");
    outer.add(form);
    outer.process();
    outer.process();

    assert.equal(form.runs, 1);
  });

  test("submitted values reach nested widgets", () => {
    const form = new Form("f");
    const entry = new Entry("name");
    form.add(entry);
    submit(form, { name: "  Ada  " });

    assert.equal(form.getValue("name"), "  Ada  ");
    assert.equal(entry.value, "Ada");
    assert.equal(
      render(entry),
      '<input type="text" name="name" id="name" class="formwork-entry" value="Ada" size="50" />',
    );
  });

  test("malformed text is rejected", () => {
    const form = new Form("f");
    assert.throws(
      () => form.setSubmittedData({ [FORM_ID_FIELD]: "f", name: "bad\uD800" }),
      (err: unknown) => isFormworkError(err, "FW_INVALID_CHARACTER_ENCODING") && err.detail.key === "name",
    );
    assert.equal(form.isSubmitted(), false);
  });

  test("repeated values keep their order", () => {
    const form = new Form("f");
    form.setSubmittedData({ [FORM_ID_FIELD]: "f", tags: ["a", "b"] });
    assert.deepEqual(form.getValue("tags"), ["a", "b"]);
  });

  test("copy forgets the submission", () => {
    const form = new Form("f");
    form.setSubmittedData({ [FORM_ID_FIELD]: "f" });
    const copy = form.copy();
    assert.equal(form.isSubmitted(), true);
    assert.equal(copy.isSubmitted(), false);
  });
});

describe("Button", () => {
  test("renders a submit input with the default title", () => {
    const button = new Button("go");
    assert.equal(render(button), '<input type="submit" name="go" id="go" value="Submit" class="formwork-button" />');
    assert.equal(button.getHtmlHeadEntrySet().has(javaScriptEntry(BUTTON_JAVASCRIPT)), true);
  });

  test("an insensitive button is disabled", () => {
    const button = new Button("go");
    button.title = "Save";
    button.sensitive = false;
    assert.equal(
      render(button),
      '<input type="submit" name="go" id="go" value="Save" class="formwork-button formwork-insensitive" disabled="disabled" />',
    );
  });

  test("confirmation and throbber settings write a bootstrap script", () => {
    const button = new Button("go");
    button.confirmationMessage = 'Really "delete"?';
    button.showProcessingThrobber = true;
    button.processingMessage = "Working";
    const html = render(button);
    assert.equal(
      html.slice(html.indexOf("<script")),
      '<script type="text/javascript">\n//<![CDATA[\n' +
        'var go_obj = new FormworkButton("go", true);\n' +
        'go_obj.setProcessingMessage("Working");\n' +
        'go_obj.setConfirmationMessage("Really \\"delete\\"?");\n' +
        "//]]>\n</script>",
    );
  });

  test("a submitted name counts as a click", () => {
    const form = new Form("f");
    const save = new Button("save");
    const cancel = new Button("cancel");
    form.add(save);
    form.add(cancel);
    submit(form, { save: "Save" });

    assert.equal(save.hasBeenClicked(), true);
    assert.equal(cancel.hasBeenClicked(), false);
    assert.equal(form.getFocusableHtmlId(), "save");
  });
});

describe("Entry", () => {
  test("required entries reject blank input", () => {
    const form = new Form("f");
    const entry = new Entry("name");
    entry.label = "Name";
    entry.required = true;
    form.add(entry);
    submit(form, { name: "   " });

    assert.equal(entry.value, null);
    assert.deepEqual(messages(entry), ["The Name field is required."]);
    assert.equal(entry.getMessages()[0]?.type, "error");
  });

  test("maxlength is enforced on trimmed text", () => {
    const form = new Form("f");
    const entry = new Entry("code");
    entry.maxlength = 3;
    form.add(entry);
    submit(form, { code: " abcd " });
    assert.deepEqual(messages(entry), ["The code field can be at most 3 characters long."]);
    assert.equal(
      render(entry),
      '<input type="text" name="code" id="code" class="formwork-entry" value="abcd" size="50" maxlength="3" />',
    );
  });

  test("nothing submitted leaves the value alone", () => {
    const form = new Form("f");
    const entry = new Entry("name");
    entry.value = "kept";
    form.add(entry);
    submit(form, {});
    assert.equal(entry.value, "kept");
    assert.equal(entry.hasMessage(), false);
  });
});

describe("IntegerEntry", () => {
  function submitInteger(value: string): IntegerEntry {
    const form = new Form("f");
    const entry = new IntegerEntry("qty");
    entry.label = "Quantity";
    form.add(entry);
    submit(form, { qty: value });
    return entry;
  }

  test("parses integers", () => {
    const entry = submitInteger(" 42 ");
    assert.equal(entry.integerValue, 42);
    assert.equal(entry.hasMessage(), false);
    assert.equal(
      render(entry),
      '<input type="text" name="qty" id="qty" class="formwork-integer-entry formwork-entry" value="42" size="5" />',
    );
  });

  test("non-integers become error messages", () => {
    const entry = submitInteger("4.5");
    assert.equal(entry.integerValue, null);
    assert.deepEqual(messages(entry), ["The Quantity field must be an integer."]);
  });

  test("overflow becomes a too large or too small message", () => {
    assert.deepEqual(messages(submitInteger("99999999999999999999")), ["The Quantity field is too large."]);
    assert.deepEqual(messages(submitInteger("-99999999999999999999")), ["The Quantity field is too small."]);
  });
});

describe("parseInteger", () => {
  test("accepts signs and surrounding whitespace", () => {
    assert.equal(parseInteger(" +7 "), 7);
    assert.equal(parseInteger("-12"), -12);
    assert.equal(parseInteger("1e3"), null);
    assert.equal(parseInteger(""), null);
  });

  test("reports the overflow sign", () => {
    assert.throws(
      () => parseInteger("9007199254740992"),
      (err: unknown) => isFormworkError(err, "FW_INTEGER_OVERFLOW") && err.detail.sign === 1,
    );
    assert.throws(
      () => parseInteger("-9007199254740992"),
      (err: unknown) => isFormworkError(err, "FW_INTEGER_OVERFLOW") && err.detail.sign === -1,
    );
  });
});
