import { assert, createHtmlRecorder, describe, test } from "@formwork/testkit";
import { isFormworkError } from "../../errors.js";
import { BooleanCellRenderer, type CellRenderer, LinkCellRenderer, TextCellRenderer } from "../cellRenderer.js";
import { CellRendererSet } from "../cellRendererSet.js";

function render(renderer: CellRenderer): string {
  const out = createHtmlRecorder();
  renderer.render(out);
  return out.text();
}

describe("cell renderers", () => {
  test("text is escaped unless marked as markup", () => {
    const renderer = new TextCellRenderer("a < b");
    assert.equal(render(renderer), "a &lt; b");
    renderer.contentType = "text/xml";
    renderer.text = "<em>b</em>";
    assert.equal(render(renderer), "<em>b</em>");
    renderer.visible = false;
    assert.equal(render(renderer), "");
  });

  test("boolean renderers mark true values", () => {
    const renderer = new BooleanCellRenderer();
    renderer.setMappedProperty("value", 1);
    assert.equal(render(renderer), "✓");
    assert.deepEqual(renderer.getDataSpecificCSSClassNames(), ["formwork-boolean-cell-renderer-true"]);
    renderer.setMappedProperty("value", 0);
    assert.equal(render(renderer), "");
    assert.deepEqual(renderer.getDataSpecificCSSClassNames(), ["formwork-boolean-cell-renderer-false"]);
  });

  test("links fill the placeholder and fall back to a span", () => {
    const renderer = new LinkCellRenderer();
    renderer.link = "/items/%s/edit";
    renderer.linkValue = 7;
    renderer.text = "Edit & save";
    assert.equal(render(renderer), '<a href="/items/7/edit">Edit &amp; save</a>');

    renderer.sensitive = false;
    assert.equal(render(renderer), '<span class="formwork-link-cell-renderer-insensitive">Edit &amp; save</span>');
  });

  test("unknown properties cannot be set", () => {
    assert.throws(
      () => new TextCellRenderer().setMappedProperty("colour", "red"),
      (err: unknown) => isFormworkError(err, "FW_INVALID_PROPERTY") && err.detail.key === "colour",
    );
  });

  test("inheritance classes run from general to specific", () => {
    class PriceRenderer extends TextCellRenderer {
      override readonly kind: string = "priceRenderer";
      override getInheritanceCSSClassNames(): readonly string[] {
        return [...super.getInheritanceCSSClassNames(), "price-renderer"];
      }
    }
    assert.deepEqual(new PriceRenderer().getInheritanceCSSClassNames(), [
      "formwork-text-cell-renderer",
      "price-renderer",
    ]);
  });
});

describe("CellRendererSet", () => {
  test("mappings copy row fields onto renderers", () => {
    const set = new CellRendererSet();
    const link = new LinkCellRenderer();
    set.addRendererWithMappings(link, [
      { property: "linkValue", field: "id" },
      { property: "text", field: "name" },
    ]);
    set.addMappingToRenderer(link, "url", "link");

    assert.equal(set.mappingsApplied(), false);
    set.applyMappingsToRenderer(link, { id: "x9", name: "Nine", url: "/n/%s" });
    assert.equal(set.mappingsApplied(), true);
    assert.equal(link.getLink(), "/n/x9");
    assert.equal(link.text, "Nine");
    assert.deepEqual(set.getMappingsByRenderer(link), [
      { property: "linkValue", field: "id" },
      { property: "text", field: "name" },
      { property: "link", field: "url" },
    ]);
  });

  test("a mapping to an undeclared property is rejected", () => {
    const set = new CellRendererSet();
    const text = new TextCellRenderer();
    assert.throws(
      () => set.addRendererWithMappings(text, [{ property: "value", field: "done" }]),
      (err: unknown) => isFormworkError(err, "FW_INVALID_PROPERTY") && err.detail.key === "value",
    );
  });

  test("a row without the mapped field is rejected", () => {
    const set = new CellRendererSet();
    const text = new TextCellRenderer();
    set.addRendererWithMappings(text, [{ property: "text", field: "title" }]);
    assert.throws(
      () => set.applyMappingsToRenderer(text, { name: "x" }),
      (err: unknown) => isFormworkError(err, "FW_INVALID_PROPERTY") && err.detail.key === "title",
    );
  });

  test("renderers keep their order and can be found by id", () => {
    const set = new CellRendererSet();
    const first = new TextCellRenderer("a");
    const second = new BooleanCellRenderer();
    second.id = "done";
    set.addRenderer(first);
    set.addRenderer(second);

    assert.equal(set.getFirst(), first);
    assert.equal(set.getCount(), 2);
    assert.deepEqual([...set], [first, second]);
    assert.equal(set.getRenderer("done"), second);
    assert.equal(set.getRenderer("missing"), null);
  });

  test("copies carry renderers and mappings but not state", () => {
    const set = new CellRendererSet();
    const text = new TextCellRenderer();
    text.id = "label";
    set.addRendererWithMappings(text, [{ property: "text", field: "name" }]);

    const copy = set.copy("_1");
    const copied = copy.getFirst();
    assert.notEqual(copied, text);
    assert.equal(copied?.id, "label_1");
    assert.equal(copy.mappingsApplied(), false);
    if (copied !== null) {
      copy.applyMappingsToRenderer(copied, { name: "copied" });
    }
    assert.equal(text.text, "");
  });
});
