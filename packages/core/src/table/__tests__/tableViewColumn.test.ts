import { assert, createHtmlRecorder, describe, test } from "@formwork/testkit";
import { configureToolkit } from "../../config.js";
import { isFormworkError } from "../../errors.js";
import { createMessage } from "../../ui/message.js";
import { Entry } from "../../widgets/entry.js";
import { BooleanCellRenderer, LinkCellRenderer, TextCellRenderer } from "../cellRenderer.js";
import { InputCell } from "../inputCell.js";
import { TableView } from "../tableView.js";
import { TableViewColumn } from "../tableViewColumn.js";

configureToolkit({ baseStylesheet: null });

function cell(column: TableViewColumn, row: object): string {
  const out = createHtmlRecorder();
  column.display(row, out);
  return out.text();
}

function header(column: TableViewColumn): string {
  const out = createHtmlRecorder();
  column.displayHeaderCell(out);
  return out.text();
}

describe("TableViewColumn display", () => {
  test("renderers share one cell separated by a space", () => {
    const column = new TableViewColumn();
    column.addRenderer(new TextCellRenderer("Apple"));
    column.addRenderer(new TextCellRenderer("Pie"));
    assert.equal(cell(column, {}), '<td class="formwork-text-cell-renderer">Apple Pie</td>');
  });

  test("a column without renderers cannot display", () => {
    assert.throws(
      () => cell(new TableViewColumn("empty"), {}),
      (err: unknown) =>
        isFormworkError(err, "FW_CONSTRUCTION") &&
        err.message === "No renderer has been provided for this column.",
    );
  });

  test("mapped row fields reach the renderers", () => {
    const column = new TableViewColumn("item");
    const link = new LinkCellRenderer();
    link.link = "/items/%s";
    column.addRenderer(link, [
      { property: "linkValue", field: "id" },
      { property: "text", field: "name" },
    ]);
    assert.equal(
      cell(column, { id: 7, name: "Widget <b>" }),
      '<td class="item formwork-link-cell-renderer"><a href="/items/7">Widget &lt;b&gt;</a></td>',
    );
    assert.equal(
      cell(column, { id: 8, name: "Gadget" }),
      '<td class="item formwork-link-cell-renderer"><a href="/items/8">Gadget</a></td>',
    );
  });

  test("an insensitive view makes renderers insensitive", () => {
    const view = new TableView("v");
    const column = new TableViewColumn("item");
    const link = new LinkCellRenderer();
    link.link = "/x";
    link.text = "X";
    column.addRenderer(link);
    view.appendColumn(column);
    view.sensitive = false;
    assert.equal(
      cell(column, {}),
      '<td class="item formwork-link-cell-renderer"><span class="formwork-link-cell-renderer-insensitive">X</span></td>',
    );
  });

  test("an invisible column writes nothing", () => {
    const column = new TableViewColumn();
    column.addRenderer(new TextCellRenderer("x"));
    column.visible = false;
    assert.equal(cell(column, {}), "");
    assert.equal(header(column), "");
  });
});

describe("TableViewColumn classes", () => {
  function paidColumn(): TableViewColumn {
    const column = new TableViewColumn("paid_flag", "Paid");
    column.classes.push("user-col");
    const renderer = new BooleanCellRenderer();
    renderer.classes.push("r-user");
    column.addRenderer(renderer, [{ property: "value", field: "paid" }]);
    return column;
  }

  test("data-specific classes appear once mappings were applied", () => {
    const column = paidColumn();
    assert.equal(column.getThAttributes().class, "paid-flag user-col formwork-boolean-cell-renderer r-user");
    assert.equal(
      cell(column, { paid: true }),
      '<td class="paid-flag user-col formwork-boolean-cell-renderer formwork-boolean-cell-renderer-true r-user">✓</td>',
    );
  });

  test("generated ids are not used as classes", () => {
    const column = new TableViewColumn(null, "Name");
    column.addRenderer(new TextCellRenderer("x"));
    column.init();
    assert.match(column.id ?? "", /^tableViewColumn\d+$/);
    assert.equal(column.getTdAttributes().class, "formwork-text-cell-renderer");
  });

  test("base classes of a column type follow the id class", () => {
    class NumberColumn extends TableViewColumn {
      protected override getBaseCSSClassNames(): readonly string[] {
        return ["number-column"];
      }
    }
    const column = new NumberColumn("qty");
    column.classes.push("wide");
    assert.equal(column.getTdAttributes().class, "qty number-column wide");
  });
});

describe("TableViewColumn header", () => {
  test("titles are written with minimal escaping", () => {
    const column = new TableViewColumn("price", "Price & Tax &nbsp;");
    column.addRenderer(new TextCellRenderer());
    assert.equal(column.hasHeader(), true);
    assert.equal(
      header(column),
      '<th class="price formwork-text-cell-renderer" scope="col">Price &amp; Tax &nbsp;</th>',
    );
  });

  test("empty titles render a non-breaking space", () => {
    const column = new TableViewColumn();
    assert.equal(column.hasHeader(), false);
    assert.equal(header(column), '<th scope="col">&nbsp;</th>');
  });

  test("abbreviated titles render an abbr", () => {
    const column = new TableViewColumn(null, "Quantity");
    column.abbreviatedTitle = "Qty";
    assert.equal(header(column), '<th scope="col"><abbr title="Quantity">Qty</abbr></th>');
  });
});

describe("TableViewColumn children", () => {
  test("addChild dispatches renderers and one input cell", () => {
    const column = new TableViewColumn("c");
    const renderer = new TextCellRenderer();
    const input = new InputCell(new Entry("e"));
    column.addChild(renderer);
    column.addChild(input);

    assert.deepEqual(column.getRenderers(), [renderer]);
    assert.equal(renderer.parent, column);
    assert.equal(column.getInputCell(), input);
    assert.equal(input.parent, column);

    assert.throws(
      () => column.addChild(new InputCell(new Entry("f"))),
      (err: unknown) =>
        isFormworkError(err, "FW_CONSTRUCTION") &&
        err.message === "Only one input cell may be added to a table-view column.",
    );
    assert.throws(
      () => column.addChild(new Entry("g")),
      (err: unknown) => isFormworkError(err, "FW_INVALID_CLASS"),
    );
  });

  test("renderers are found by id", () => {
    const column = new TableViewColumn("c");
    const renderer = new TextCellRenderer();
    renderer.id = "label";
    column.addRenderer(renderer);
    assert.equal(column.getRenderer("label"), renderer);
    assert.throws(
      () => column.getRenderer("nope"),
      (err: unknown) => isFormworkError(err, "FW_NOT_FOUND") && err.detail.key === "nope",
    );
  });

  test("an input cell needs an input row in the view", () => {
    const view = new TableView("v");
    const column = new TableViewColumn("c");
    column.setInputCell(new InputCell(new Entry("e")));
    view.appendColumn(column);
    assert.throws(
      () => column.init(),
      (err: unknown) =>
        isFormworkError(err, "FW_CONSTRUCTION") && err.message === "Table-view does not have an input row.",
    );
  });

  test("renderer messages are reported per row", () => {
    const column = new TableViewColumn("c");
    const renderer = new TextCellRenderer();
    column.addRenderer(renderer, [{ property: "text", field: "name" }]);
    assert.equal(column.hasMessage({ name: "a" }), false);
    renderer.addMessage(createMessage("check this", "warning"));
    assert.deepEqual(
      column.getMessages({ name: "a" }).map((m) => m.primaryContent),
      ["check this"],
    );
  });

  test("head entries include renderers and the input cell widget", () => {
    const column = new TableViewColumn("c");
    const renderer = new TextCellRenderer();
    renderer.addStyleSheet("renderer.css");
    const entry = new Entry("e");
    entry.addJavaScript("entry.js");
    column.addRenderer(renderer);
    column.setInputCell(new InputCell(entry));
    assert.equal(column.getHtmlHeadEntrySet().size, 2);
  });
});
