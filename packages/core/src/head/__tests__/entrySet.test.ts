import { assert, describe, test } from "@formwork/testkit";
import { renderToString } from "../../html/writer.js";
import {
  commentEntry,
  externalJavaScriptEntry,
  headEntryKey,
  inlineScriptEntry,
  javaScriptEntry,
  styleSheetEntry,
} from "../entries.js";
import { HtmlHeadEntrySet } from "../entrySet.js";

describe("HtmlHeadEntrySet", () => {
  test("drops duplicates and keeps first-seen order", () => {
    const set = new HtmlHeadEntrySet();
    set.addEntry(styleSheetEntry("a.css"));
    set.addEntry(javaScriptEntry("a.js"));
    set.addEntry(styleSheetEntry("a.css"));
    set.addEntry(styleSheetEntry("b.css"));
    assert.equal(set.size, 3);
    assert.deepEqual(set.toArray(), [
      styleSheetEntry("a.css"),
      javaScriptEntry("a.js"),
      styleSheetEntry("b.css"),
    ]);
  });

  test("same resource under different kinds is kept twice", () => {
    const set = new HtmlHeadEntrySet([javaScriptEntry("x.js"), externalJavaScriptEntry("x.js")]);
    assert.equal(set.size, 2);
    assert.notEqual(headEntryKey(javaScriptEntry("x.js")), headEntryKey(externalJavaScriptEntry("x.js")));
  });

  test("addEntrySet unions two sets", () => {
    const a = new HtmlHeadEntrySet([styleSheetEntry("a.css")]);
    const b = new HtmlHeadEntrySet([styleSheetEntry("a.css"), styleSheetEntry("b.css")]);
    a.addEntrySet(b);
    assert.deepEqual(
      a.getByKind("stylesheet").map((entry) => entry.uri),
      ["a.css", "b.css"],
    );
    assert.equal(a.has(styleSheetEntry("b.css")), true);
    assert.equal(b.size, 2);
  });

  test("display groups entries by kind, one per line", () => {
    const set = new HtmlHeadEntrySet([
      inlineScriptEntry("init();"),
      javaScriptEntry("app.js"),
      styleSheetEntry("app.css"),
      externalJavaScriptEntry("https://cdn.example.test/lib.js"),
      commentEntry("built -- today"),
    ]);
    const html = renderToString((out) => set.display(out, { baseUri: "/static/" }));
    assert.equal(
      html,
      [
        "<!-- built - - today -->",
        '<link rel="stylesheet" type="text/css" href="/static/app.css" />',
        '<script type="text/javascript" src="https://cdn.example.test/lib.js"></script>',
        '<script type="text/javascript" src="/static/app.js"></script>',
        '<script type="text/javascript">\n//<![CDATA[\ninit();\n//]]>\n</script>',
        "",
      ].join("\n"),
    );
  });

  test("absolute URIs ignore the base URI", () => {
    const set = new HtmlHeadEntrySet([styleSheetEntry("/root.css"), styleSheetEntry("http://x.test/y.css")]);
    const html = renderToString((out) => set.display(out, { baseUri: "/static/" }));
    assert.equal(
      html,
      '<link rel="stylesheet" type="text/css" href="/root.css" />\n' +
        '<link rel="stylesheet" type="text/css" href="http://x.test/y.css" />\n',
    );
  });
});
