import { assert, describe, test, withEnv } from "@formwork/testkit";
import { configureToolkit } from "../../config.js";
import { createTraceLogger, isTraceEnabled, setTraceSink } from "../trace.js";

describe("trace logger", () => {
  test("is silent unless enabled", () => {
    const lines: string[] = [];
    const prev = setTraceSink((line) => lines.push(line));
    try {
      withEnv("FORMWORK_TRACE", undefined, () => {
        createTraceLogger("test").emit("stage");
      });
      assert.deepEqual(lines, []);
    } finally {
      setTraceSink(prev);
    }
  });

  test("env flag enables records", () => {
    withEnv("FORMWORK_TRACE", "yes", () => assert.equal(isTraceEnabled(), true));
    withEnv("FORMWORK_TRACE", "0", () => assert.equal(isTraceEnabled(), false));
  });

  test("records are JSON lines with scope, stage and fields", () => {
    const lines: string[] = [];
    const prev = setTraceSink((line) => lines.push(line));
    configureToolkit({ trace: true });
    try {
      createTraceLogger("widget").emit("init", { kind: "button", id: "b1" });
    } finally {
      configureToolkit(undefined);
      setTraceSink(prev);
    }
    assert.equal(lines.length, 1);
    const record: unknown = JSON.parse(lines[0] ?? "");
    if (typeof record !== "object" || record === null) throw new Error("expected a JSON object");
    assert.equal(Reflect.get(record, "scope"), "widget");
    assert.equal(Reflect.get(record, "stage"), "init");
    assert.equal(Reflect.get(record, "kind"), "button");
    assert.equal(Reflect.get(record, "id"), "b1");
    assert.equal(typeof Reflect.get(record, "ts"), "string");
  });

  test("a failing sink does not throw", () => {
    const prev = setTraceSink(() => {
      throw new Error("disk full");
    });
    configureToolkit({ trace: true });
    try {
      assert.doesNotThrow(() => createTraceLogger("widget").emit("display"));
    } finally {
      configureToolkit(undefined);
      setTraceSink(prev);
    }
  });
});
