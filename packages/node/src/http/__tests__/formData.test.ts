import { assert, describe, test } from "@formwork/testkit";
import { DEFAULT_MAX_BODY_BYTES, parseUrlEncodedBody, readRequestBody } from "../formData.js";

async function* chunks(...parts: readonly (Uint8Array | string)[]): AsyncGenerator<Uint8Array | string> {
  for (const part of parts) yield part;
}

describe("parseUrlEncodedBody", () => {
  test("decodes fields and groups repeated names", () => {
    assert.deepEqual(parseUrlEncodedBody("name=Ada+L&tags=a&tags=b&empty=&mark=%E2%9C%93"), {
      name: "Ada L",
      tags: ["a", "b"],
      empty: "",
      mark: "✓",
    });
  });

  test("an empty body has no fields", () => {
    assert.deepEqual(parseUrlEncodedBody(""), {});
  });

  test("the result is frozen", () => {
    const data = parseUrlEncodedBody("a=1&a=2");
    assert.equal(Object.isFrozen(data), true);
    assert.equal(Object.isFrozen(data["a"]), true);
  });
});

describe("readRequestBody", () => {
  test("joins chunks before decoding", async () => {
    const check = Buffer.from("✓", "utf8");
    const body = await readRequestBody(chunks("a=", check.subarray(0, 1), check.subarray(1)));
    assert.equal(body, "a=✓");
  });

  test("rejects bodies over the limit", async () => {
    await assert.rejects(readRequestBody(chunks("abc", "de"), { maxBytes: 4 }), {
      name: "RangeError",
      message: "request body exceeds 4 bytes",
    });
  });

  test("a body at the limit is accepted", async () => {
    assert.equal(await readRequestBody(chunks("ab", "cd"), { maxBytes: 4 }), "abcd");
    assert.equal(DEFAULT_MAX_BODY_BYTES, 1048576);
  });
});
