import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { assertSameValue, describeMismatch } from "./assertions.js";

describe("describeMismatch", () => {
  it("returns null for equal values", () => {
    assert.equal(describeMismatch({ a: [1, { b: null }] }, { a: [1, { b: null }] }), null);
    assert.equal(describeMismatch("x", "x"), null);
  });

  it("locates scalar differences inside lists", () => {
    assert.equal(describeMismatch([1, 4], [1, 3]), "$[1]: expected 3 but got 4");
  });

  it("reports kind differences without coercion", () => {
    assert.equal(describeMismatch("1", 1), '$: expected 1 but got "1"');
    assert.equal(describeMismatch({ n: [] }, { n: null }), "$.n: expected null but got []");
  });

  it("reports list length differences", () => {
    assert.equal(describeMismatch([1, 2, 3], [1, 2]), "$: expected 2 items but got 3");
  });

  it("reports missing and unexpected keys", () => {
    assert.equal(describeMismatch({ a: 1 }, { a: 1, b: 2 }), "$.b: key missing");
    assert.equal(describeMismatch({ a: 1, c: 3 }, { a: 1 }), "$.c: unexpected key");
  });

  it("prints non-finite numbers", () => {
    assert.equal(describeMismatch(NaN, 0), "$: expected 0 but got NaN");
    assert.equal(describeMismatch(1, -Infinity), "$: expected -Infinity but got 1");
  });
});

describe("assertSameValue", () => {
  it("passes on equal values", () => {
    assert.doesNotThrow(() => assertSameValue(["a"], ["a"], "same"));
  });

  it("fails with the label and mismatch location", () => {
    assert.throws(
      () => assertSameValue({ total: 4 }, { total: 3 }, "case-7"),
      { message: "case-7: value mismatch at $.total: expected 3 but got 4" }
    );
  });
});
