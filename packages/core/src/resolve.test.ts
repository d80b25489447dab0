/**
 * Tests for data-context lookups.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { getVar, lookupPath, missing, missingSome } from "./resolve.js";
import { LogicError } from "./errors.js";

const data = {
  user: { name: "Ada", tags: ["admin", "ops"], address: { city: "Lyon" } },
  count: 0,
  nothing: null,
};

describe("lookupPath", () => {
  it("walks records and lists along dotted segments", () => {
    assert.deepEqual(lookupPath(data, "user.address.city"), { found: true, value: "Lyon" });
    assert.deepEqual(lookupPath(data, "user.tags.1"), { found: true, value: "ops" });
  });

  it("accepts numeric paths against a list context", () => {
    assert.deepEqual(lookupPath(["apple", "banana"], 1), { found: true, value: "banana" });
  });

  it("finds keys whose value is null or zero", () => {
    assert.deepEqual(lookupPath(data, "nothing"), { found: true, value: null });
    assert.deepEqual(lookupPath(data, "count"), { found: true, value: 0 });
  });

  it("returns the whole context for an empty or null path", () => {
    assert.deepEqual(lookupPath(data, ""), { found: true, value: data });
    assert.deepEqual(lookupPath(data, null), { found: true, value: data });
  });

  it("fails on absent keys, bad indexes and scalars", () => {
    assert.deepEqual(lookupPath(data, "count.0"), { found: false });
    assert.deepEqual(lookupPath(data, "user.email"), { found: false });
    assert.deepEqual(lookupPath(data, "user.tags.2"), { found: false });
    assert.deepEqual(lookupPath(data, "user.tags.-1"), { found: false });
    assert.deepEqual(lookupPath(data, "user.tags.first"), { found: false });
  });

  it("indexes strings by character", () => {
    assert.deepEqual(lookupPath(data, "user.name.0"), { found: true, value: "A" });
    assert.deepEqual(lookupPath("abc", 2), { found: true, value: "c" });
    assert.deepEqual(lookupPath(data, "user.name.3"), { found: false });
    assert.deepEqual(lookupPath(data, "user.name.first"), { found: false });
    assert.deepEqual(lookupPath(data, "user.name.0.0"), { found: true, value: "A" });
  });

  it("does not fall back to index access on records", () => {
    assert.deepEqual(lookupPath({ a: { x: 1 } }, "a.0"), { found: false });
  });
});

describe("getVar", () => {
  it("returns the resolved value", () => {
    assert.equal(getVar(data, ["user.name"]), "Ada");
  });

  it("returns the default when the path does not resolve", () => {
    assert.equal(getVar(data, ["user.email", "none"]), "none");
    assert.equal(getVar(data, ["user.email", null]), null);
  });

  it("returns the whole context without operands", () => {
    assert.equal(getVar(data, []), data);
  });

  it("throws E_UNKNOWN_VAR without a default", () => {
    assert.throws(
      () => getVar(data, ["user.email"], "$.var"),
      (err: unknown) =>
        err instanceof LogicError &&
        err.code === "E_UNKNOWN_VAR" &&
        err.path === "$.var" &&
        err.message === "Unknown variable 'user.email'."
    );
  });

  it("throws E_MALFORMED for more than two operands", () => {
    assert.throws(
      () => getVar(data, ["a", 1, 2]),
      (err: unknown) => err instanceof LogicError && err.code === "E_MALFORMED"
    );
  });
});

describe("missing", () => {
  it("lists unresolved names in input order", () => {
    assert.deepEqual(missing({ a: 1, c: 3 }, ["d", "a", "b"]), ["d", "b"]);
  });

  it("accepts a single list of names", () => {
    assert.deepEqual(missing({ a: 1 }, [["a", "b"]]), ["b"]);
  });

  it("returns an empty list when everything resolves", () => {
    assert.deepEqual(missing({ a: 1, b: null }, ["a", "b"]), []);
  });
});

describe("missingSome", () => {
  const fruit = { a: "apple" };

  it("reports missing names when the minimum is not met", () => {
    assert.deepEqual(missingSome(fruit, [2, ["a", "b", "c"]]), ["b", "c"]);
  });

  it("returns an empty list once the minimum is met", () => {
    assert.deepEqual(missingSome(fruit, [1, ["a", "b", "c"]]), []);
    assert.deepEqual(missingSome({ b: 1, c: 2 }, [2, ["a", "b", "c"]]), []);
  });

  it("returns an empty list for a minimum below one", () => {
    assert.deepEqual(missingSome({}, [0, ["a"]]), []);
  });

  it("rejects any shape other than [number, list]", () => {
    for (const args of [[1], [1, "a"], ["1", ["a"]], [1, ["a"], 2]]) {
      assert.throws(
        () => missingSome(fruit, args),
        (err: unknown) => err instanceof LogicError && err.code === "E_MALFORMED"
      );
    }
  });
});
