/**
 * Tests for logictrace fixtures command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runFixtures } from "./cmd-fixtures.js";
import type { FixturesCommandOptions } from "./cmd-fixtures.js";

async function captureFixtures(
  files: string[],
  opts: FixturesCommandOptions
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runFixtures(files, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("logictrace fixtures", () => {
  let tmpDir: string;

  function run(files: string[], opts: FixturesCommandOptions = {}) {
    return captureFixtures(files, { cwd: tmpDir, homeDir: tmpDir, extraRoots: "", ...opts });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "logictrace-cli-fixtures-test-"));
    fs.mkdirSync(path.join(tmpDir, "fixtures", "math"), { recursive: true });
    fs.writeFileSync(
      path.join(tmpDir, "fixtures", "math", "sums.fixtures.json"),
      JSON.stringify(["Sums", [{ "+": [1, 2] }, {}, 3], [{ "+": [{ var: "n" }, 1] }, { n: 1 }, 2]])
    );
    fs.writeFileSync(
      path.join(tmpDir, "fixtures", "broken.fixtures.json"),
      JSON.stringify([[{ "*": [2, 2] }, {}, 5], [{ var: "x" }, {}, null]])
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("exits 0 when every case passes", async () => {
    const result = await run([], { filter: "sums" });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "2 passed, 0 failed, 0 errored (2 cases in 1 files)");
    assert.equal(result.stderr, "");
  });

  it("prints failures and errors, then exits 5", async () => {
    const result = await run([]);
    assert.equal(result.code, 5);
    assert.equal(
      result.stdout,
      [
        "FAIL broken.fixtures.json#0",
        "  $: expected 5 but got 4",
        "ERROR broken.fixtures.json#1",
        "  E_UNKNOWN_VAR: Unknown variable 'x'.",
        "2 passed, 1 failed, 1 errored (4 cases in 2 files)",
      ].join("\n")
    );
  });

  it("runs explicitly named files", async () => {
    const result = await run([path.join("fixtures", "math", "sums.fixtures.json")]);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "2 passed, 0 failed, 0 errored (2 cases in 1 files)");
  });

  it("reports results as JSON with --json", async () => {
    const result = await run([], { json: true, filter: "broken" });
    assert.equal(result.code, 5);
    const report = JSON.parse(result.stdout);
    assert.deepEqual(report.summary, { total: 2, passed: 0, failed: 1, errored: 1 });
    assert.equal(report.files.length, 1);
    assert.deepEqual(report.files[0].failures[0], {
      index: 0,
      section: null,
      status: "fail",
      mismatch: "$: expected 5 but got 4",
      actual: 4,
    });
    assert.equal(report.files[0].failures[1].error.code, "E_UNKNOWN_VAR");
  });

  it("exits 4 when a fixture file cannot be loaded", async () => {
    fs.writeFileSync(path.join(tmpDir, "fixtures", "bad.fixtures.json"), '{"not":"a list"}');
    const result = await run([], { filter: "bad" });
    assert.equal(result.code, 4);
    assert.ok(result.stderr.includes("must be a JSON array"), result.stderr);
  });

  it("exits 4 when nothing matches", async () => {
    const result = await run([], { filter: "nothing-matches" });
    assert.equal(result.code, 4);
    assert.equal(result.stderr, "error[E_FIXTURE]: No fixture files found.\n  --> <unknown>");
  });
});
