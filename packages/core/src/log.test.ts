import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { collectingLogSink, sinkFor, silentLogSink, stderrLogSink, stdoutLogSink } from "./log.js";

function captureConsole(run: () => void): { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origErr = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));
  try {
    run();
  } finally {
    console.log = origLog;
    console.error = origErr;
  }
  return { out, err };
}

describe("log sinks", () => {
  it("maps every mode to its sink", () => {
    assert.equal(sinkFor("stderr"), stderrLogSink);
    assert.equal(sinkFor("stdout"), stdoutLogSink);
    assert.equal(sinkFor("silent"), silentLogSink);
  });

  it("writes one JSON document per value to stderr", () => {
    const { out, err } = captureConsole(() => {
      stderrLogSink({ a: [1, "x"] });
      stderrLogSink("plain");
    });
    assert.deepEqual(out, []);
    assert.deepEqual(err, ['{"a":[1,"x"]}', '"plain"']);
  });

  it("writes to stdout in stdout mode", () => {
    const { out, err } = captureConsole(() => stdoutLogSink(null));
    assert.deepEqual(out, ["null"]);
    assert.deepEqual(err, []);
  });

  it("drops values in silent mode", () => {
    const { out, err } = captureConsole(() => silentLogSink(1));
    assert.deepEqual(out, []);
    assert.deepEqual(err, []);
  });

  it("collects values in order", () => {
    const { sink, values } = collectingLogSink();
    sink(1);
    sink([true]);
    assert.deepEqual(values, [1, [true]]);
  });
});
