/**
 * Fixture runner: evaluates fixture cases and compares results.
 */
import type { Diagnostic, EvalOptions, LogicValue } from "@logictrace/core";
import { LogicError, diagnosticFromError, evaluate, silentLogSink } from "@logictrace/core";
import type { FixtureCase, FixtureSuite } from "./types.js";
import { describeMismatch } from "./assertions.js";

export type FixtureOutcome =
  | { status: "pass"; fixture: FixtureCase; actual: LogicValue }
  | { status: "fail"; fixture: FixtureCase; actual: LogicValue; mismatch: string }
  | { status: "error"; fixture: FixtureCase; error: Diagnostic };

export interface FixtureSummary {
  total: number;
  passed: number;
  failed: number;
  errored: number;
}

export interface SuiteReport {
  file: string;
  outcomes: FixtureOutcome[];
  summary: FixtureSummary;
}

/**
 * Evaluate one case. Evaluation errors become `error` outcomes;
 * `log` output is discarded unless a sink is given.
 */
export function runFixtureCase(fixture: FixtureCase, options: EvalOptions = {}): FixtureOutcome {
  let actual: LogicValue;
  try {
    actual = evaluate(fixture.rule, fixture.data, { log: silentLogSink, ...options }).value;
  } catch (e) {
    if (e instanceof LogicError) {
      return { status: "error", fixture, error: diagnosticFromError(e) };
    }
    throw e;
  }

  const mismatch = describeMismatch(actual, fixture.expected);
  if (mismatch) {
    return { status: "fail", fixture, actual, mismatch };
  }
  return { status: "pass", fixture, actual };
}

export function runFixtureSuite(suite: FixtureSuite, options: EvalOptions = {}): SuiteReport {
  const outcomes = suite.cases.map((c) => runFixtureCase(c, options));
  return { file: suite.file, outcomes, summary: summarize(outcomes) };
}

export function summarize(outcomes: FixtureOutcome[]): FixtureSummary {
  const summary: FixtureSummary = { total: outcomes.length, passed: 0, failed: 0, errored: 0 };
  for (const o of outcomes) {
    if (o.status === "pass") summary.passed++;
    else if (o.status === "fail") summary.failed++;
    else summary.errored++;
  }
  return summary;
}

export function mergeSummaries(summaries: FixtureSummary[]): FixtureSummary {
  return summaries.reduce(
    (acc, s) => ({
      total: acc.total + s.total,
      passed: acc.passed + s.passed,
      failed: acc.failed + s.failed,
      errored: acc.errored + s.errored,
    }),
    { total: 0, passed: 0, failed: 0, errored: 0 }
  );
}

/** One line per case: `PASS <file>#<index>` plus the reason for failures. */
export function formatOutcome(file: string, o: FixtureOutcome): string {
  const where = o.fixture.section ? `${file}#${o.fixture.index} (${o.fixture.section})` : `${file}#${o.fixture.index}`;
  switch (o.status) {
    case "pass":
      return `PASS ${where}`;
    case "fail":
      return `FAIL ${where}\n  ${o.mismatch}`;
    case "error":
      return `ERROR ${where}\n  ${o.error.code}: ${o.error.message}`;
  }
}
