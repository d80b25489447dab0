/**
 * Value comparison helpers shared by the fixture runner and its tests.
 */
import * as assert from "node:assert/strict";
import type { LogicValue } from "@logictrace/core";
import { deepEqual, hasKey, isRecord, kindOf } from "@logictrace/core";

function formatValue(value: LogicValue): string {
  // NaN and the infinities have no JSON form
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  return JSON.stringify(value);
}

/**
 * First difference between `actual` and `expected`, as
 * `<path>: expected X but got Y`, or null when they are equal.
 */
export function describeMismatch(
  actual: LogicValue,
  expected: LogicValue,
  path = "$"
): string | null {
  if (kindOf(actual) !== kindOf(expected)) {
    return `${path}: expected ${formatValue(expected)} but got ${formatValue(actual)}`;
  }

  if (Array.isArray(expected) && Array.isArray(actual)) {
    if (actual.length !== expected.length) {
      return `${path}: expected ${expected.length} items but got ${actual.length}`;
    }
    for (let i = 0; i < expected.length; i++) {
      const mismatch = describeMismatch(actual[i], expected[i], `${path}[${i}]`);
      if (mismatch) return mismatch;
    }
    return null;
  }

  if (isRecord(expected) && isRecord(actual)) {
    for (const key of Object.keys(expected)) {
      if (!hasKey(actual, key)) {
        return `${path}.${key}: key missing`;
      }
      const mismatch = describeMismatch(actual[key], expected[key], `${path}.${key}`);
      if (mismatch) return mismatch;
    }
    for (const key of Object.keys(actual)) {
      if (!hasKey(expected, key)) {
        return `${path}.${key}: unexpected key`;
      }
    }
    return null;
  }

  if (!deepEqual(actual, expected)) {
    return `${path}: expected ${formatValue(expected)} but got ${formatValue(actual)}`;
  }
  return null;
}

export function assertSameValue(actual: LogicValue, expected: LogicValue, label: string): void {
  const mismatch = describeMismatch(actual, expected);
  if (mismatch) {
    assert.fail(`${label}: value mismatch at ${mismatch}`);
  }
}
