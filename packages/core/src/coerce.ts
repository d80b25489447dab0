/**
 * Value coercion rules shared by the operator table.
 * Pure functions: no data context, no recursion into rules.
 */
import type { LogicValue } from "./values.js";
import { deepEqual, isTruthy, kindOf, toText } from "./values.js";

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;
const REL_TOLERANCE = 1e-9;

/**
 * Numeric value of `v`, or NaN when it has none.
 * Booleans count as 0/1; strings must hold a decimal literal.
 */
export function toFloat(v: LogicValue): number {
  if (typeof v === "number") return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const s = v.trim();
    if (DECIMAL_RE.test(s)) return Number(s);
    if (/^[+-]?Infinity$/.test(s)) return Number(s);
    return NaN;
  }
  return NaN;
}

/**
 * Strings become numbers (fractional when they contain a '.', integral otherwise).
 * Everything else passes through unchanged.
 */
export function toNumeric(v: LogicValue): LogicValue {
  if (typeof v !== "string") return v;
  if (v.includes(".")) return toFloat(v);
  const s = v.trim();
  return INTEGER_RE.test(s) ? Number(s) : NaN;
}

export function looseEquals(a: LogicValue, b: LogicValue): boolean {
  if (typeof a === "string" || typeof b === "string") {
    return toText(a) === toText(b);
  }
  if (typeof a === "boolean" || typeof b === "boolean") {
    return isTruthy(a) === isTruthy(b);
  }
  return deepEqual(a, b);
}

function almostEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= REL_TOLERANCE * Math.max(Math.abs(a), Math.abs(b));
}

export function strictEquals(a: LogicValue, b: LogicValue): boolean {
  if (kindOf(a) !== kindOf(b)) return false;
  if (deepEqual(a, b)) return true;
  return typeof a === "number" && typeof b === "number" && almostEqual(a, b);
}

function lessPair(a: LogicValue, b: LogicValue): boolean {
  if (typeof a === "number" || typeof b === "number") {
    const x = toFloat(a);
    const y = toFloat(b);
    if (Number.isNaN(x) || Number.isNaN(y)) return false;
    return x < y;
  }
  if (typeof a === "string" && typeof b === "string") return a < b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) < Number(b);
  return false;
}

/**
 * `a < b`, chained across `rest` so that `lessThan(1, x, 10)` reads "x strictly between".
 */
export function lessThan(a: LogicValue, b: LogicValue, ...rest: LogicValue[]): boolean {
  if (!lessPair(a, b)) return false;
  if (rest.length === 0) return true;
  return lessThan(b, rest[0], ...rest.slice(1));
}

export function lessOrEqual(a: LogicValue, b: LogicValue, ...rest: LogicValue[]): boolean {
  if (!(lessPair(a, b) || looseEquals(a, b))) return false;
  if (rest.length === 0) return true;
  return lessOrEqual(b, rest[0], ...rest.slice(1));
}

/**
 * Flatten one level: list arguments contribute their elements, scalars themselves.
 */
export function merge(...args: LogicValue[]): LogicValue[] {
  const out: LogicValue[] = [];
  for (const arg of args) {
    if (Array.isArray(arg)) {
      out.push(...arg);
    } else {
      out.push(arg);
    }
  }
  return out;
}
