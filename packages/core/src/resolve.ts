/**
 * Data-context lookups behind `var`, `missing` and `missing_some`.
 */
import type { LogicValue } from "./values.js";
import { hasKey, isRecord, toText } from "./values.js";
import { LogicError } from "./errors.js";

export type Lookup =
  | { found: true; value: LogicValue }
  | { found: false };

const INDEX_RE = /^\d+$/;

/**
 * Walk `data` along a dot-separated path. Records are indexed by key,
 * lists and strings by non-negative integer segment; anything else ends the walk.
 * An empty or null path yields the whole context.
 */
export function lookupPath(data: LogicValue, path: LogicValue): Lookup {
  if (path === null || path === "") {
    return { found: true, value: data };
  }

  let current: LogicValue = data;
  for (const segment of toText(path).split(".")) {
    if (isRecord(current)) {
      if (!hasKey(current, segment)) return { found: false };
      current = current[segment];
    } else if (Array.isArray(current) || typeof current === "string") {
      if (!INDEX_RE.test(segment)) return { found: false };
      const index = Number(segment);
      if (index >= current.length) return { found: false };
      current = current[index];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

/**
 * `var` over evaluated operands: `[]`, `[path]` or `[path, default]`.
 * A supplied default, null included, suppresses the not-found error.
 */
export function getVar(data: LogicValue, args: LogicValue[], at?: string): LogicValue {
  if (args.length === 0) return data;
  if (args.length > 2) {
    throw new LogicError(
      "E_MALFORMED",
      `'var' takes a path and an optional default; got ${args.length} operands.`,
      at,
      { operator: "var", count: args.length }
    );
  }

  const path = args[0];
  const hit = lookupPath(data, path);
  if (hit.found) return hit.value;
  if (args.length === 2) return args[1];

  const name = toText(path);
  throw new LogicError("E_UNKNOWN_VAR", `Unknown variable '${name}'.`, at, { variable: name });
}

/**
 * Names from `args` that do not resolve in `data`, in input order.
 * A leading list operand is taken as the whole name list.
 */
export function missing(data: LogicValue, args: LogicValue[]): LogicValue[] {
  const first = args[0];
  const names = Array.isArray(first) ? first : args;
  const out: LogicValue[] = [];
  for (const name of names) {
    if (!lookupPath(data, name).found) out.push(name);
  }
  return out;
}

/**
 * `[minRequired, names]`: empty once `minRequired` names resolve,
 * otherwise every name that did not.
 */
export function missingSome(data: LogicValue, args: LogicValue[], at?: string): LogicValue[] {
  const [minRequired, names] = args;
  if (args.length !== 2 || typeof minRequired !== "number" || !Array.isArray(names)) {
    throw new LogicError(
      "E_MALFORMED",
      "'missing_some' takes exactly [minRequired, names] with a numeric minimum and a list of names.",
      at,
      { operator: "missing_some", count: args.length }
    );
  }

  if (minRequired < 1) return [];

  let found = 0;
  const out: LogicValue[] = [];
  for (const name of names) {
    if (lookupPath(data, name).found) {
      found++;
      if (found >= minRequired) return [];
    } else {
      out.push(name);
    }
  }
  return out;
}
