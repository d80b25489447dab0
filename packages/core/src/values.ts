/**
 * logictrace value model: the JSON-compatible values rules, data and traces are built from.
 */

export type LogicValue =
  | null
  | boolean
  | number
  | string
  | LogicValue[]
  | LogicRecord;

export type LogicRecord = { [key: string]: LogicValue };

export type ValueKind = "null" | "boolean" | "number" | "string" | "list" | "record";

export function kindOf(v: LogicValue): ValueKind {
  if (v === null) return "null";
  if (typeof v === "boolean") return "boolean";
  if (typeof v === "number") return "number";
  if (typeof v === "string") return "string";
  if (Array.isArray(v)) return "list";
  return "record";
}

export function isRecord(v: LogicValue): v is LogicRecord {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function hasKey(rec: LogicRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(rec, key);
}

// --- Truthiness ---
export function isTruthy(v: LogicValue): boolean {
  if (v === null || v === false || v === "") return false;
  if (typeof v === "number") return v !== 0 && !Number.isNaN(v);
  if (Array.isArray(v)) return v.length > 0;
  return true;
}

/**
 * Textual form used by `cat` and by loose equality when either side is a string.
 */
export function toText(v: LogicValue): string {
  if (typeof v === "string") return v;
  if (v === null) return "null";
  if (typeof v === "boolean" || typeof v === "number") return String(v);
  if (Array.isArray(v)) return v.map(toText).join(",");
  return JSON.stringify(v);
}

/**
 * Whether lists and records in `v` nest at most `limit` levels deep.
 * Uses an explicit stack, so deep and self-referential values are safe to measure.
 */
export function nestsWithin(v: LogicValue, limit: number): boolean {
  const stack: Array<[LogicValue, number]> = [[v, 0]];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const [node, depth] = top;
    if (node === null || typeof node !== "object") continue;
    if (depth >= limit) return false;
    for (const child of Array.isArray(node) ? node : Object.values(node)) {
      stack.push([child, depth + 1]);
    }
  }
  return true;
}

export function deepEqual(a: LogicValue, b: LogicValue): boolean {
  if (a === b) return true;

  if (a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    for (const key of aKeys) {
      if (!hasKey(b, key)) return false;
      if (!deepEqual(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}
