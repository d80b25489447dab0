/**
 * logictrace operators: lists and membership
 * merge, count, in
 */
import type { LogicValue } from "../values.js";
import { deepEqual, hasKey, isRecord, isTruthy } from "../values.js";
import { merge } from "../coerce.js";
import type { OperatorFn } from "./types.js";
import { exactly } from "./types.js";

export const mergeFn: OperatorFn = {
  name: "merge",
  execute(args: LogicValue[]): LogicValue {
    return merge(...args);
  },
};

/**
 * count { ...args } -> number
 * Number of truthy operands.
 */
export const countFn: OperatorFn = {
  name: "count",
  execute(args: LogicValue[]): LogicValue {
    return args.filter(isTruthy).length;
  },
};

/**
 * in { a, b } -> boolean
 * - string b: substring check (a must be a string)
 * - list b: element membership by structural equality
 * - record b: key existence (a must be a string)
 * Anything else is false.
 */
export const inFn: OperatorFn = {
  name: "in",
  arity: exactly(2),
  execute([needle, haystack]: LogicValue[]): LogicValue {
    if (typeof haystack === "string") {
      return typeof needle === "string" && haystack.includes(needle);
    }
    if (Array.isArray(haystack)) {
      return haystack.some((el) => deepEqual(el, needle));
    }
    if (isRecord(haystack)) {
      return typeof needle === "string" && hasKey(haystack, needle);
    }
    return false;
  },
};
