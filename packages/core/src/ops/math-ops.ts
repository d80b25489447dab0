/**
 * logictrace operators: arithmetic
 * +, -, *, /, %, min, max
 */
import type { LogicValue } from "../values.js";
import { lessThan, toFloat, toNumeric } from "../coerce.js";
import type { OperatorFn } from "./types.js";
import { exactly } from "./types.js";

function asNumber(v: LogicValue): number {
  const n = toNumeric(v);
  if (typeof n === "number") return n;
  if (typeof n === "boolean") return n ? 1 : 0;
  return NaN;
}

/**
 * + { ...args } -> number
 * Sum; a single string operand is cast to a number.
 */
export const addFn: OperatorFn = {
  name: "+",
  execute(args: LogicValue[]): LogicValue {
    let sum = 0;
    for (const arg of args) sum += asNumber(arg);
    return sum;
  },
};

/**
 * - { a, b? } -> number
 * One operand negates, two subtract.
 */
export const subFn: OperatorFn = {
  name: "-",
  arity: { min: 1, max: 2 },
  execute(args: LogicValue[]): LogicValue {
    if (args.length === 1) return -asNumber(args[0]);
    return asNumber(args[0]) - asNumber(args[1]);
  },
};

export const mulFn: OperatorFn = {
  name: "*",
  execute(args: LogicValue[]): LogicValue {
    let product = 1;
    for (const arg of args) product *= toFloat(arg);
    return product;
  },
};

/**
 * / { a, b? } -> value
 * One operand is returned as is; two divide.
 */
export const divFn: OperatorFn = {
  name: "/",
  arity: { min: 1, max: 2 },
  execute(args: LogicValue[]): LogicValue {
    if (args.length === 1) return args[0];
    return toFloat(args[0]) / toFloat(args[1]);
  },
};

export const modFn: OperatorFn = {
  name: "%",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return asNumber(a) % asNumber(b);
  },
};

export const minFn: OperatorFn = {
  name: "min",
  arity: { min: 1 },
  execute(args: LogicValue[]): LogicValue {
    return args.reduce((best, v) => (lessThan(v, best) ? v : best));
  },
};

export const maxFn: OperatorFn = {
  name: "max",
  arity: { min: 1 },
  execute(args: LogicValue[]): LogicValue {
    return args.reduce((best, v) => (lessThan(best, v) ? v : best));
  },
};
