/**
 * logictrace operators: equality and ordering
 * ==, ===, !=, !==, <, <=, >, >=
 */
import type { LogicValue } from "../values.js";
import { lessOrEqual, lessThan, looseEquals, strictEquals } from "../coerce.js";
import type { OperatorFn } from "./types.js";
import { exactly } from "./types.js";

export const looseEqFn: OperatorFn = {
  name: "==",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return looseEquals(a, b);
  },
};

export const strictEqFn: OperatorFn = {
  name: "===",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return strictEquals(a, b);
  },
};

export const looseNeFn: OperatorFn = {
  name: "!=",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return !looseEquals(a, b);
  },
};

export const strictNeFn: OperatorFn = {
  name: "!==",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return !strictEquals(a, b);
  },
};

/**
 * < { a, b, ...rest } -> boolean
 * Three or more operands chain: {"<": [0, x, 10]} holds when x is strictly between.
 */
export const ltFn: OperatorFn = {
  name: "<",
  arity: { min: 2 },
  execute([a, b, ...rest]: LogicValue[]): LogicValue {
    return lessThan(a, b, ...rest);
  },
};

export const lteFn: OperatorFn = {
  name: "<=",
  arity: { min: 2 },
  execute([a, b, ...rest]: LogicValue[]): LogicValue {
    return lessOrEqual(a, b, ...rest);
  },
};

export const gtFn: OperatorFn = {
  name: ">",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return lessThan(b, a);
  },
};

export const gteFn: OperatorFn = {
  name: ">=",
  arity: exactly(2),
  execute([a, b]: LogicValue[]): LogicValue {
    return lessThan(b, a) || looseEquals(a, b);
  },
};
