/**
 * logictrace operators: boolean logic and selection
 * !, !!, and, or, ?:, plus the branch selector behind `if`
 */
import type { LogicValue } from "../values.js";
import { isTruthy } from "../values.js";
import type { OperatorFn } from "./types.js";
import { exactly } from "./types.js";

export const notFn: OperatorFn = {
  name: "!",
  arity: exactly(1),
  execute([a]: LogicValue[]): LogicValue {
    return !isTruthy(a);
  },
};

export const truthyFn: OperatorFn = {
  name: "!!",
  arity: exactly(1),
  execute([a]: LogicValue[]): LogicValue {
    return isTruthy(a);
  },
};

/**
 * and { ...args } -> value
 * First falsy operand, else the last one; no operands yields true.
 */
export const andFn: OperatorFn = {
  name: "and",
  execute(args: LogicValue[]): LogicValue {
    let total: LogicValue = true;
    for (const arg of args) {
      total = isTruthy(total) ? arg : total;
    }
    return total;
  },
};

/**
 * or { ...args } -> value
 * First truthy operand, else the last one; no operands yields false.
 */
export const orFn: OperatorFn = {
  name: "or",
  execute(args: LogicValue[]): LogicValue {
    let total: LogicValue = false;
    for (const arg of args) {
      total = isTruthy(total) ? total : arg;
    }
    return total;
  },
};

export const ternaryFn: OperatorFn = {
  name: "?:",
  arity: exactly(3),
  execute([cond, whenTrue, whenFalse]: LogicValue[]): LogicValue {
    return isTruthy(cond) ? whenTrue : whenFalse;
  },
};

export interface Branch {
  value: LogicValue;
  /** Position of the chosen operand among the `if` operands. */
  index: number;
}

/**
 * Pick the `if` result from evaluated operands laid out as
 * cond, then, cond, then, ..., [else]. Null when no branch applies.
 */
export function selectBranch(args: LogicValue[]): Branch | null {
  for (let i = 0; i + 1 < args.length; i += 2) {
    if (isTruthy(args[i])) {
      return { value: args[i + 1], index: i + 1 };
    }
  }
  if (args.length % 2 === 1) {
    const index = args.length - 1;
    return { value: args[index], index };
  }
  return null;
}
