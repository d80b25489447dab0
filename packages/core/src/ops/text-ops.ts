/**
 * logictrace operators: text and side channels
 * cat, log
 */
import type { LogicValue } from "../values.js";
import { toText } from "../values.js";
import type { OperatorContext, OperatorFn } from "./types.js";
import { exactly } from "./types.js";

export const catFn: OperatorFn = {
  name: "cat",
  execute(args: LogicValue[]): LogicValue {
    return args.map(toText).join("");
  },
};

/**
 * log { a } -> a
 * Hands the operand to the evaluation's log sink and passes it through.
 */
export const logFn: OperatorFn = {
  name: "log",
  arity: exactly(1),
  execute([a]: LogicValue[], ctx: OperatorContext): LogicValue {
    ctx.log(a);
    return a;
  },
};
