/**
 * logictrace operator table
 */
import type { OperatorFn } from "./types.js";
import { looseEqFn, strictEqFn, looseNeFn, strictNeFn, ltFn, lteFn, gtFn, gteFn } from "./compare-ops.js";
import { notFn, truthyFn, andFn, orFn, ternaryFn } from "./logic-ops.js";
import { addFn, subFn, mulFn, divFn, modFn, minFn, maxFn } from "./math-ops.js";
import { mergeFn, countFn, inFn } from "./list-ops.js";
import { catFn, logFn } from "./text-ops.js";

export type { Arity, OperatorContext, OperatorFn } from "./types.js";
export { acceptsCount, describeArity, exactly } from "./types.js";
export { selectBranch } from "./logic-ops.js";
export type { Branch } from "./logic-ops.js";

/**
 * Operators that read the data context or select among operands.
 * The evaluator dispatches these itself, before the table.
 */
export const SPECIAL_OPERATORS: ReadonlySet<string> = new Set(["var", "missing", "missing_some", "if"]);

function buildOperators(): ReadonlyMap<string, OperatorFn> {
  const ops = new Map<string, OperatorFn>();
  for (const fn of [
    looseEqFn, strictEqFn, looseNeFn, strictNeFn, ltFn, lteFn, gtFn, gteFn,
    notFn, truthyFn, andFn, orFn, ternaryFn,
    addFn, subFn, mulFn, divFn, modFn, minFn, maxFn,
    mergeFn, countFn, inFn,
    catFn, logFn,
  ]) {
    ops.set(fn.name, fn);
  }
  return ops;
}

const OPERATORS = buildOperators();

export function getOperators(): ReadonlyMap<string, OperatorFn> {
  return OPERATORS;
}

export function isKnownOperator(name: string): boolean {
  return SPECIAL_OPERATORS.has(name) || OPERATORS.has(name);
}
