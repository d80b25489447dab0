/**
 * Operator table entry shape.
 */
import type { LogicValue } from "../values.js";
import type { LogSink } from "../log.js";

/** Accepted operand count; `max` omitted means unbounded. */
export interface Arity {
  min: number;
  max?: number;
}

export interface OperatorContext {
  log: LogSink;
}

export interface OperatorFn {
  name: string;
  arity?: Arity;
  execute(args: LogicValue[], ctx: OperatorContext): LogicValue;
}

export function exactly(n: number): Arity {
  return { min: n, max: n };
}

export function acceptsCount(arity: Arity | undefined, count: number): boolean {
  if (!arity) return true;
  if (count < arity.min) return false;
  return arity.max === undefined || count <= arity.max;
}

export function describeArity(arity: Arity): string {
  if (arity.max === arity.min) return `exactly ${arity.min}`;
  if (arity.max === undefined) return `at least ${arity.min}`;
  return `${arity.min} to ${arity.max}`;
}
