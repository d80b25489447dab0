/**
 * logictrace evaluator - walks a rule tree against a data context and
 * records the sub-rules that actually contributed to the result.
 */
import type { LogicRecord, LogicValue } from "./values.js";
import { isRecord, nestsWithin } from "./values.js";
import { LogicError } from "./errors.js";
import type { LogSink } from "./log.js";
import { stderrLogSink } from "./log.js";
import { getVar, missing, missingSome } from "./resolve.js";
import type { OperatorContext, OperatorFn } from "./ops/index.js";
import { acceptsCount, describeArity, getOperators, selectBranch } from "./ops/index.js";

export const DEFAULT_MAX_DEPTH = 512;
/** Larger `maxDepth` settings are clamped to this. */
export const MAX_DEPTH_LIMIT = 1024;

export interface EvalOptions {
  /** Receives every value passed to the `log` operator. */
  log?: LogSink;
  /**
   * Deepest allowed nesting of operation nodes. Literal lists and the data
   * context may nest lists and records no deeper than this either.
   */
  maxDepth?: number;
}

export interface EvalResult {
  value: LogicValue;
  /** The rule reduced to the branches that were evaluated. */
  executed: LogicValue;
}

interface EvalContext {
  data: LogicValue;
  maxDepth: number;
  table: ReadonlyMap<string, OperatorFn>;
  ops: OperatorContext;
}

export type OperationKey =
  | { ok: true; op: string }
  | { ok: false; message: string };

/**
 * The operator name of an operation node, which must have exactly one key.
 */
export function operationKey(node: LogicRecord): OperationKey {
  const keys = Object.keys(node);
  if (keys.length === 0) {
    return { ok: false, message: "Operation node has no operator key." };
  }
  if (keys.length > 1) {
    return {
      ok: false,
      message: `Operation node has ${keys.length} keys (${keys.map((k) => `'${k}'`).join(", ")}); expected exactly one.`,
    };
  }
  return { ok: true, op: keys[0] };
}

/**
 * Operands of an operation node; a bare non-list operand stands for a one-element list.
 */
export function operandsOf(node: LogicRecord, op: string): LogicValue[] {
  const raw = node[op];
  return Array.isArray(raw) ? raw : [raw];
}

export function evaluate(
  rule: LogicValue,
  data: LogicValue = {},
  options: EvalOptions = {}
): EvalResult {
  const log = options.log ?? stderrLogSink;
  const maxDepth = Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT);
  if (!nestsWithin(data, maxDepth)) {
    throw valueTooDeep("Data", maxDepth);
  }
  const ctx: EvalContext = {
    data,
    maxDepth,
    table: getOperators(),
    ops: { log },
  };
  return walk(rule, ctx, 0, "$");
}

function valueTooDeep(what: string, maxDepth: number, at?: string): LogicError {
  return new LogicError(
    "E_DEPTH",
    `${what} nesting exceeds the limit of ${maxDepth} levels.`,
    at,
    { maxDepth }
  );
}

function walk(node: LogicValue, ctx: EvalContext, depth: number, at: string): EvalResult {
  // Primitives and literal lists evaluate to themselves.
  if (!isRecord(node)) {
    if (!nestsWithin(node, ctx.maxDepth)) {
      throw valueTooDeep("Literal list", ctx.maxDepth, at);
    }
    return { value: node, executed: node };
  }

  if (depth >= ctx.maxDepth) {
    throw new LogicError(
      "E_DEPTH",
      `Rule nesting exceeds the limit of ${ctx.maxDepth} operation nodes.`,
      at,
      { maxDepth: ctx.maxDepth }
    );
  }

  const key = operationKey(node);
  if (!key.ok) {
    throw new LogicError("E_MALFORMED", key.message, at);
  }
  const op = key.op;

  const values: LogicValue[] = [];
  const traces: LogicValue[] = [];
  operandsOf(node, op).forEach((operand, i) => {
    const child = walk(operand, ctx, depth + 1, `${at}.${op}[${i}]`);
    values.push(child.value);
    traces.push(child.executed);
  });
  const executed: LogicRecord = { [op]: traces };

  switch (op) {
    case "var":
      return { value: getVar(ctx.data, values, at), executed };
    case "missing":
      return { value: missing(ctx.data, values), executed };
    case "missing_some":
      return { value: missingSome(ctx.data, values, at), executed };
    case "if": {
      const branch = selectBranch(values);
      if (!branch) {
        return { value: null, executed: {} };
      }
      return { value: branch.value, executed: traces[branch.index] };
    }
  }

  const fn = ctx.table.get(op);
  if (!fn) {
    throw new LogicError("E_UNKNOWN_OP", `Unrecognized operator '${op}'.`, at, { operator: op });
  }
  if (fn.arity && !acceptsCount(fn.arity, values.length)) {
    throw new LogicError(
      "E_MALFORMED",
      `'${op}' takes ${describeArity(fn.arity)} operand(s); got ${values.length}.`,
      at,
      { operator: op, count: values.length }
    );
  }

  return { value: fn.execute(values, ctx.ops), executed };
}
