/**
 * logictrace static validator.
 * Reports the structural failures evaluation would hit, without any data.
 */
import type { LogicValue } from "./values.js";
import { isRecord, nestsWithin } from "./values.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, operandsOf, operationKey } from "./evaluator.js";
import { SPECIAL_OPERATORS, acceptsCount, describeArity, getOperators } from "./ops/index.js";

export interface ValidateOptions {
  maxDepth?: number;
}

/** Every operator name a rule may use, specials included, sorted. */
export const KNOWN_OPERATORS: readonly string[] = [
  ...SPECIAL_OPERATORS,
  ...getOperators().keys(),
].sort();

export function validate(rule: LogicValue, options: ValidateOptions = {}): Diagnostic[] {
  const diags: Diagnostic[] = [];
  const maxDepth = Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT);
  visit(rule, 0, "$", maxDepth, diags);
  return diags;
}

function visit(
  node: LogicValue,
  depth: number,
  at: string,
  maxDepth: number,
  diags: Diagnostic[]
): void {
  if (!isRecord(node)) {
    if (!nestsWithin(node, maxDepth)) {
      diags.push(makeDiag("E_DEPTH", `Literal list nesting exceeds the limit of ${maxDepth} levels.`, at));
    }
    return;
  }

  if (depth >= maxDepth) {
    diags.push(makeDiag(
      "E_DEPTH",
      `Rule nesting exceeds the limit of ${maxDepth} operation nodes.`,
      at
    ));
    return;
  }

  const key = operationKey(node);
  if (!key.ok) {
    diags.push(makeDiag("E_MALFORMED", key.message, at, "An operation node is an object with a single operator key."));
    return;
  }

  const op = key.op;
  const operands = operandsOf(node, op);
  checkOperator(op, operands, at, diags);

  operands.forEach((operand, i) => {
    visit(operand, depth + 1, `${at}.${op}[${i}]`, maxDepth, diags);
  });
}

function checkOperator(
  op: string,
  operands: LogicValue[],
  at: string,
  diags: Diagnostic[]
): void {
  if (op === "var") {
    if (operands.length > 2) {
      diags.push(makeDiag(
        "E_MALFORMED",
        `'var' takes a path and an optional default; got ${operands.length} operands.`,
        at
      ));
    }
    return;
  }

  if (op === "missing_some") {
    const [minRequired, names] = operands;
    if (operands.length !== 2) {
      diags.push(makeDiag(
        "E_MALFORMED",
        `'missing_some' takes exactly 2 operands; got ${operands.length}.`,
        at,
        "Use {\"missing_some\": [minRequired, [names...]]}."
      ));
    } else if (!isRecord(minRequired) && typeof minRequired !== "number") {
      diags.push(makeDiag("E_MALFORMED", "'missing_some' minimum must be a number.", at));
    } else if (!isRecord(names) && !Array.isArray(names)) {
      diags.push(makeDiag("E_MALFORMED", "'missing_some' names must be a list.", at));
    }
    return;
  }

  if (SPECIAL_OPERATORS.has(op)) return;

  const fn = getOperators().get(op);
  if (!fn) {
    diags.push(makeDiag(
      "E_UNKNOWN_OP",
      `Unrecognized operator '${op}'.`,
      at,
      `Known operators: ${KNOWN_OPERATORS.join(" ")}`
    ));
    return;
  }

  if (fn.arity && !acceptsCount(fn.arity, operands.length)) {
    diags.push(makeDiag(
      "E_MALFORMED",
      `'${op}' takes ${describeArity(fn.arity)} operand(s); got ${operands.length}.`,
      at
    ));
  }
}
