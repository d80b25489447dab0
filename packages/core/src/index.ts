/**
 * @logictrace/core - JsonLogic evaluation with executed-branch traces
 */
export * from "./values.js";
export * from "./diagnostics.js";
export { LogicError } from "./errors.js";
export type { LogicErrorCode } from "./errors.js";
export { toFloat, toNumeric, looseEquals, strictEquals, lessThan, lessOrEqual, merge } from "./coerce.js";
export { lookupPath, getVar, missing, missingSome } from "./resolve.js";
export type { Lookup } from "./resolve.js";
export {
  evaluate,
  operationKey,
  operandsOf,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
} from "./evaluator.js";
export type { EvalOptions, EvalResult, OperationKey } from "./evaluator.js";
export { getOperators, isKnownOperator, selectBranch, SPECIAL_OPERATORS } from "./ops/index.js";
export type { Arity, Branch, OperatorContext, OperatorFn } from "./ops/index.js";
export { validate, KNOWN_OPERATORS } from "./validator.js";
export type { ValidateOptions } from "./validator.js";
export {
  stderrLogSink,
  stdoutLogSink,
  silentLogSink,
  sinkFor,
  collectingLogSink,
  LOG_MODES,
} from "./log.js";
export type { LogSink, LogMode } from "./log.js";
export { resolveConfig, loadConfig, validateConfigShape, PROJECT_CONFIG_FILE } from "./config.js";
export type { LogicConfig, ResolvedConfig } from "./config.js";
