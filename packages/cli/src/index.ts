/**
 * @logictrace/cli - command entry points
 */
export { runEval } from "./cmd-eval.js";
export type { EvalCommandOptions } from "./cmd-eval.js";
export { runCheck } from "./cmd-check.js";
export { runFixtures } from "./cmd-fixtures.js";
export type { FixturesCommandOptions } from "./cmd-fixtures.js";
export { runConfig } from "./cmd-config.js";
export { readJsonInput } from "./input.js";
export type { JsonInput } from "./input.js";
export { VERSION } from "./version.js";
