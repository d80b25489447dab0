/**
 * logictrace check - static validation command
 */
import { validate, loadConfig, formatDiagnostics } from "@logictrace/core";
import { readJsonInput } from "./input.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; maxDepth?: number; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;
  const rule = readJsonInput(file, "rule", pretty);
  if (!rule.ok) return rule.exitCode;

  const maxDepth = opts.maxDepth ?? loadConfig(opts.cwd, opts.homeDir).maxDepth;
  const diags = validate(rule.value, { maxDepth });
  if (diags.length > 0) {
    console.error(formatDiagnostics(diags, pretty));
    return 2;
  }

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
