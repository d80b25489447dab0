/**
 * logictrace diagnostic types for validation and runtime errors.
 */
import { LogicError } from "./errors.js";

export interface Diagnostic {
  code: string;
  message: string;
  /** Rule location, e.g. `$.and[1].var`. */
  path?: string;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  path?: string,
  hint?: string
): Diagnostic {
  return { code, message, path, hint };
}

const HINTS: Record<string, string> = {
  E_UNKNOWN_VAR: "Supply a default as the second operand: {\"var\": [path, default]}.",
  E_UNKNOWN_OP: "Run 'logictrace check' to list every unrecognized operator.",
  E_DEPTH: "Raise maxDepth in .logictrace.json or pass --max-depth.",
};

export function diagnosticFromError(e: LogicError): Diagnostic {
  return makeDiag(e.code, e.message, e.path, HINTS[e.code]);
}

const NO_PATH = "<unknown>";

/** `error[CODE]: message`, then the rule location and an optional hint, each indented. */
function renderPretty({ code, message, path, hint }: Diagnostic): string {
  const lines = [`error[${code}]: ${message}`, `  --> ${path ?? NO_PATH}`];
  if (hint) lines.push(`  hint: ${hint}`);
  return lines.join("\n");
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  return pretty ? renderPretty(d) : JSON.stringify(d);
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  return pretty ? diags.map(renderPretty).join("\n\n") : JSON.stringify(diags);
}
