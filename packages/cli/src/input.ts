/**
 * Reading JSON rule and data documents for CLI commands.
 */
import * as fs from "node:fs";
import { formatDiagnostic } from "@logictrace/core";
import type { LogicValue } from "@logictrace/core";

export type JsonInput =
  | { ok: true; value: LogicValue }
  | { ok: false; exitCode: number };

/**
 * Read and parse `file` (`-` is stdin). On failure the diagnostic has
 * already been written to stderr: E_IO exits 4, E_PARSE exits 2.
 */
export function readJsonInput(file: string, what: string, pretty: boolean): JsonInput {
  let text: string;
  try {
    text = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading ${what}: ${msg}` }, pretty));
    return { ok: false, exitCode: 4 };
  }

  try {
    const value: LogicValue = JSON.parse(text);
    return { ok: true, value };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_PARSE", message: `Invalid JSON in ${what}: ${msg}` }, pretty));
    return { ok: false, exitCode: 2 };
  }
}
