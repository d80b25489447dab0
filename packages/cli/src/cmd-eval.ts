/**
 * logictrace eval - evaluate a rule against a data document
 */
import * as fs from "node:fs";
import {
  evaluate,
  loadConfig,
  sinkFor,
  LogicError,
  diagnosticFromError,
  formatDiagnostic,
} from "@logictrace/core";
import type { LogicErrorCode, LogicValue, LogSink } from "@logictrace/core";
import { readJsonInput } from "./input.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface EvalCommandOptions {
  explain?: boolean;
  log?: string;
  maxDepth?: number;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

const EXIT_CODES: Record<LogicErrorCode, number> = {
  E_MALFORMED: 2,
  E_UNKNOWN_OP: 2,
  E_UNKNOWN_VAR: 3,
  E_DEPTH: 4,
};

export async function runEval(
  ruleFile: string,
  dataFile: string | undefined,
  opts: EvalCommandOptions
): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  if (dataFile === "-" && ruleFile === "-") {
    emitCliError("E_IO", "Only one of rule and data can be read from stdin.");
    return 4;
  }

  const rule = readJsonInput(ruleFile, "rule", pretty);
  if (!rule.ok) return rule.exitCode;

  let data: LogicValue = {};
  if (dataFile !== undefined) {
    const input = readJsonInput(dataFile, "data", pretty);
    if (!input.ok) return input.exitCode;
    data = input.value;
  }

  const config = loadConfig(opts.cwd, opts.homeDir);

  let logFd: number | null = null;
  if (opts.log) {
    try {
      logFd = fs.openSync(opts.log, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening log file: ${msg}`);
      return 4;
    }
  }

  const fd = logFd;
  const log: LogSink =
    fd !== null
      ? (value) => {
          const line = JSON.stringify({ ts: new Date().toISOString(), event: "log", value });
          try {
            fs.writeSync(fd, line + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing log file: ${msg}`);
          }
        }
      : sinkFor(config.log);

  try {
    const result = evaluate(rule.value, data, {
      log,
      maxDepth: opts.maxDepth ?? config.maxDepth,
    });

    const output = opts.explain ? { value: result.value, executed: result.executed } : result.value;
    console.log(JSON.stringify(output, null, 2));
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }

    if (e instanceof LogicError) {
      if (pretty) {
        console.error(formatDiagnostic(diagnosticFromError(e), true));
      } else {
        console.error(
          JSON.stringify({
            code: e.code,
            message: e.message,
            path: e.path,
            details: e.details,
          })
        );
      }
      return EXIT_CODES[e.code];
    }
    throw e;
  } finally {
    if (fd !== null) {
      fs.closeSync(fd);
    }
  }
}
