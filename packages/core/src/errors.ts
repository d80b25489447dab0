/**
 * logictrace runtime error.
 */
import type { LogicRecord } from "./values.js";

export type LogicErrorCode =
  | "E_UNKNOWN_VAR"
  | "E_UNKNOWN_OP"
  | "E_MALFORMED"
  | "E_DEPTH";

export class LogicError extends Error {
  code: LogicErrorCode;
  path?: string;
  details?: LogicRecord;

  constructor(code: LogicErrorCode, message: string, path?: string, details?: LogicRecord) {
    super(message);
    this.name = "LogicError";
    this.code = code;
    this.path = path;
    this.details = details;
  }
}
