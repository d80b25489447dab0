/**
 * Sinks for the `log` operator.
 */
import type { LogicValue } from "./values.js";

export type LogSink = (value: LogicValue) => void;

export type LogMode = "stderr" | "stdout" | "silent";

export const LOG_MODES: readonly LogMode[] = ["stderr", "stdout", "silent"];

export const stderrLogSink: LogSink = (value) => {
  console.error(JSON.stringify(value));
};

export const stdoutLogSink: LogSink = (value) => {
  console.log(JSON.stringify(value));
};

export const silentLogSink: LogSink = () => {};

export function sinkFor(mode: LogMode): LogSink {
  switch (mode) {
    case "stderr":
      return stderrLogSink;
    case "stdout":
      return stdoutLogSink;
    case "silent":
      return silentLogSink;
  }
}

/**
 * Sink that keeps every logged value in memory, in order.
 */
export function collectingLogSink(): { sink: LogSink; values: LogicValue[] } {
  const values: LogicValue[] = [];
  return { sink: (value) => values.push(value), values };
}
