#!/usr/bin/env -S node --import tsx
/**
 * logictrace - evaluate JsonLogic rules and show the branches that ran
 */
import { Command, InvalidArgumentError } from "commander";
import { runEval } from "./cmd-eval.js";
import { runCheck } from "./cmd-check.js";
import { runFixtures } from "./cmd-fixtures.js";
import { runConfig } from "./cmd-config.js";
import { VERSION } from "./version.js";

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("logictrace")
  .description("Evaluate JsonLogic rules and report the branches that produced the result")
  .version(VERSION);

program
  .command("eval")
  .description("Evaluate a rule against a data document")
  .argument("<rule>", "JSON rule file (or - for stdin)")
  .argument("[data]", "JSON data file")
  .option("--explain", "Print { value, executed } instead of the value alone", false)
  .option("--log <path>", "Write JSONL log-operator output to file")
  .option("--max-depth <n>", "Deepest allowed rule and value nesting", parsePositiveInt)
  .option("--pretty", "Human-readable error output", false)
  .action(async (rule: string, data: string | undefined, opts: { explain?: boolean; log?: string; maxDepth?: number; pretty?: boolean }) => {
    const code = await runEval(rule, data, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Static validation without evaluation")
  .argument("<rule>", "JSON rule file (or - for stdin)")
  .option("--max-depth <n>", "Deepest allowed rule and value nesting", parsePositiveInt)
  .option("--pretty", "Human-readable output", false)
  .action(async (rule: string, opts: { pretty?: boolean; maxDepth?: number }) => {
    const code = await runCheck(rule, opts);
    process.exit(code);
  });

program
  .command("fixtures")
  .description("Run [rule, data, expected] fixture files")
  .argument("[files...]", "Fixture files (default: discover *.fixtures.json)")
  .option("--filter <text>", "Only run files whose name or path contains text")
  .option("--json", "Output as JSON", false)
  .action(async (files: string[], opts: { filter?: string; json?: boolean }) => {
    const code = await runFixtures(files, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and resolution source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["eval", "check", "fixtures", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
