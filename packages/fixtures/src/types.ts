/**
 * Fixture file types and runtime validation.
 *
 * A fixture file is a JSON array. String entries open a new section;
 * every other entry is a `[rule, data, expected]` triple.
 */
import * as fs from "node:fs";
import { z } from "zod";
import type { LogicValue } from "@logictrace/core";

export const logicValueSchema: z.ZodType<LogicValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(logicValueSchema),
    z.record(logicValueSchema),
  ])
);

export const fixtureEntrySchema = z.union([
  z.string(),
  z.tuple([logicValueSchema, logicValueSchema, logicValueSchema]),
]);

export const fixtureFileSchema = z.array(fixtureEntrySchema, {
  invalid_type_error: "must be a JSON array of headings and [rule, data, expected] triples",
});

export interface FixtureCase {
  /** Position of the entry in its file. */
  index: number;
  /** Most recent heading above the entry, if any. */
  section: string | null;
  rule: LogicValue;
  data: LogicValue;
  expected: LogicValue;
}

export interface FixtureSuite {
  file: string;
  cases: FixtureCase[];
}

/**
 * Validate parsed fixture JSON.
 * Throws with a readable error naming the file and the failing entry.
 */
export function parseFixtureFile(raw: unknown, file: string): FixtureSuite {
  const result = fixtureFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const [index] = issue.path;
    const where = typeof index === "number" ? `entry ${index}: ` : "";
    throw new Error(`Fixture file '${file}': ${where}${issue.message}`);
  }

  const cases: FixtureCase[] = [];
  let section: string | null = null;
  result.data.forEach((entry, index) => {
    if (typeof entry === "string") {
      section = entry;
      return;
    }
    const [rule, data, expected] = entry;
    cases.push({ index, section, rule, data, expected });
  });
  return { file, cases };
}

export function loadFixtureFile(file: string): FixtureSuite {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Fixture file '${file}': cannot read: ${msg}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Fixture file '${file}': invalid JSON: ${msg}`);
  }
  return parseFixtureFile(raw, file);
}
