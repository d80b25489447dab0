/**
 * logictrace fixtures - run [rule, data, expected] fixture files
 */
import * as path from "node:path";
import { formatDiagnostic, loadConfig } from "@logictrace/core";
import {
  applyFixtureTextFilter,
  discoverFixtureFiles,
  formatOutcome,
  getFixtureRoots,
  loadFixtureFile,
  mergeSummaries,
  runFixtureSuite,
} from "@logictrace/fixtures";
import type { DiscoveredFixture, FixtureOutcome, SuiteReport } from "@logictrace/fixtures";

export interface FixturesCommandOptions {
  filter?: string;
  json?: boolean;
  cwd?: string;
  homeDir?: string;
  /** Extra search roots, path-delimited; defaults to LOGICTRACE_FIXTURE_ROOTS. */
  extraRoots?: string;
}

function explicitFixture(file: string, cwd: string): DiscoveredFixture {
  const full = path.resolve(cwd, file);
  return { id: path.basename(full), file: full, relPath: file, root: cwd };
}

function outcomeJson(o: FixtureOutcome): Record<string, unknown> {
  const base = { index: o.fixture.index, section: o.fixture.section, status: o.status };
  switch (o.status) {
    case "pass":
      return base;
    case "fail":
      return { ...base, mismatch: o.mismatch, actual: o.actual };
    case "error":
      return { ...base, error: o.error };
  }
}

export async function runFixtures(files: string[], opts: FixturesCommandOptions): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const discovered =
    files.length > 0
      ? files.map((f) => explicitFixture(f, cwd))
      : discoverFixtureFiles(getFixtureRoots(cwd, opts.extraRoots ?? process.env["LOGICTRACE_FIXTURE_ROOTS"]));
  const selected = applyFixtureTextFilter(discovered, opts.filter);

  if (selected.length === 0) {
    console.error(formatDiagnostic({ code: "E_FIXTURE", message: "No fixture files found." }, !opts.json));
    return 4;
  }

  const { maxDepth } = loadConfig(cwd, opts.homeDir);
  const reports: SuiteReport[] = [];
  for (const entry of selected) {
    try {
      const report = runFixtureSuite(loadFixtureFile(entry.file), { maxDepth });
      reports.push({ ...report, file: entry.relPath });
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(formatDiagnostic({ code: "E_FIXTURE", message: msg }, !opts.json));
      return 4;
    }
  }

  const summary = mergeSummaries(reports.map((r) => r.summary));

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          files: reports.map((r) => ({
            file: r.file,
            summary: r.summary,
            failures: r.outcomes.filter((o) => o.status !== "pass").map(outcomeJson),
          })),
          summary,
        },
        null,
        2
      )
    );
  } else {
    for (const report of reports) {
      for (const outcome of report.outcomes) {
        if (outcome.status !== "pass") console.log(formatOutcome(report.file, outcome));
      }
    }
    console.log(
      `${summary.passed} passed, ${summary.failed} failed, ${summary.errored} errored ` +
        `(${summary.total} cases in ${reports.length} files)`
    );
  }

  return summary.failed + summary.errored > 0 ? 5 : 0;
}
