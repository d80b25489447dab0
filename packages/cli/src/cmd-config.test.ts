/**
 * Tests for logictrace config command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";

async function captureConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runConfig(opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("logictrace config", () => {
  it("prints a human-readable project config summary", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "logictrace-cli-config-project-"));
    const configPath = path.join(projectDir, ".logictrace.json");
    fs.writeFileSync(configPath, JSON.stringify({ version: 1, maxDepth: 100, log: "stdout" }));

    try {
      const result = await captureConfig({ cwd: projectDir, homeDir: projectDir });
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "");
      assert.equal(
        result.stdout,
        [
          "Effective logictrace config",
          "  Source:    project",
          `  Path:      ${configPath}`,
          "  Version:   1",
          "  Max depth: 100",
          "  Log:       stdout",
        ].join("\n")
      );
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
    }
  });

  it("returns JSON with user source when the project config is invalid", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "logictrace-cli-config-project-"));
    const fakeHome = fs.mkdtempSync(path.join(os.tmpdir(), "logictrace-cli-config-home-"));
    const userDir = path.join(fakeHome, ".logictrace");
    const userPath = path.join(userDir, "config.json");
    fs.mkdirSync(userDir, { recursive: true });
    fs.writeFileSync(path.join(projectDir, ".logictrace.json"), JSON.stringify({ maxDepth: -1 }));
    fs.writeFileSync(userPath, JSON.stringify({ log: "silent" }));

    try {
      const result = await captureConfig({ json: true, cwd: projectDir, homeDir: fakeHome });
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "user",
        path: userPath,
        config: { version: 1, maxDepth: 512, log: "silent" },
      });
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
      fs.rmSync(fakeHome, { recursive: true, force: true });
    }
  });

  it("reports defaults when no config exists", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "logictrace-cli-config-"));
    try {
      const result = await captureConfig({ json: true, cwd: tmpDir, homeDir: tmpDir });
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "default",
        path: null,
        config: { version: 1, maxDepth: 512, log: "stderr" },
      });
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
