/**
 * logictrace configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { LogMode } from "./log.js";
import { LOG_MODES } from "./log.js";
import { DEFAULT_MAX_DEPTH } from "./evaluator.js";

export interface LogicConfig {
  version: number;
  maxDepth: number;
  log: LogMode;
}

export interface ResolvedConfig {
  config: LogicConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".logictrace.json";

const DEFAULT_CONFIG: LogicConfig = {
  version: 1,
  maxDepth: DEFAULT_MAX_DEPTH,
  log: "stderr",
};

/**
 * Load configuration from project or user config.
 * Precedence: ./.logictrace.json > ~/.logictrace/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".logictrace", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: { ...DEFAULT_CONFIG }, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): LogicConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): LogicConfig | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return validateConfigShape(JSON.parse(raw));
  } catch {
    // unreadable or ill-shaped: fall through to the next source
    return null;
  }
}

function isLogMode(v: unknown): v is LogMode {
  return LOG_MODES.some((mode) => mode === v);
}

export function validateConfigShape(data: unknown): LogicConfig {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("Config must be a JSON object.");
  }
  const obj = data as Record<string, unknown>;

  const version = typeof obj["version"] === "number" ? obj["version"] : DEFAULT_CONFIG.version;

  let maxDepth = DEFAULT_CONFIG.maxDepth;
  const maxDepthRaw = obj["maxDepth"];
  if (maxDepthRaw !== undefined) {
    if (typeof maxDepthRaw !== "number" || !Number.isInteger(maxDepthRaw) || maxDepthRaw < 1) {
      throw new Error("Config 'maxDepth' must be a positive integer when present.");
    }
    maxDepth = maxDepthRaw;
  }

  let log = DEFAULT_CONFIG.log;
  const logRaw = obj["log"];
  if (logRaw !== undefined) {
    if (!isLogMode(logRaw)) {
      throw new Error(`Config 'log' must be one of ${LOG_MODES.join(", ")} when present.`);
    }
    log = logRaw;
  }

  return { version, maxDepth, log };
}
