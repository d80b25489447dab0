/**
 * Fixture file discovery and filtering helpers.
 */
import * as fs from "node:fs";
import * as path from "node:path";

export interface DiscoveredFixture {
  /** File name; unique across all roots. */
  id: string;
  file: string;
  relPath: string;
  root: string;
}

export const FIXTURE_SUFFIX = ".fixtures.json";

const IGNORED_DIRS = new Set(["node_modules", "dist"]);

function walkForFixtures(
  dir: string,
  root: string,
  seen: Map<string, DiscoveredFixture>
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    if (IGNORED_DIRS.has(entry.name) || entry.name.startsWith(".")) {
      continue;
    }

    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walkForFixtures(fullPath, root, seen);
      continue;
    }

    if (entry.isFile() && entry.name.endsWith(FIXTURE_SUFFIX) && !seen.has(entry.name)) {
      seen.set(entry.name, {
        id: entry.name,
        file: fullPath,
        relPath: path.relative(root, fullPath),
        root,
      });
    }
  }
}

/**
 * Default search roots under `repoRoot`, followed by any extra roots
 * from a path-delimited list (relative entries resolve against `repoRoot`).
 */
export function getFixtureRoots(repoRoot: string, extraRootsEnv?: string): string[] {
  const roots: string[] = [
    path.join(repoRoot, "fixtures"),
    path.join(repoRoot, "packages", "fixtures", "fixtures"),
  ];

  if (extraRootsEnv) {
    const extras = extraRootsEnv
      .split(path.delimiter)
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .map((s) => (path.isAbsolute(s) ? s : path.resolve(repoRoot, s)));

    roots.push(...extras);
  }

  const deduped: string[] = [];
  const seen = new Set<string>();
  for (const root of roots) {
    const normalized = path.resolve(root);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    deduped.push(normalized);
  }
  return deduped;
}

export function discoverFixtureFiles(roots: string[]): DiscoveredFixture[] {
  const seen = new Map<string, DiscoveredFixture>();
  for (const root of roots) {
    if (!fs.existsSync(root)) continue;
    walkForFixtures(root, root, seen);
  }
  return [...seen.values()].sort((a, b) => a.relPath.localeCompare(b.relPath));
}

export function applyFixtureTextFilter(
  fixtures: DiscoveredFixture[],
  filterText?: string
): DiscoveredFixture[] {
  const q = (filterText ?? "").trim().toLowerCase();
  if (!q) return fixtures;
  return fixtures.filter((f) => {
    return f.id.toLowerCase().includes(q) || f.relPath.toLowerCase().includes(q);
  });
}
