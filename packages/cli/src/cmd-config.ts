/**
 * logictrace config - effective configuration summary command
 */
import { resolveConfig } from "@logictrace/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective logictrace config");
  console.log(`  Source:    ${resolved.source}`);
  console.log(`  Path:      ${resolved.path ?? "(none)"}`);
  console.log(`  Version:   ${resolved.config.version}`);
  console.log(`  Max depth: ${resolved.config.maxDepth}`);
  console.log(`  Log:       ${resolved.config.log}`);
  return 0;
}
