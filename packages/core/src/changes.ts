import fs from "node:fs";
import path from "node:path";

import { readTimestampMtime } from "./timestamp.js";
import type { ExtractConfig } from "./types.js";

export function sourcePathFor(config: Pick<ExtractConfig, "sourceDir">, name: string): string {
  return path.join(config.sourceDir, name);
}

export function collectModifiedFiles(names: readonly string[], config: Pick<ExtractConfig, "sourceDir" | "timestampPath">): string[] {
  const lastExtractMtime = readTimestampMtime(config.timestampPath);
  const targets: string[] = [];

  for (const name of names) {
    const source = sourcePathFor(config, name);
    if (!fs.existsSync(source)) continue;
    if (lastExtractMtime === null || fs.statSync(source).mtimeMs > lastExtractMtime) targets.push(name);
  }
  return targets;
}
