import path from "node:path";
import { z } from "zod";

import { ExtractError } from "./errors.js";
import type { ExtractConfig } from "./types.js";

export const DEFAULT_SOURCE_DIR = "json";
export const DEFAULT_TEXT_OUT_DIR = path.join("extract", "text");
export const DEFAULT_SELECT_OUT_DIR = path.join("extract", "select");
export const DEFAULT_MANIFEST_FILE = "jsonlist.txt";
export const DEFAULT_TIMESTAMP_FILE = "last_extract_time.txt";

export const ENV_KEYS = {
  rootDir: "SCENE_EXTRACT_ROOT",
  sourceDir: "SCENE_EXTRACT_SOURCE_DIR",
  textOutDir: "SCENE_EXTRACT_TEXT_DIR",
  selectOutDir: "SCENE_EXTRACT_SELECT_DIR",
  manifestPath: "SCENE_EXTRACT_MANIFEST",
  timestampPath: "SCENE_EXTRACT_TIMESTAMP",
} as const satisfies Record<keyof ExtractConfig, string>;

// Checked before resolution: fs rejects any path holding a NUL byte.
const rawPath = z.string().refine((p) => !p.includes("\0"), { message: "must not contain a NUL byte" });

export const RawExtractConfigSchema = z.object({
  rootDir: rawPath,
  sourceDir: rawPath,
  textOutDir: rawPath,
  selectOutDir: rawPath,
  manifestPath: rawPath,
  timestampPath: rawPath,
});

export type ExtractConfigOverrides = Partial<ExtractConfig>;

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Resolve every path the extractor touches. Explicit overrides win over
 * SCENE_EXTRACT_* environment variables, which win over the defaults laid out
 * under the root directory. Relative paths resolve against the root.
 */
export function resolveExtractConfig(
  overrides: ExtractConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ExtractConfig {
  const choose = (key: keyof ExtractConfig, fallback: string): string =>
    nonEmpty(overrides[key]) ?? readEnv(env, ENV_KEYS[key]) ?? fallback;

  const parsed = RawExtractConfigSchema.safeParse({
    rootDir: choose("rootDir", "."),
    sourceDir: choose("sourceDir", DEFAULT_SOURCE_DIR),
    textOutDir: choose("textOutDir", DEFAULT_TEXT_OUT_DIR),
    selectOutDir: choose("selectOutDir", DEFAULT_SELECT_OUT_DIR),
    manifestPath: choose("manifestPath", DEFAULT_MANIFEST_FILE),
    timestampPath: choose("timestampPath", DEFAULT_TIMESTAMP_FILE),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ExtractError("INVALID_CONFIG", `Invalid extract config: ${detail}`);
  }

  const raw = parsed.data;
  const rootDir = path.resolve(cwd, raw.rootDir);
  return {
    rootDir,
    sourceDir: path.resolve(rootDir, raw.sourceDir),
    textOutDir: path.resolve(rootDir, raw.textOutDir),
    selectOutDir: path.resolve(rootDir, raw.selectOutDir),
    manifestPath: path.resolve(rootDir, raw.manifestPath),
    timestampPath: path.resolve(rootDir, raw.timestampPath),
  };
}
