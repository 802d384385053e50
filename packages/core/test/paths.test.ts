import path from "node:path";

import { expect, test } from "vitest";

import { ExtractError } from "../src/errors.js";
import { resolveExtractConfig } from "../src/paths.js";

test("paths: defaults hang off the working directory", () => {
  expect(resolveExtractConfig({}, {}, "/work")).toEqual({
    rootDir: "/work",
    sourceDir: "/work/json",
    textOutDir: path.join("/work", "extract", "text"),
    selectOutDir: path.join("/work", "extract", "select"),
    manifestPath: "/work/jsonlist.txt",
    timestampPath: "/work/last_extract_time.txt",
  });
});

test("paths: environment overrides resolve against the root", () => {
  const config = resolveExtractConfig(
    {},
    { SCENE_EXTRACT_ROOT: "/data", SCENE_EXTRACT_TEXT_DIR: "out/txt", SCENE_EXTRACT_MANIFEST: "/etc/list.txt" },
    "/work",
  );
  expect(config.rootDir).toBe("/data");
  expect(config.textOutDir).toBe("/data/out/txt");
  expect(config.manifestPath).toBe("/etc/list.txt");
  expect(config.sourceDir).toBe("/data/json");
});

test("paths: explicit overrides beat the environment", () => {
  const config = resolveExtractConfig(
    { rootDir: "/cli", selectOutDir: "sel" },
    { SCENE_EXTRACT_ROOT: "/data", SCENE_EXTRACT_SELECT_DIR: "/env/sel" },
    "/work",
  );
  expect(config.rootDir).toBe("/cli");
  expect(config.selectOutDir).toBe("/cli/sel");
});

test("paths: blank values are ignored", () => {
  const config = resolveExtractConfig({ rootDir: "  " }, { SCENE_EXTRACT_ROOT: " " }, "/work");
  expect(config.rootDir).toBe("/work");
});

test("paths: relative root resolves against cwd", () => {
  expect(resolveExtractConfig({ rootDir: "game" }, {}, "/work").timestampPath).toBe("/work/game/last_extract_time.txt");
});

test("paths: a NUL byte in a raw setting is an invalid config", () => {
  expect(() => resolveExtractConfig({ sourceDir: "json\0old" }, {}, "/work")).toThrowError(
    new ExtractError("INVALID_CONFIG", "Invalid extract config: sourceDir: must not contain a NUL byte"),
  );

  let caught: unknown;
  try {
    resolveExtractConfig({}, { SCENE_EXTRACT_MANIFEST: "list\0.txt" }, "/work");
  } catch (err) {
    caught = err;
  }
  expect(caught instanceof ExtractError ? [caught.code, caught.message] : null).toEqual([
    "INVALID_CONFIG",
    "Invalid extract config: manifestPath: must not contain a NUL byte",
  ]);
});
