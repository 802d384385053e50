import fs from "node:fs";
import path from "node:path";

import { collectModifiedFiles, sourcePathFor } from "./changes.js";
import { ExtractError } from "./errors.js";
import { formatSelectOutput, formatTextOutput } from "./format.js";
import { parseJsonDocument, type JsonValue } from "./json.js";
import { readManifest } from "./manifest.js";
import { walkScenes } from "./scenes.js";
import { writeTimestamp } from "./timestamp.js";
import type {
  ExtractConfig,
  ExtractedFile,
  ExtractionPlan,
  ExtractionReport,
  ExtractLogger,
  SelectOutput,
  TextOutput,
} from "./types.js";

export interface RunExtractionOptions {
  log?: ExtractLogger;
  now?: () => Date;
}

function defaultLog(line: string): void {
  console.error(line);
}

export function loadSourceDocument(sourcePath: string): JsonValue {
  const raw = fs.readFileSync(sourcePath, "utf8");
  try {
    return parseJsonDocument(raw);
  } catch (err) {
    throw new ExtractError("INVALID_JSON", `Invalid JSON in source file: ${sourcePath}`, { cause: err });
  }
}

export function writeExtractFiles(
  config: Pick<ExtractConfig, "textOutDir" | "selectOutDir">,
  name: string,
  text: TextOutput,
  select: SelectOutput,
): { textPath: string; selectPath: string } {
  const textPath = path.join(config.textOutDir, name);
  const selectPath = path.join(config.selectOutDir, name);

  // Names may carry sub-directories, so create the parent of each file.
  fs.mkdirSync(path.dirname(textPath), { recursive: true });
  fs.mkdirSync(path.dirname(selectPath), { recursive: true });

  fs.writeFileSync(textPath, formatTextOutput(text), "utf8");
  fs.writeFileSync(selectPath, formatSelectOutput(select), "utf8");
  return { textPath, selectPath };
}

export function extractFile(config: ExtractConfig, name: string, log: ExtractLogger = defaultLog): ExtractedFile {
  const document = loadSourceDocument(sourcePathFor(config, name));
  const { status, text, select } = walkScenes(document);

  // Written even without scenes: downstream tooling expects both files to exist.
  const { textPath, selectPath } = writeExtractFiles(config, name, text, select);
  log(status === "no-scenes" ? `${name} skipped (no scenes).` : `${name} extract DONE!`);
  return { name, status, textPath, selectPath };
}

export function planExtraction(config: ExtractConfig): ExtractionPlan {
  const manifest = readManifest(config.manifestPath);
  return { manifest, modified: collectModifiedFiles(manifest, config) };
}

export function runExtraction(config: ExtractConfig, options: RunExtractionOptions = {}): ExtractionReport {
  const log = options.log ?? defaultLog;
  const { modified } = planExtraction(config);

  const files: ExtractedFile[] = [];
  for (const name of modified) {
    files.push(extractFile(config, name, log));
  }

  if (files.length === 0) {
    log("No file updated, have a good day!");
    return { files, timestampUpdated: false };
  }

  writeTimestamp(config.timestampPath, options.now ? options.now() : new Date());
  log("Extract time updated.");
  return { files, timestampUpdated: true };
}
