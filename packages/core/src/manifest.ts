import fs from "node:fs";

import { ExtractError } from "./errors.js";

// Every line boundary a text file may use, not just \n.
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export function parseManifest(raw: string): string[] {
  return raw.split(LINE_BREAK_RE).filter((line) => line.length > 0);
}

export function readManifest(manifestPath: string): string[] {
  if (!fs.existsSync(manifestPath)) {
    throw new ExtractError("MANIFEST_NOT_FOUND", `Manifest not found: ${manifestPath}`);
  }
  return parseManifest(fs.readFileSync(manifestPath, "utf8"));
}
