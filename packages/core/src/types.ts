import type { JsonValue } from "./json.js";

export interface DialogueLine {
  character: string | null;
  text: string | null;
}

// One slot per scene index; null where the scene had no `texts`.
// Each slot alternates character, text, character, text, ...
export type TextSlot = Array<string | null>;
export type TextOutput = Array<TextSlot | null>;

// Raw `selects` payloads, passed through untouched. Gaps are null.
export type SelectOutput = JsonValue[];

export type SceneWalkStatus = "extracted" | "no-scenes";

export interface SceneWalkResult {
  status: SceneWalkStatus;
  text: TextOutput;
  select: SelectOutput;
}

export interface ExtractConfig {
  rootDir: string;
  sourceDir: string;
  textOutDir: string;
  selectOutDir: string;
  manifestPath: string;
  timestampPath: string;
}

export type ExtractLogger = (line: string) => void;

export interface ExtractedFile {
  name: string;
  status: SceneWalkStatus;
  textPath: string;
  selectPath: string;
}

export interface ExtractionReport {
  files: ExtractedFile[];
  timestampUpdated: boolean;
}

export interface ExtractionPlan {
  manifest: string[];
  modified: string[];
}
