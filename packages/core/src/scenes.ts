import { extractCharacterAndText } from "./entries.js";
import { hasKey, isJsonArray, isJsonObject, type JsonValue } from "./json.js";
import type { SceneWalkResult, SelectOutput, TextOutput, TextSlot } from "./types.js";

function ensureSlot<T>(container: Array<T | null>, index: number): void {
  while (container.length <= index) container.push(null);
}

export function walkScenes(document: JsonValue): SceneWalkResult {
  const text: TextOutput = [];
  const select: SelectOutput = [];

  const scenes = isJsonObject(document) ? document["scenes"] : undefined;
  if (!isJsonArray(scenes)) return { status: "no-scenes", text, select };

  scenes.forEach((scene, sceneIndex) => {
    if (!isJsonObject(scene)) return;

    const texts = scene["texts"];
    if (isJsonArray(texts)) {
      const slot: TextSlot = [];
      for (const entry of texts) {
        const { character, text: line } = extractCharacterAndText(entry);
        slot.push(character, line);
      }
      ensureSlot(text, sceneIndex);
      text[sceneIndex] = slot;
    }

    // Presence check only: `selects: null` still claims the slot.
    if (hasKey(scene, "selects")) {
      ensureSlot(select, sceneIndex);
      select[sceneIndex] = scene["selects"] ?? null;
    }
  });

  return { status: "extracted", text, select };
}
