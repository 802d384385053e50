import { isJsonArray, isNonEmptyString, type JsonValue } from "./json.js";
import { cleanTextMarkers, findLanguageList, pickLanguageItem } from "./language.js";
import type { DialogueLine } from "./types.js";

export type CharacterIndexOrder = readonly [number, number];

// Legacy entries keep the speaker at index 1 more often than at index 0.
export const LEGACY_CHARACTER_ORDER: CharacterIndexOrder = [1, 0];
// When a language item carries no speaker, the entry's own index 0 is tried first.
export const LANGUAGE_ITEM_CHARACTER_ORDER: CharacterIndexOrder = [0, 1];

export function pickFallbackCharacter(entry: readonly JsonValue[], order: CharacterIndexOrder): string | null {
  for (const index of order) {
    const value = entry[index];
    if (isNonEmptyString(value)) return value;
  }
  return null;
}

export function resolveLegacyEntry(entry: readonly JsonValue[]): DialogueLine {
  const character = pickFallbackCharacter(entry, LEGACY_CHARACTER_ORDER);
  const atTwo = entry[2];
  if (typeof atTwo === "string") return { character, text: cleanTextMarkers(atTwo) };
  const atOne = entry[1];
  if (typeof atOne === "string") return { character, text: cleanTextMarkers(atOne) };
  return { character, text: null };
}

export function extractCharacterAndText(entry: JsonValue): DialogueLine {
  if (!isJsonArray(entry)) return { character: null, text: null };

  const languageList = findLanguageList(entry);
  if (languageList) {
    const selected = pickLanguageItem(languageList);
    if (selected) {
      const [speaker, text] = selected.item;
      const character = isNonEmptyString(speaker) ? speaker : pickFallbackCharacter(entry, LANGUAGE_ITEM_CHARACTER_ORDER);
      return { character, text: cleanTextMarkers(text) };
    }
  }

  return resolveLegacyEntry(entry);
}
