import { isJsonArray, type JsonValue } from "./json.js";

// A language variant of one dialogue line: [character?, text, ...].
export type LanguageItem = [JsonValue, string, ...JsonValue[]];

export interface LanguageSelectionStrategy {
  name: string;
  pick(items: readonly JsonValue[]): LanguageItem | null;
}

// Slot 3 is usually Simplified Chinese, slot 2 Traditional Chinese.
export const PREFERRED_LANGUAGE_INDEXES: readonly number[] = [3, 2];

const CJK_RE = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;

export const TEXT_MARKERS_TO_REMOVE: readonly string[] = ["%fSourceHanSansCN-M;", "%f;"];

export function cleanTextMarkers(text: string): string;
export function cleanTextMarkers(text: string | null): string | null;
export function cleanTextMarkers(text: string | null): string | null {
  if (text === null) return null;
  let out = text;
  for (const marker of TEXT_MARKERS_TO_REMOVE) {
    out = out.split(marker).join("");
  }
  return out;
}

export function isLanguageItem(value: JsonValue | undefined): value is LanguageItem {
  return isJsonArray(value) && value.length >= 2 && typeof value[1] === "string";
}

function hasText(value: JsonValue | undefined): value is LanguageItem {
  return isLanguageItem(value) && value[1].length > 0;
}

export function containsCjk(text: string): boolean {
  return CJK_RE.test(text);
}

/**
 * First element of `entry` that is a non-empty list made only of language items.
 * Returns null for non-list entries or when nothing qualifies.
 */
export function findLanguageList(entry: JsonValue): LanguageItem[] | null {
  if (!isJsonArray(entry)) return null;

  for (const field of entry) {
    if (!isJsonArray(field) || field.length === 0) continue;
    const items: LanguageItem[] = [];
    for (const item of field) {
      if (!isLanguageItem(item)) break;
      items.push(item);
    }
    if (items.length === field.length) return items;
  }
  return null;
}

const preferredIndex: LanguageSelectionStrategy = {
  name: "preferred-index",
  pick(items) {
    for (const index of PREFERRED_LANGUAGE_INDEXES) {
      const item = items[index];
      if (hasText(item)) return item;
    }
    return null;
  },
};

const cjkScan: LanguageSelectionStrategy = {
  name: "cjk-scan",
  pick(items) {
    for (const item of items) {
      if (hasText(item) && containsCjk(item[1])) return item;
    }
    return null;
  },
};

const reverseScan: LanguageSelectionStrategy = {
  name: "reverse-scan",
  pick(items) {
    for (let i = items.length - 1; i >= 0; i -= 1) {
      const item = items[i];
      if (hasText(item)) return item;
    }
    return null;
  },
};

// Evaluated in order; the first strategy that yields an item wins.
export const LANGUAGE_SELECTION_STRATEGIES: readonly LanguageSelectionStrategy[] = [preferredIndex, cjkScan, reverseScan];

export function pickLanguageItem(
  items: readonly JsonValue[],
  strategies: readonly LanguageSelectionStrategy[] = LANGUAGE_SELECTION_STRATEGIES,
): { item: LanguageItem; strategy: string } | null {
  for (const strategy of strategies) {
    const item = strategy.pick(items);
    if (item) return { item, strategy: strategy.name };
  }
  return null;
}
