import { stringifyJson } from "./json.js";
import type { SelectOutput, TextOutput, TextSlot } from "./types.js";

function formatSceneSlot(slot: TextSlot | null): string {
  if (slot === null) return "\n  null";

  // Speaker lines sit flush, dialogue lines get two extra spaces.
  const items = slot.map((value, index) => {
    const dumped = JSON.stringify(value);
    return index % 2 === 0 ? dumped : `  ${dumped}`;
  });
  return `\n  [\n    ${items.join(",\n    ")}\n  ]`;
}

/**
 * Render the per-scene transcript as a loosely bracketed listing meant for
 * line-by-line diffing. Not guaranteed to round-trip through JSON.parse.
 */
export function formatTextOutput(text: TextOutput): string {
  return `[${text.map(formatSceneSlot).join(",")}\n]`;
}

export function formatSelectOutput(select: SelectOutput): string {
  return stringifyJson(select, 2);
}
