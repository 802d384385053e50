import { expect, test } from "vitest";

import { extractCharacterAndText, pickFallbackCharacter, resolveLegacyEntry } from "../src/entries.js";

test("entries: language list with a speaker", () => {
  const entry = ["id0", [["A", ""], ["B", ""], ["C", "你好"], ["D", ""]]];
  expect(extractCharacterAndText(entry)).toEqual({ character: "C", text: "你好" });
});

test("entries: selected text is marker-cleaned", () => {
  const entry = [[["Alice", "Hello"], ["Bob", "%fSourceHanSansCN-M;你好%f;"]]];
  expect(extractCharacterAndText(entry)).toEqual({ character: "Bob", text: "你好" });
});

test("entries: legacy three-element entry", () => {
  expect(extractCharacterAndText([7, "Amy", "%fSourceHanSansCN-M;Hi%f;"])).toEqual({ character: "Amy", text: "Hi" });
});

test("entries: legacy two-element entry takes index 1 as speaker first", () => {
  // Speaker lookup for plain entries prefers index 1 even when that is the text itself.
  expect(extractCharacterAndText(["Amy", "Hi"])).toEqual({ character: "Hi", text: "Hi" });
  expect(extractCharacterAndText(["Amy", ""])).toEqual({ character: "Amy", text: "" });
});

test("entries: legacy entry without text", () => {
  expect(extractCharacterAndText(["Amy", 5])).toEqual({ character: "Amy", text: null });
  expect(extractCharacterAndText([1, 2, 3])).toEqual({ character: null, text: null });
  expect(extractCharacterAndText([])).toEqual({ character: null, text: null });
});

test("entries: non-list entries yield nothing", () => {
  expect(extractCharacterAndText("Hi")).toEqual({ character: null, text: null });
  expect(extractCharacterAndText(null)).toEqual({ character: null, text: null });
  expect(extractCharacterAndText({ name: "Amy", text: "Hi" })).toEqual({ character: null, text: null });
});

test("entries: speaker fallback order differs between language lists and legacy entries", () => {
  const withList = ["Amy", "Bob", [[null, "Hello"], [null, "Hi"]]];
  expect(extractCharacterAndText(withList)).toEqual({ character: "Amy", text: "Hi" });

  const legacy = ["Amy", "Bob", "Hi"];
  expect(extractCharacterAndText(legacy)).toEqual({ character: "Bob", text: "Hi" });
});

test("entries: empty speaker on the selected item falls back to the entry", () => {
  const entry = ["Narrator", [["", "你好"]]];
  expect(extractCharacterAndText(entry)).toEqual({ character: "Narrator", text: "你好" });
});

test("entries: language list without any text falls back to the legacy shape", () => {
  const entry = ["Amy", [["A", ""], ["B", ""]]];
  expect(extractCharacterAndText(entry)).toEqual({ character: "Amy", text: null });
});

test("entries: pickFallbackCharacter honours order and range", () => {
  expect(pickFallbackCharacter(["a", "b"], [1, 0])).toBe("b");
  expect(pickFallbackCharacter(["a", "b"], [0, 1])).toBe("a");
  expect(pickFallbackCharacter(["a"], [1, 0])).toBe("a");
  expect(pickFallbackCharacter(["", null], [0, 1])).toBeNull();
  expect(pickFallbackCharacter([], [0, 1])).toBeNull();
});

test("entries: resolveLegacyEntry prefers index 2 text over index 1", () => {
  expect(resolveLegacyEntry(["x", "Amy", "Hi"])).toEqual({ character: "Amy", text: "Hi" });
  expect(resolveLegacyEntry(["x", "Amy", ""])).toEqual({ character: "Amy", text: "" });
  expect(resolveLegacyEntry(["x", 3, 4])).toEqual({ character: "x", text: null });
});
