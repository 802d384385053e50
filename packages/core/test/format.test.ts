import { expect, test } from "vitest";

import { formatSelectOutput, formatTextOutput } from "../src/format.js";

test("format: empty outputs", () => {
  expect(formatTextOutput([])).toBe("[\n]");
  expect(formatSelectOutput([])).toBe("[]");
});

test("format: null scene slots and alternating indentation", () => {
  const out = formatTextOutput([null, ["Amy", "你好", null, "Hi"]]);
  expect(out).toBe(
    ["[", "  null,", "  [", '    "Amy",', '      "你好",', "    null,", '      "Hi"', "  ]", "]"].join("\n"),
  );
});

test("format: a scene with no lines keeps its bracket pair", () => {
  expect(formatTextOutput([[]])).toBe(["[", "  [", "    ", "  ]", "]"].join("\n"));
});

test("format: strings are JSON-escaped", () => {
  expect(formatTextOutput([["A", 'say "hi"\n']])).toBe(["[", "  [", '    "A",', '      "say \\"hi\\"\\n"', "  ]", "]"].join("\n"));
});

test("format: select output is two-space JSON with non-ASCII kept", () => {
  expect(formatSelectOutput([null, { choice: "是" }])).toBe(
    ["[", "  null,", "  {", '    "choice": "是"', "  }", "]"].join("\n"),
  );
});
