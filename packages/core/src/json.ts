import jsonc from "jsonc-parser";
import type { Node as JsonNode, ParseError } from "jsonc-parser";
import { LosslessNumber } from "lossless-json";

// Parsed numbers stay LosslessNumber so `1.0` and ids past 2^53 keep their text.
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

const PARSE_OPTIONS = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false };

// Engines list integer-like keys first; the order they were written in is kept here.
const sourceKeyOrder = new WeakMap<JsonObject, readonly string[]>();

export function isJsonArray(value: JsonValue | undefined): value is JsonValue[] {
  return Array.isArray(value);
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof LosslessNumber);
}

export function isNonEmptyString(value: JsonValue | undefined): value is string {
  return typeof value === "string" && value.length > 0;
}

export function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export function jsonObjectKeys(obj: JsonObject): readonly string[] {
  return sourceKeyOrder.get(obj) ?? Object.keys(obj);
}

function setMember(obj: JsonObject, key: string, value: JsonValue): void {
  // defineProperty so a `__proto__` key stays an own member.
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
}

function toJsonValue(node: JsonNode, raw: string): JsonValue {
  switch (node.type) {
    case "object": {
      const obj: JsonObject = {};
      const keys: string[] = [];
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || !valueNode || typeof keyNode.value !== "string") continue;
        const key: string = keyNode.value;
        // Duplicates keep their first position and their last value.
        if (!hasKey(obj, key)) keys.push(key);
        setMember(obj, key, toJsonValue(valueNode, raw));
      }
      sourceKeyOrder.set(obj, keys);
      return obj;
    }
    case "array":
      return (node.children ?? []).map((child) => toJsonValue(child, raw));
    case "number":
      return new LosslessNumber(raw.slice(node.offset, node.offset + node.length));
    case "string":
      return typeof node.value === "string" ? node.value : String(node.value);
    case "boolean":
      return node.value === true;
    default:
      return null;
  }
}

/**
 * Strict JSON parse that keeps each number's source text and each object's
 * key order. Throws a SyntaxError naming the first problem and its offset.
 */
export function parseJsonDocument(raw: string): JsonValue {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(raw, errors, PARSE_OPTIONS);
  const first = errors[0];
  if (first) {
    throw new SyntaxError(`${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!root) throw new SyntaxError("ValueExpected at offset 0");
  return toJsonValue(root, raw);
}

function writeValue(value: JsonValue, indent: string, depth: number): string {
  if (value === null) return "null";
  if (value instanceof LosslessNumber) return value.toString();
  if (typeof value !== "object") return JSON.stringify(value);

  const inner = indent.repeat(depth + 1);
  const outer = indent.repeat(depth);
  if (isJsonArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => `${inner}${writeValue(item, indent, depth + 1)}`);
    return `[\n${items.join(",\n")}\n${outer}]`;
  }

  const keys = jsonObjectKeys(value);
  if (keys.length === 0) return "{}";
  const members = keys.map(
    (key) => `${inner}${JSON.stringify(key)}: ${writeValue(value[key] ?? null, indent, depth + 1)}`,
  );
  return `{\n${members.join(",\n")}\n${outer}}`;
}

/** Indented JSON text, objects in source key order, numbers as written. */
export function stringifyJson(value: JsonValue, space = 2): string {
  return writeValue(value, " ".repeat(space), 0);
}
