export * from "./types.js";
export * from "./json.js";
export * from "./errors.js";
export * from "./paths.js";
export * from "./language.js";
export * from "./entries.js";
export * from "./scenes.js";
export * from "./format.js";
export * from "./manifest.js";
export * from "./timestamp.js";
export * from "./changes.js";
export * from "./extract.js";
