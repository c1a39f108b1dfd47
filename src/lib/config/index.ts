/**
 * Config module - documents, cascade and directive layering
 */

export * from "./schema.js";
export * from "./parser.js";
export * from "./loader.js";
export * from "./resolver.js";
export * from "./path-mode.js";
export * from "./naming.js";
