/**
 * Directive module - comment directives to typed declaration settings
 */

export * from "./types.js";
export * from "./tokenizer.js";
export * from "./parser.js";
export * from "./fold.js";
export * from "./extract.js";
