/**
 * Emitter module - grouping, rendering and writing generated code
 */

export * from "./types.js";
export * from "./grouper.js";
export * from "./render.js";
export * from "./writer.js";
