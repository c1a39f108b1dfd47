/**
 * Backend module - pluggable encoder rendering
 */

export * from "./types.js";
export * from "./json-backend.js";
export * from "./registry.js";
export * from "./dependencies.js";
