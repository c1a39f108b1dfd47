/**
 * typeweave: JSON decoders and encoders for annotated Gleam custom types
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/source/index.js";
export * from "./lib/directives/index.js";
export * from "./lib/config/index.js";
export * from "./lib/registry/index.js";
export * from "./lib/backend/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/project/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/case.js";
