// Core re-exports for the typeweave type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
