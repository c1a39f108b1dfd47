/**
 * Core data model types for typeweave
 * These structures flow through the pipeline: scanning → directive extraction → config resolution → registry → generation → output grouping
 */

import type { FieldNamingStrategy } from "./config.js";

/**
 * TypeExpr - Structural type expression as written in the source
 */
export type TypeExpr =
  | NamedTypeExpr
  | { kind: "tuple"; elements: TypeExpr[] }
  | { kind: "function"; args: TypeExpr[]; returns: TypeExpr }
  | { kind: "var"; name: string }
  | { kind: "hole"; name: string };

export interface NamedTypeExpr {
  kind: "named";
  module?: string; // module hint, rewritten to a full module path when it matches an import alias
  name: string;
  args: TypeExpr[];
}

export const OPTION_MODULE = "gleam/option";

/**
 * FieldMarker - Presence policy requested by field directives
 */
export type FieldMarker = "required" | "optional" | "default";

export interface FieldDecl {
  label?: string; // undefined for positional fields
  type: TypeExpr;
  isOption: boolean;
  marker: FieldMarker;
  rename?: string;
  decoderWith?: string;
  encoderWith?: string;
}

export interface ConstructorDecl {
  name: string;
  fields: FieldDecl[];
}

/**
 * OutputOverride - Output settings a directive may set. `separate_files` is config-only.
 */
export interface OutputOverride {
  directory?: string;
  generatedFileNaming?: string;
  encodeModuleNaming?: string;
  decodeModuleNaming?: string;
  separateEncoderDecoder?: boolean;
}

export interface FnNamingOverride {
  encoderFnPattern?: string;
  decoderFnPattern?: string;
}

/**
 * TypeDecl - One custom type with its directive-derived generation requests
 */
export interface TypeDecl {
  name: string;
  modulePath: string;
  parameters: string[];
  constructors: ConstructorDecl[];
  encoders: string[]; // distinct backend tags, in request order
  decoder: boolean;
  fieldNaming?: FieldNamingStrategy;
  typeTag?: string;
  disableTypeTag: boolean;
  output?: OutputOverride;
  unknownVariantMessage?: string;
  fnNaming?: FnNamingOverride;
}

export interface FileDirectives {
  output?: OutputOverride;
  unknownVariantMessage?: string;
  fnNaming?: FnNamingOverride;
}

/**
 * ImportDecl - An `import` statement of the scanned module
 */
export interface ImportDecl {
  module: string;
  alias?: string;
  unqualifiedTypes: string[];
  unqualifiedValues: string[];
}

/**
 * ParsedModule - One source file after scanning and directive extraction
 */
export interface ParsedModule {
  filePath: string;
  modulePath: string;
  fileDirectives: FileDirectives;
  imports: ImportDecl[];
  types: TypeDecl[];
}

export function hasGenerationRequest(decl: TypeDecl): boolean {
  return decl.decoder || decl.encoders.length > 0;
}

export function fieldBinding(field: FieldDecl, index: number): string {
  return field.label ?? `field_${index}`;
}

export function isOptionType(type: TypeExpr): boolean {
  return type.kind === "named" && type.name === "Option" && type.module === OPTION_MODULE;
}

/**
 * Render a type expression back to source form for messages
 */
export function renderTypeExpr(type: TypeExpr): string {
  switch (type.kind) {
    case "named": {
      const qualified = type.module ? `${type.module}.${type.name}` : type.name;
      return type.args.length > 0
        ? `${qualified}(${type.args.map(renderTypeExpr).join(", ")})`
        : qualified;
    }
    case "tuple":
      return `#(${type.elements.map(renderTypeExpr).join(", ")})`;
    case "function":
      return `fn(${type.args.map(renderTypeExpr).join(", ")}) -> ${renderTypeExpr(type.returns)}`;
    case "var":
      return type.name;
    case "hole":
      return type.name;
  }
}
