/**
 * Generator types
 */

import type { OutputConfig, PathMode } from "../../types/config.js";
import type { EncoderBackend } from "../backend/types.js";

/**
 * ImportEntry - One module imported by generated code
 */
export interface ImportEntry {
  modulePath: string;
  alias: string;
  values: Set<string>;
  types: Set<string>;
}

export type ImportMap = Map<string, ImportEntry>;

export type EncodingMode = "plain-string" | "object-with-no-type-tag" | "object-with-type-tag";

/**
 * TypeCode - Generated functions of one type
 */
export interface TypeCode {
  typeName: string;
  modulePath: string;
  constructors: string[];
  decoder?: string;
  encoder?: string;
}

/**
 * TypeOutput - Generated code of one type with the routing it resolved to
 */
export interface TypeOutput {
  code: TypeCode;
  output: OutputConfig;
  pathMode: PathMode;
  imports: ImportMap;
  backends: Map<string, EncoderBackend>;
  usesOptionHelpers: boolean;
}
