/**
 * Emitter types
 */

import type { OutputConfig, PathMode } from "../../types/config.js";
import type { EncoderBackend } from "../backend/types.js";
import type { ImportMap, TypeCode } from "../generator/types.js";

/**
 * GeneratedUnit - Types of one file that share their output routing
 */
export interface GeneratedUnit {
  types: TypeCode[];
  output: OutputConfig;
  pathMode: PathMode;
  imports: ImportMap;
  backends: Map<string, EncoderBackend>;
  decoderUsesOptionHelpers: boolean;
}

export type OutputKind = "combined" | "decoder" | "encoder" | "inline";

/**
 * PlannedFile - One file the writer produces
 */
export interface PlannedFile {
  path: string;
  kind: OutputKind;
  content: string;
  sourceFile: string;
}

export interface WriteOptions {
  root: string;
  dryRun?: boolean;
  print?: (text: string) => void;
}
