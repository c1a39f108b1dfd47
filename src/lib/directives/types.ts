/**
 * Directive parser types
 */

import type { FieldNamingStrategy } from "../../types/config.js";

export const TYPE_MARKER = "weave!:";
export const FILE_MARKER = "weave-file!:";

export type DirectiveLevel = "type" | "field" | "file";

/**
 * DirectiveToken - One comma-separated entry of a directive line
 */
export interface DirectiveToken {
  key: string;
  value?: string;
  quoted: boolean;
  raw: string;
}

export type OutputDirective =
  | { kind: "output_dir"; directory: string }
  | { kind: "separate_encoder_decoder"; enabled: boolean }
  | { kind: "generated_file_naming"; pattern: string }
  | { kind: "encode_module_naming"; pattern: string }
  | { kind: "decode_module_naming"; pattern: string }
  | { kind: "unknown_variant_message"; template: string }
  | { kind: "encoder_fn"; pattern: string }
  | { kind: "decoder_fn"; pattern: string };

export type TypeDirective =
  | OutputDirective
  | { kind: "encoder"; backend: string }
  | { kind: "decoder" }
  | { kind: "naming"; strategy: FieldNamingStrategy }
  | { kind: "type_tag"; field: string }
  | { kind: "no_type_tag" };

export type FieldDirective =
  | { kind: "presence"; marker: "optional" | "required" }
  | { kind: "rename"; name: string }
  | { kind: "decoder_with"; reference: string }
  | { kind: "encoder_with"; reference: string };

export type FileDirective = OutputDirective;

export type DiagnosticReason = "unknown-key" | "wrong-level" | "invalid-value";

/**
 * DirectiveDiagnostic - A token that did not map onto the directive schema
 */
export interface DirectiveDiagnostic {
  level: DirectiveLevel;
  key: string;
  raw: string;
  reason: DiagnosticReason;
  message: string;
  location?: string;
}

export interface ParsedDirectives<T> {
  directives: T[];
  diagnostics: DirectiveDiagnostic[];
}
