/**
 * Source scanner types
 */

import type { ImportDecl, TypeExpr } from "../../types/data-model.js";

export type TokenKind = "name" | "upname" | "discard" | "string" | "number" | "punct" | "eof";

export interface Token {
  kind: TokenKind;
  text: string;
  line: number;
  comments: string[]; // comment lines since the previous token
}

export interface ScannedField {
  label?: string;
  type: TypeExpr;
  comments: string[];
  line: number;
}

export interface ScannedConstructor {
  name: string;
  fields: ScannedField[];
}

export interface ScannedType {
  name: string;
  parameters: string[];
  constructors: ScannedConstructor[];
  comments: string[];
  line: number;
}

/**
 * ScannedModule - Declarations of one source file before directive extraction
 */
export interface ScannedModule {
  filePath: string;
  modulePath: string;
  imports: ImportDecl[];
  types: ScannedType[];
  comments: string[]; // every comment line in the file, for file-level directives
}
