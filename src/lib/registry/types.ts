/**
 * Type registry types
 */

import type { TypeDecl } from "../../types/data-model.js";

/**
 * RegistryEntry - Canonical generated names of one declared type
 */
export interface RegistryEntry {
  index: number;
  modulePath: string;
  typeName: string;
  decl: TypeDecl;
  decoderName?: string;
  encoderNames: Map<string, string>; // backend tag -> function name
}

export interface TypeReference {
  module?: string;
  name: string;
}

/**
 * ResolvedFunction - A generated function and the module that declares its type
 */
export interface ResolvedFunction {
  entry: RegistryEntry;
  name: string;
}
