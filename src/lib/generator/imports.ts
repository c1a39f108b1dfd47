/**
 * Import bookkeeping for generated code
 */

import { moduleAlias } from "../../utils/case.js";
import type { ImportEntry, ImportMap } from "./types.js";

export function createImportEntry(modulePath: string): ImportEntry {
  return { modulePath, alias: moduleAlias(modulePath), values: new Set(), types: new Set() };
}

/**
 * Register `modulePath` and return the alias generated code uses for it
 */
export function ensureImport(imports: ImportMap, modulePath: string): string {
  let entry = imports.get(modulePath);
  if (!entry) {
    entry = createImportEntry(modulePath);
    imports.set(modulePath, entry);
  }
  return entry.alias;
}

/**
 * Expose a type and its constructors unqualified
 */
export function addTypeImport(
  imports: ImportMap,
  modulePath: string,
  typeName: string,
  constructors: readonly string[],
): void {
  ensureImport(imports, modulePath);
  const entry = imports.get(modulePath);
  if (!entry) return;
  entry.types.add(typeName);
  constructors.forEach((ctor) => entry.values.add(ctor));
}

export function mergeImports(target: ImportMap, source: ImportMap): void {
  for (const [modulePath, entry] of source) {
    const existing = target.get(modulePath);
    if (existing) {
      entry.values.forEach((value) => existing.values.add(value));
      entry.types.forEach((type) => existing.types.add(type));
    } else {
      target.set(modulePath, {
        modulePath: entry.modulePath,
        alias: entry.alias,
        values: new Set(entry.values),
        types: new Set(entry.types),
      });
    }
  }
}

export function cloneImports(imports: ImportMap): ImportMap {
  const copy: ImportMap = new Map();
  mergeImports(copy, imports);
  return copy;
}
