/**
 * Render generated units to Gleam source
 */

import { lastSegment } from "../../utils/case.js";
import { addTypeImport, cloneImports } from "../generator/imports.js";
import type { ImportMap } from "../generator/types.js";
import type { GeneratedUnit } from "./types.js";

export const GENERATED_HEADER = [
  "// This file was generated by typeweave.",
  "//",
  "// Do not modify this file directly.",
  "// Any changes will be overwritten when typeweave regenerates this file.",
].join("\n");

export const INLINE_MARKER = "// ========== Generated by typeweave ==========";

export interface RenderOptions {
  includeImports: boolean;
  includeTypeImports: boolean;
}

interface ImportNeeds {
  decoder: boolean;
  encoder: boolean;
}

function importMap(unit: GeneratedUnit, includeTypeImports: boolean): ImportMap {
  const imports = cloneImports(unit.imports);
  if (includeTypeImports) {
    for (const type of unit.types) {
      addTypeImport(imports, type.modulePath, type.typeName, type.constructors);
    }
  }
  return imports;
}

export function renderImportLine(modulePath: string, alias: string, types: Iterable<string>, values: Iterable<string>): string {
  const exposures = [
    ...[...types].sort().map((type) => `type ${type}`),
    ...[...values].sort(),
  ];
  let line = `import ${modulePath}`;
  if (exposures.length > 0) line += `.{${exposures.join(", ")}}`;
  if (alias !== lastSegment(modulePath)) line += ` as ${alias}`;
  return line;
}

/**
 * Standard imports first (sorted, deduplicated), then the collected imports
 * ordered by module path
 */
export function renderImportBlock(unit: GeneratedUnit, needs: ImportNeeds, includeTypeImports: boolean): string {
  const standard = new Set<string>();
  if (needs.decoder) {
    standard.add("import gleam/dynamic/decode");
    if (unit.decoderUsesOptionHelpers) standard.add("import gleam/option");
  }
  if (needs.encoder) {
    for (const backend of unit.backends.values()) {
      backend.moduleImports().forEach((line) => standard.add(line));
    }
  }

  const lines = [...standard].sort();
  const imports = importMap(unit, includeTypeImports);
  for (const modulePath of [...imports.keys()].sort()) {
    const entry = imports.get(modulePath);
    if (!entry) continue;
    const line = renderImportLine(entry.modulePath, entry.alias, entry.types, entry.values);
    if (!lines.includes(line)) lines.push(line);
  }
  return lines.join("\n");
}

function assemble(unit: GeneratedUnit, needs: ImportNeeds, bodies: string[], options: RenderOptions): string {
  let code = `${GENERATED_HEADER}\n\n`;
  if (options.includeImports && (needs.decoder || needs.encoder)) {
    const block = renderImportBlock(unit, needs, options.includeTypeImports);
    if (block.length > 0) code += `${block}\n\n`;
  }
  for (const body of bodies) {
    code += `${body}\n\n`;
  }
  return code;
}

export function decoderCode(unit: GeneratedUnit, options: RenderOptions): string {
  const bodies = unit.types.flatMap((type) => (type.decoder === undefined ? [] : [type.decoder]));
  return assemble(unit, { decoder: true, encoder: false }, bodies, options);
}

export function encoderCode(unit: GeneratedUnit, options: RenderOptions): string {
  const bodies = unit.types.flatMap((type) => (type.encoder === undefined ? [] : [type.encoder]));
  return assemble(unit, { decoder: false, encoder: true }, bodies, options);
}

/**
 * Decoder then encoders of each type, in declaration order
 */
export function combinedCode(unit: GeneratedUnit, options: RenderOptions): string {
  const bodies: string[] = [];
  for (const type of unit.types) {
    if (type.decoder !== undefined) bodies.push(type.decoder);
    if (type.encoder !== undefined) bodies.push(type.encoder);
  }
  const needs = {
    decoder: unit.types.some((type) => type.decoder !== undefined),
    encoder: unit.types.some((type) => type.encoder !== undefined),
  };
  return assemble(unit, needs, bodies, options);
}
