/**
 * Output writer - routes generated units to files
 */

import fs from "fs/promises";
import path from "path";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { cleanDirectory } from "../config/path-mode.js";
import { renderFilePattern } from "../config/naming.js";
import { mergeImports } from "../generator/imports.js";
import { INLINE_MARKER, combinedCode, decoderCode, encoderCode } from "./render.js";
import type { GeneratedUnit, PlannedFile, WriteOptions } from "./types.js";

const INLINE_SEPARATOR = `\n\n${INLINE_MARKER}\n\n`;

export function moduleName(sourceFile: string): string {
  return path.basename(sourceFile, path.extname(sourceFile));
}

/**
 * Directory a unit's files go to
 */
export function resolveOutputDirectory(root: string, sourceFile: string, unit: GeneratedUnit): string {
  const sourceDir = path.dirname(sourceFile);
  const directory = unit.output.directory;
  if (directory === undefined) return sourceDir;
  const base = unit.pathMode === "project-relative" ? root : sourceDir;
  return path.join(base, cleanDirectory(directory));
}

/**
 * Merge every inline unit of a file into one
 */
export function mergeUnits(units: readonly GeneratedUnit[]): GeneratedUnit | undefined {
  const [first, ...rest] = units;
  if (!first) return undefined;
  const merged: GeneratedUnit = {
    ...first,
    types: [...first.types],
    imports: new Map(),
    backends: new Map(first.backends),
  };
  mergeImports(merged.imports, first.imports);
  for (const unit of rest) {
    merged.types.push(...unit.types);
    mergeImports(merged.imports, unit.imports);
    for (const [tag, backend] of unit.backends) {
      if (!merged.backends.has(tag)) merged.backends.set(tag, backend);
    }
    merged.decoderUsesOptionHelpers = merged.decoderUsesOptionHelpers || unit.decoderUsesOptionHelpers;
  }
  return merged;
}

/**
 * Replace any previously generated tail after the marker
 */
export function appendGenerated(existing: string, code: string): string {
  const markerAt = existing.indexOf(INLINE_MARKER);
  const head = markerAt >= 0 ? existing.slice(0, markerAt).trimEnd() : existing.trimEnd();
  return `${head}${INLINE_SEPARATOR}${code}`;
}

async function readSource(sourceFile: string): Promise<string> {
  try {
    return await fs.readFile(sourceFile, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read ${sourceFile}`, { filePath: sourceFile }, { cause: error });
  }
}

/**
 * Files to produce for one source file
 */
export async function planFileOutputs(
  root: string,
  sourceFile: string,
  units: readonly GeneratedUnit[],
): Promise<PlannedFile[]> {
  const files: PlannedFile[] = [];
  const name = moduleName(sourceFile);
  const inline: GeneratedUnit[] = [];
  const standalone = { includeImports: true, includeTypeImports: true };

  for (const unit of units) {
    if (!unit.output.separateFiles) {
      inline.push(unit);
      continue;
    }

    const directory = resolveOutputDirectory(root, sourceFile, unit);
    if (!unit.output.separateEncoderDecoder) {
      files.push({
        path: path.join(directory, renderFilePattern(unit.output.generatedFileNaming, name)),
        kind: "combined",
        content: combinedCode(unit, standalone),
        sourceFile,
      });
      continue;
    }

    if (unit.types.some((type) => type.decoder !== undefined)) {
      files.push({
        path: path.join(directory, renderFilePattern(unit.output.decodeModuleNaming, name)),
        kind: "decoder",
        content: decoderCode(unit, standalone),
        sourceFile,
      });
    }
    if (unit.types.some((type) => type.encoder !== undefined)) {
      files.push({
        path: path.join(directory, renderFilePattern(unit.output.encodeModuleNaming, name)),
        kind: "encoder",
        content: encoderCode(unit, standalone),
        sourceFile,
      });
    }
  }

  const merged = mergeUnits(inline);
  if (merged) {
    const code = combinedCode(merged, { includeImports: true, includeTypeImports: false });
    files.push({
      path: sourceFile,
      kind: "inline",
      content: appendGenerated(await readSource(sourceFile), code),
      sourceFile,
    });
  }

  return files;
}

export async function planOutputs(
  root: string,
  outputs: ReadonlyMap<string, readonly GeneratedUnit[]>,
): Promise<PlannedFile[]> {
  const files: PlannedFile[] = [];
  for (const [sourceFile, units] of outputs) {
    files.push(...(await planFileOutputs(root, sourceFile, units)));
  }
  return files;
}

/**
 * Write planned files, or print them on a dry run
 */
export async function writeOutputs(files: readonly PlannedFile[], options: WriteOptions): Promise<void> {
  const print = options.print ?? ((text: string) => console.log(text));

  for (const file of files) {
    const relative = path.relative(options.root, file.path) || file.path;

    if (options.dryRun) {
      print(`Output: ${relative} (${file.kind})\n${"=".repeat(80)}\n${file.content}`);
      continue;
    }

    try {
      await fs.mkdir(path.dirname(file.path), { recursive: true });
      await fs.writeFile(file.path, file.content, "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to write ${file.path}`, { filePath: file.path }, { cause: error });
    }
    logger.info("Wrote generated code", { file: relative, kind: file.kind });
  }
}
