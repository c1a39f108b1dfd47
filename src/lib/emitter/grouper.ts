/**
 * Output grouper - buckets a file's generated types by output routing
 */

import type { OutputConfig } from "../../types/config.js";
import { GenerationError } from "../../utils/errors.js";
import { cloneImports, mergeImports } from "../generator/imports.js";
import type { ImportMap, TypeOutput } from "../generator/types.js";
import type { GeneratedUnit } from "./types.js";

export const OPTION_ALIAS = "option";
export const OPTION_MODULE_PATH = "gleam/option";

export function outputConfigEquals(a: OutputConfig, b: OutputConfig): boolean {
  return (
    a.directory === b.directory &&
    a.generatedFileNaming === b.generatedFileNaming &&
    a.encodeModuleNaming === b.encodeModuleNaming &&
    a.decodeModuleNaming === b.decodeModuleNaming &&
    a.separateFiles === b.separateFiles &&
    a.separateEncoderDecoder === b.separateEncoderDecoder
  );
}

/**
 * `option.None` needs the alias `option` to mean gleam/option
 */
export function ensureNoOptionAliasConflict(imports: ImportMap): void {
  for (const entry of imports.values()) {
    if (entry.alias === OPTION_ALIAS && entry.modulePath !== OPTION_MODULE_PATH) {
      throw new GenerationError(
        `Cannot generate code because import alias \`${OPTION_ALIAS}\` is already used for \`${entry.modulePath}\`. Rename the conflicting import or its alias before running typeweave.`,
        { module: entry.modulePath, alias: OPTION_ALIAS },
      );
    }
  }
}

export class OutputGrouper {
  private readonly buckets: GeneratedUnit[] = [];

  add(output: TypeOutput): GeneratedUnit {
    const existing = this.buckets.find(
      (unit) => unit.pathMode === output.pathMode && outputConfigEquals(unit.output, output.output),
    );

    if (existing) {
      existing.types.push(output.code);
      mergeImports(existing.imports, output.imports);
      for (const [tag, backend] of output.backends) {
        if (!existing.backends.has(tag)) existing.backends.set(tag, backend);
      }
      existing.decoderUsesOptionHelpers =
        existing.decoderUsesOptionHelpers || output.usesOptionHelpers;
      if (existing.decoderUsesOptionHelpers) ensureNoOptionAliasConflict(existing.imports);
      return existing;
    }

    if (output.usesOptionHelpers) ensureNoOptionAliasConflict(output.imports);
    const unit: GeneratedUnit = {
      types: [output.code],
      output: { ...output.output },
      pathMode: output.pathMode,
      imports: cloneImports(output.imports),
      backends: new Map(output.backends),
      decoderUsesOptionHelpers: output.usesOptionHelpers,
    };
    this.buckets.push(unit);
    return unit;
  }

  units(): GeneratedUnit[] {
    return [...this.buckets];
  }
}
