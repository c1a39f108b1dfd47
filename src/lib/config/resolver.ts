/**
 * Config layering: cascade merge, file directives, type directives
 */

import type { Config, ConfigLayer, OutputConfig, PathMode } from "../../types/config.js";
import type { FileDirectives, OutputOverride, TypeDecl } from "../../types/data-model.js";
import { inferPathMode } from "./path-mode.js";

/**
 * ResolvedConfig - Effective config plus the anchoring of its output directory
 */
export interface ResolvedConfig {
  config: Config;
  pathMode: PathMode;
}

function pick<T>(base: T, override: T | undefined): T {
  return override === undefined ? base : override;
}

/**
 * Apply one layer over a config. Only fields the layer set replace values.
 */
export function mergeLayer(base: Config, layer: ConfigLayer): Config {
  const output = layer.output ?? {};
  const fnNaming = layer.fnNaming ?? {};
  return {
    fieldNaming: pick(base.fieldNaming, layer.fieldNaming),
    absentFieldMode: pick(base.absentFieldMode, layer.absentFieldMode),
    unknownVariantMessage: pick(base.unknownVariantMessage, layer.unknownVariantMessage),
    output: {
      directory: pick(base.output.directory, output.directory),
      generatedFileNaming: pick(base.output.generatedFileNaming, output.generatedFileNaming),
      encodeModuleNaming: pick(base.output.encodeModuleNaming, output.encodeModuleNaming),
      decodeModuleNaming: pick(base.output.decodeModuleNaming, output.decodeModuleNaming),
      separateFiles: pick(base.output.separateFiles, output.separateFiles),
      separateEncoderDecoder: pick(
        base.output.separateEncoderDecoder,
        output.separateEncoderDecoder,
      ),
    },
    fnNaming: {
      encoderFnPattern: pick(base.fnNaming.encoderFnPattern, fnNaming.encoderFnPattern),
      decoderFnPattern: pick(base.fnNaming.decoderFnPattern, fnNaming.decoderFnPattern),
    },
  };
}

/**
 * Merge layers furthest to closest; later layers win
 */
export function mergeLayers(base: Config, layers: readonly ConfigLayer[]): Config {
  return layers.reduce(mergeLayer, base);
}

export function applyOutputOverride(output: OutputConfig, override: OutputOverride): OutputConfig {
  return {
    ...output,
    directory: pick(output.directory, override.directory),
    generatedFileNaming: pick(output.generatedFileNaming, override.generatedFileNaming),
    encodeModuleNaming: pick(output.encodeModuleNaming, override.encodeModuleNaming),
    decodeModuleNaming: pick(output.decodeModuleNaming, override.decodeModuleNaming),
    separateEncoderDecoder: pick(output.separateEncoderDecoder, override.separateEncoderDecoder),
  };
}

/**
 * Directive overrides shared by file and type level. A directory set here is
 * file-relative unless its marker says otherwise.
 */
function applyDirectives(resolved: ResolvedConfig, directives: FileDirectives): ResolvedConfig {
  let { config, pathMode } = resolved;

  if (directives.output) {
    config = { ...config, output: applyOutputOverride(config.output, directives.output) };
    if (directives.output.directory !== undefined) {
      pathMode = inferPathMode(directives.output.directory, "file-relative");
    }
  }

  if (directives.fnNaming) {
    config = {
      ...config,
      fnNaming: {
        encoderFnPattern: pick(config.fnNaming.encoderFnPattern, directives.fnNaming.encoderFnPattern),
        decoderFnPattern: pick(config.fnNaming.decoderFnPattern, directives.fnNaming.decoderFnPattern),
      },
    };
  }

  if (directives.unknownVariantMessage !== undefined) {
    config = { ...config, unknownVariantMessage: directives.unknownVariantMessage };
  }

  return { config, pathMode };
}

/**
 * Path mode of a cascaded config: project-relative when a document set a
 * directory, file-relative without one
 */
export function resolveCascaded(config: Config): ResolvedConfig {
  const directory = config.output.directory;
  return {
    config,
    pathMode: directory === undefined ? "file-relative" : inferPathMode(directory, "project-relative"),
  };
}

export function applyFileDirectives(cascaded: Config, directives: FileDirectives): ResolvedConfig {
  return applyDirectives(resolveCascaded(cascaded), directives);
}

/**
 * Effective config of one type: file-level result plus the type's own directives
 */
export function resolveTypeConfig(fileConfig: ResolvedConfig, decl: TypeDecl): ResolvedConfig {
  const resolved = applyDirectives(fileConfig, {
    output: decl.output,
    fnNaming: decl.fnNaming,
    unknownVariantMessage: decl.unknownVariantMessage,
  });
  if (decl.fieldNaming === undefined) return resolved;
  return { ...resolved, config: { ...resolved.config, fieldNaming: decl.fieldNaming } };
}
