/**
 * Generator module - two-pass code generation over a project
 */

import type { ParsedModule, TypeDecl } from "../../types/data-model.js";
import { hasGenerationRequest } from "../../types/data-model.js";
import { GenerationError, TypeweaveError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { collectRequestedBackends, ensureBackendPreconditions } from "../backend/dependencies.js";
import { BackendRegistry } from "../backend/registry.js";
import type { EncoderBackend, ProjectManifest } from "../backend/types.js";
import type { ConfigSource } from "../config/loader.js";
import { loadCascaded } from "../config/loader.js";
import { applyFileDirectives, resolveTypeConfig } from "../config/resolver.js";
import type { ResolvedConfig } from "../config/resolver.js";
import { OutputGrouper } from "../emitter/grouper.js";
import type { GeneratedUnit } from "../emitter/types.js";
import { buildTypeRegistry } from "../registry/index.js";
import type { TypeRegistry } from "../registry/registry.js";
import { TypeGenerationContext } from "./context.js";
import { generateDecoder } from "./decoder.js";
import { generateEncoder } from "./encoder.js";
import type { TypeOutput } from "./types.js";

export * from "./types.js";
export * from "./imports.js";
export * from "./context.js";
export * from "./encoding-planner.js";
export * from "./field-codec.js";
export * from "./default-value.js";
export * from "./decoder.js";
export * from "./encoder.js";

export interface ProjectInput {
  root: string;
  modules: readonly ParsedModule[];
  manifest?: ProjectManifest;
}

export interface GenerateOptions {
  configSource: ConfigSource;
  backends?: BackendRegistry;
}

/**
 * FileFailure - A file whose generation stopped at its first fatal error
 */
export interface FileFailure {
  filePath: string;
  modulePath: string;
  error: TypeweaveError;
}

export interface ProjectGenerationResult {
  outputs: Map<string, GeneratedUnit[]>;
  failures: FileFailure[];
  registry: TypeRegistry;
}

/**
 * Generate the decoder and encoders one type requested
 */
export function generateType(
  decl: TypeDecl,
  resolved: ResolvedConfig,
  registry: TypeRegistry,
  backends: BackendRegistry,
): TypeOutput {
  if (decl.parameters.length > 0) {
    throw new GenerationError(
      `Type \`${decl.name}\` has type parameters (${decl.parameters.join(", ")}); generic types are not supported`,
      { type: decl.name, module: decl.modulePath },
    );
  }

  const ctx = new TypeGenerationContext(decl, resolved.config, registry);
  const used = new Map<string, EncoderBackend>();

  const decoder = decl.decoder ? generateDecoder(ctx) : undefined;

  const encoders: string[] = [];
  for (const tag of decl.encoders) {
    const backend = backends.require(tag);
    used.set(tag, backend);
    encoders.push(generateEncoder(ctx, backend, tag));
  }

  return {
    code: {
      typeName: decl.name,
      modulePath: decl.modulePath,
      constructors: decl.constructors.map((ctor) => ctor.name),
      decoder,
      encoder: encoders.length > 0 ? encoders.join("\n\n") : undefined,
    },
    output: resolved.config.output,
    pathMode: resolved.pathMode,
    imports: ctx.imports,
    backends: used,
    usesOptionHelpers: ctx.usesOptionHelpers,
  };
}

/**
 * Pass 2 for one file
 */
export function generateModule(
  module: ParsedModule,
  typeConfigs: readonly ResolvedConfig[],
  registry: TypeRegistry,
  backends: BackendRegistry,
): GeneratedUnit[] {
  const grouper = new OutputGrouper();
  module.types.forEach((decl, index) => {
    const resolved = typeConfigs[index];
    if (!resolved || !hasGenerationRequest(decl)) return;
    grouper.add(generateType(decl, resolved, registry, backends));
  });
  return grouper.units();
}

/**
 * Effective config of every type in a module
 */
export function resolveModuleConfigs(
  root: string,
  module: ParsedModule,
  source: ConfigSource,
): ResolvedConfig[] {
  const fileConfig = applyFileDirectives(loadCascaded(root, module.filePath, source), module.fileDirectives);
  return module.types.map((decl) => resolveTypeConfig(fileConfig, decl));
}

function asTypeweaveError(error: unknown, module: ParsedModule): TypeweaveError {
  if (error instanceof TypeweaveError) return error;
  return new GenerationError(
    `Unexpected error while generating ${module.filePath}: ${error instanceof Error ? error.message : String(error)}`,
    { filePath: module.filePath, module: module.modulePath },
    { cause: error },
  );
}

export function generateForProject(input: ProjectInput, options: GenerateOptions): ProjectGenerationResult {
  const backends = options.backends ?? new BackendRegistry();
  const failures: FileFailure[] = [];

  // preconditions fail the whole run before anything is generated
  ensureBackendPreconditions(collectRequestedBackends(input.modules), backends, input.manifest);

  const configs = new Map<ParsedModule, ResolvedConfig[]>();
  const fail = (module: ParsedModule, error: unknown): void => {
    const failure = asTypeweaveError(error, module);
    logger.error(`Generation failed for ${module.filePath}`, { message: failure.message });
    failures.push({ filePath: module.filePath, modulePath: module.modulePath, error: failure });
  };

  for (const module of input.modules) {
    try {
      configs.set(module, resolveModuleConfigs(input.root, module, options.configSource));
    } catch (error) {
      fail(module, error);
    }
  }

  const registry = buildTypeRegistry(
    input.modules,
    (module, typeIndex) => configs.get(module)?.[typeIndex]?.config.fnNaming,
    (module, error) => {
      // first fatal error of a file stops it
      if (configs.delete(module)) fail(module, error);
    },
  );
  logger.debug("Type registry built", { types: registry.size });

  const outputs = new Map<string, GeneratedUnit[]>();
  for (const module of input.modules) {
    const typeConfigs = configs.get(module);
    if (!typeConfigs) continue;

    try {
      const units = generateModule(module, typeConfigs, registry, backends);
      if (units.length > 0) outputs.set(module.filePath, units);
    } catch (error) {
      fail(module, error);
    }
  }

  logger.debug("Generation finished", { files: outputs.size, failures: failures.length });
  return { outputs, failures, registry };
}
