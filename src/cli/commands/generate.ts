import { Command } from "commander";
import path from "path";
import { hasGenerationRequest } from "../../types/data-model.js";
import { BackendRegistry } from "../../lib/backend/registry.js";
import { FileConfigSource } from "../../lib/config/loader.js";
import type { ConfigSource } from "../../lib/config/loader.js";
import { planOutputs, writeOutputs } from "../../lib/emitter/writer.js";
import { generateForProject } from "../../lib/generator/index.js";
import type { FileFailure } from "../../lib/generator/index.js";
import { loadProject } from "../../lib/project/index.js";
import { ErrorCode, TypeweaveError, exitCodeFor } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const NO_ANNOTATIONS_HINT =
  "No annotated types found. Add a `// weave!: decoder, encoder(json)` comment above a custom type to generate code for it.";

export interface GenerateCommandOptions {
  path: string;
  dryRun?: boolean;
  strict?: boolean;
}

export interface RunGenerateOptions extends GenerateCommandOptions {
  configSource?: ConfigSource;
  backends?: BackendRegistry;
  print?: (text: string) => void;
}

export interface GenerateSummary {
  annotatedTypes: number;
  files: string[];
  failures: FileFailure[];
}

/**
 * Load, generate and write one project. Failures of individual files are
 * returned; anything that stops the whole run is thrown.
 */
export async function runGenerate(options: RunGenerateOptions): Promise<GenerateSummary> {
  const root = path.resolve(options.path);
  const print = options.print ?? ((text: string) => console.log(text));

  const project = await loadProject(root, { strict: options.strict });
  const annotatedTypes = project.modules.reduce(
    (count, module) => count + module.types.filter(hasGenerationRequest).length,
    0,
  );

  if (annotatedTypes === 0) {
    print(NO_ANNOTATIONS_HINT);
    return { annotatedTypes, files: [], failures: [] };
  }

  const result = generateForProject(
    { root, modules: project.modules, manifest: project.manifest },
    {
      configSource: options.configSource ?? new FileConfigSource(),
      backends: options.backends,
    },
  );

  const planned = await planOutputs(root, result.outputs);
  await writeOutputs(planned, { root, dryRun: options.dryRun, print });

  logger.info("Generation complete", {
    types: annotatedTypes,
    files: planned.length,
    failures: result.failures.length,
  });

  return {
    annotatedTypes,
    files: planned.map((file) => file.path),
    failures: result.failures,
  };
}

function toTypeweaveError(error: unknown): TypeweaveError {
  if (error instanceof TypeweaveError) return error;
  return new TypeweaveError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate JSON decoders and encoders for annotated Gleam types")
    .option("-p, --path <dir>", "Project root containing gleam.toml and src/", ".")
    .option("--dry-run", "Print generated code instead of writing files", false)
    .option("--strict", "Fail on unknown or misplaced directive keys", false)
    .action(async (opts: GenerateCommandOptions) => {
      try {
        const summary = await runGenerate(opts);

        for (const failure of summary.failures) {
          console.error(JSON.stringify({ file: failure.filePath, ...failure.error.toResponse("generation") }, null, 2));
        }

        const [firstFailure] = summary.failures;
        process.exit(firstFailure ? exitCodeFor(firstFailure.error) : 0);
      } catch (error) {
        const typeweaveError = toTypeweaveError(error);
        console.error(JSON.stringify(typeweaveError.toResponse("generation"), null, 2));
        process.exit(exitCodeFor(typeweaveError));
      }
    });
}
