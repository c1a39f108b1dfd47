/**
 * Project loader - Gleam sources and manifest under a project root
 */

import { existsSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { parse as parseToml } from "@iarna/toml";
import fg from "fast-glob";
import type { ParsedModule } from "../../types/data-model.js";
import { ConfigError, FileIOError, ParseError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ProjectManifest } from "../backend/types.js";
import { extractModule } from "../directives/extract.js";
import type { DirectiveDiagnostic } from "../directives/types.js";
import { scanSource } from "../source/index.js";

export const MANIFEST_FILE = "gleam.toml";
export const SOURCE_DIR = "src";

export interface LoadProjectOptions {
  /** Treat directive diagnostics as parse errors */
  strict?: boolean;
}

export interface LoadedProject {
  root: string;
  modules: ParsedModule[];
  manifest?: ProjectManifest;
  diagnostics: DirectiveDiagnostic[];
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Dependency tables of a gleam.toml document. Missing tables are empty.
 */
export function parseManifest(text: string, manifestPath?: string): ProjectManifest {
  let document: Record<string, unknown>;
  try {
    document = parseToml(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${manifestPath ?? MANIFEST_FILE}`, { filePath: manifestPath }, { cause: error });
  }

  const dependencies = document["dependencies"];
  const devDependencies = document["dev-dependencies"];
  return {
    path: manifestPath,
    dependencies: isTable(dependencies) ? dependencies : {},
    devDependencies: isTable(devDependencies) ? devDependencies : {},
  };
}

export async function loadManifest(root: string): Promise<ProjectManifest | undefined> {
  const manifestPath = path.join(root, MANIFEST_FILE);
  if (!existsSync(manifestPath)) return undefined;

  try {
    return parseManifest(await fs.readFile(manifestPath, "utf-8"), manifestPath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new FileIOError(`Failed to read ${manifestPath}`, { filePath: manifestPath }, { cause: error });
  }
}

/**
 * `src/app/models/user.gleam` -> `app/models/user`
 */
export function modulePathFor(sourceDir: string, filePath: string): string {
  const relative = path.relative(sourceDir, filePath);
  const withoutExt = relative.slice(0, relative.length - path.extname(relative).length);
  return withoutExt.split(path.sep).join("/");
}

export function formatDiagnostic(diagnostic: DirectiveDiagnostic): string {
  return diagnostic.location ? `${diagnostic.location}: ${diagnostic.message}` : diagnostic.message;
}

async function readModule(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read ${filePath}`, { filePath }, { cause: error });
  }
}

/**
 * Scan every module under `src/` and read the manifest
 */
export async function loadProject(root: string, options: LoadProjectOptions = {}): Promise<LoadedProject> {
  const projectRoot = path.resolve(root);
  const sourceDir = path.join(projectRoot, SOURCE_DIR);

  const files = (await fg("**/*.gleam", { cwd: sourceDir, absolute: true, onlyFiles: true }))
    .map((file) => path.normalize(file))
    .sort();
  logger.debug("Discovered Gleam modules", { count: files.length, sourceDir });

  const modules: ParsedModule[] = [];
  const diagnostics: DirectiveDiagnostic[] = [];

  for (const filePath of files) {
    const modulePath = modulePathFor(sourceDir, filePath);
    const scanned = scanSource(await readModule(filePath), filePath, modulePath);
    const extracted = extractModule(scanned);
    modules.push(extracted.module);
    diagnostics.push(...extracted.diagnostics);
  }

  const [firstDiagnostic] = diagnostics;
  if (options.strict && firstDiagnostic) {
    throw new ParseError(formatDiagnostic(firstDiagnostic), {
      key: firstDiagnostic.key,
      reason: firstDiagnostic.reason,
      diagnostics: diagnostics.length,
    });
  }
  for (const diagnostic of diagnostics) {
    logger.warn(formatDiagnostic(diagnostic));
  }

  return {
    root: projectRoot,
    modules,
    manifest: await loadManifest(projectRoot),
    diagnostics,
  };
}
