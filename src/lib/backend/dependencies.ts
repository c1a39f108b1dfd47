/**
 * Backend preconditions checked before any code is generated
 */

import type { ParsedModule } from "../../types/data-model.js";
import { GenerationError } from "../../utils/errors.js";
import type { BackendRegistry } from "./registry.js";
import type { EncoderBackend, ProjectManifest } from "./types.js";

/**
 * Distinct backend tags requested anywhere in the project, sorted
 */
export function collectRequestedBackends(modules: readonly ParsedModule[]): string[] {
  const tags = new Set<string>();
  for (const module of modules) {
    for (const decl of module.types) {
      decl.encoders.forEach((tag) => tags.add(tag));
    }
  }
  return [...tags].sort();
}

export function manifestHasPackage(manifest: ProjectManifest, pkg: string): boolean {
  return Object.hasOwn(manifest.dependencies, pkg) || Object.hasOwn(manifest.devDependencies, pkg);
}

/**
 * Every requested backend must be registered and find its packages in the
 * manifest's dependencies or dev-dependencies
 */
export function ensureBackendPreconditions(
  requested: readonly string[],
  backends: BackendRegistry,
  manifest: ProjectManifest | undefined,
): EncoderBackend[] {
  const resolved = requested.map((tag) => backends.require(tag));

  for (const backend of resolved) {
    const packages = backend.requiredPackages();
    if (packages.length === 0) continue;

    if (!manifest) {
      throw new GenerationError(
        `Encoder backend \`${backend.id}\` requires the \`${packages.join("`, `")}\` dependency, but gleam.toml was not found`,
        { backend: backend.id, packages: [...packages] },
      );
    }

    for (const pkg of packages) {
      if (!manifestHasPackage(manifest, pkg)) {
        throw new GenerationError(
          `Encoder backend \`${backend.id}\` requires the \`${pkg}\` dependency. Add \`${pkg} = "~> 1.0"\` (or your preferred version) to [dependencies] in gleam.toml.`,
          { backend: backend.id, package: pkg, manifest: manifest.path },
        );
      }
    }
  }

  return resolved;
}
