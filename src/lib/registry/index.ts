/**
 * Registry module - project-wide canonical names
 */

import type { ParsedModule } from "../../types/data-model.js";
import type { FnNamingConfig } from "../../types/config.js";
import { GenerationError } from "../../utils/errors.js";
import { TypeRegistry } from "./registry.js";

export * from "./types.js";
export { TypeRegistry } from "./registry.js";

/**
 * Discover every declared type, then assign names from each type's
 * effective function naming. `namingFor` returns undefined for types whose
 * configuration could not be resolved; those keep no generated names.
 * Discovery errors go to `onError` when given, and that type is left out.
 */
export function buildTypeRegistry(
  modules: readonly ParsedModule[],
  namingFor: (module: ParsedModule, typeIndex: number) => FnNamingConfig | undefined,
  onError?: (module: ParsedModule, error: GenerationError) => void,
): TypeRegistry {
  const registry = new TypeRegistry();
  const discovered: Array<{ module: ParsedModule; typeIndex: number; index: number }> = [];

  for (const module of modules) {
    module.types.forEach((decl, typeIndex) => {
      try {
        discovered.push({ module, typeIndex, index: registry.discover(decl) });
      } catch (error) {
        if (!onError || !(error instanceof GenerationError)) throw error;
        onError(module, error);
      }
    });
  }

  for (const { module, typeIndex, index } of discovered) {
    const naming = namingFor(module, typeIndex);
    if (naming) registry.assignNames(index, naming);
  }

  return registry.freeze();
}
