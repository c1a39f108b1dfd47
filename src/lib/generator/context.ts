/**
 * Per-type generation state
 */

import type { Config } from "../../types/config.js";
import type { TypeDecl } from "../../types/data-model.js";
import type { TypeRegistry } from "../registry/registry.js";
import { ensureImport } from "./imports.js";
import type { ImportMap } from "./types.js";

export class TypeGenerationContext {
  readonly imports: ImportMap = new Map();
  private optionHelpers = false;

  constructor(
    readonly decl: TypeDecl,
    readonly config: Config,
    readonly registry: TypeRegistry,
  ) {}

  get modulePath(): string {
    return this.decl.modulePath;
  }

  get usesOptionHelpers(): boolean {
    return this.optionHelpers;
  }

  markOptionHelpers(): void {
    this.optionHelpers = true;
  }

  /**
   * `name` when it lives in the current module, `alias.name` otherwise
   */
  qualify(modulePath: string, name: string): string {
    if (modulePath === this.decl.modulePath) return name;
    return `${ensureImport(this.imports, modulePath)}.${name}`;
  }
}
