/**
 * Whole-project type registry
 *
 * Types are discovered first and get a stable index each. Canonical names are
 * assigned once every type is known, then the registry is frozen.
 */

import type { FnNamingConfig } from "../../types/config.js";
import type { TypeDecl } from "../../types/data-model.js";
import { lastSegment } from "../../utils/case.js";
import { GenerationError } from "../../utils/errors.js";
import { renderEncoderNames, renderFnPattern } from "../config/naming.js";
import type { RegistryEntry, ResolvedFunction, TypeReference } from "./types.js";

function key(modulePath: string, typeName: string): string {
  return `${modulePath}#${typeName}`;
}

export class TypeRegistry {
  private readonly entries: RegistryEntry[] = [];
  private readonly byKey = new Map<string, number>();
  private frozen = false;

  get size(): number {
    return this.entries.length;
  }

  /**
   * Assign the next index to a declaration
   */
  discover(decl: TypeDecl): number {
    this.assertMutable();
    const entryKey = key(decl.modulePath, decl.name);
    if (this.byKey.has(entryKey)) {
      throw new GenerationError(`Type \`${decl.name}\` is declared twice in module ${decl.modulePath}`, {
        module: decl.modulePath,
        type: decl.name,
      });
    }

    const index = this.entries.length;
    this.entries.push({
      index,
      modulePath: decl.modulePath,
      typeName: decl.name,
      decl,
      encoderNames: new Map(),
    });
    this.byKey.set(entryKey, index);
    return index;
  }

  /**
   * Record canonical names from the type's effective function naming
   */
  assignNames(index: number, fnNaming: FnNamingConfig): void {
    this.assertMutable();
    const entry = this.at(index);
    const decl = entry.decl;
    entry.decoderName = decl.decoder
      ? renderFnPattern(fnNaming.decoderFnPattern, decl.name)
      : undefined;
    entry.encoderNames = renderEncoderNames(fnNaming.encoderFnPattern, decl.name, decl.encoders);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  at(index: number): RegistryEntry {
    const entry = this.entries[index];
    if (!entry) {
      throw new GenerationError(`No registry entry at index ${index}`, { index });
    }
    return entry;
  }

  get(modulePath: string, typeName: string): RegistryEntry | undefined {
    const index = this.byKey.get(key(modulePath, typeName));
    return index === undefined ? undefined : this.entries[index];
  }

  /**
   * Look up a referenced type. Without a module hint the current module is
   * used. A hint that matches no module path exactly is retried against the
   * last path segment of every module.
   */
  find(reference: TypeReference, currentModule: string): RegistryEntry | undefined {
    if (reference.module === undefined) {
      return this.get(currentModule, reference.name);
    }

    const exact = this.get(reference.module, reference.name);
    if (exact) return exact;

    const hint = reference.module;
    return this.entries.find(
      (entry) => entry.typeName === reference.name && lastSegment(entry.modulePath) === hint,
    );
  }

  entriesInOrder(): readonly RegistryEntry[] {
    return this.entries;
  }

  requireDecoder(reference: TypeReference, currentModule: string): ResolvedFunction {
    const entry = this.find(reference, currentModule);
    if (!entry) {
      throw new GenerationError(
        `Unable to determine decoder for type \`${reference.name}\`: it is not declared in this project. Declare it with a \`weave!: decoder\` directive or provide a \`decoder_with\` override.`,
        { type: reference.name, module: reference.module ?? currentModule, capability: "decoder" },
      );
    }
    if (entry.decoderName === undefined) {
      throw new GenerationError(
        `Decoder requested for type \`${entry.typeName}\` (module ${entry.modulePath}) but none is generated. Add \`decoder\` to its directive or provide a \`decoder_with\` override.`,
        { type: entry.typeName, module: entry.modulePath, capability: "decoder" },
      );
    }
    return { entry, name: entry.decoderName };
  }

  requireEncoder(reference: TypeReference, currentModule: string, backend: string): ResolvedFunction {
    const entry = this.find(reference, currentModule);
    if (!entry) {
      throw new GenerationError(
        `Unable to determine encoder for type \`${reference.name}\`: it is not declared in this project. Declare it with a \`weave!: encoder(${backend})\` directive or provide an \`encoder_with\` override.`,
        { type: reference.name, module: reference.module ?? currentModule, capability: `encoder(${backend})` },
      );
    }
    const name = entry.encoderNames.get(backend);
    if (name === undefined) {
      throw new GenerationError(
        `Encoder requested for type \`${entry.typeName}\` (module ${entry.modulePath}) with backend \`${backend}\` but none is generated. Add \`encoder(${backend})\` to its directive or provide an \`encoder_with\` override.`,
        { type: entry.typeName, module: entry.modulePath, capability: `encoder(${backend})` },
      );
    }
    return { entry, name };
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new GenerationError("The type registry is frozen once names are assigned");
    }
  }
}
