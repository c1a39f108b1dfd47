/**
 * Built-in JSON backend targeting the gleam_json package
 */

import { escapeGleamString } from "../../utils/case.js";
import type { EncoderBackend, ObjectEntry } from "./types.js";

export interface ModuleBackendOptions {
  id: string;
  module: string; // e.g. gleam/json
  alias: string; // qualifier used in generated code
  outputType: string; // unqualified type name
  packages: readonly string[];
}

/**
 * Backend whose combinators all live in one module with json-style names:
 * `object`, `string`, `int`, `float`, `bool`, `nullable`, `array`.
 */
export class ModuleEncoderBackend implements EncoderBackend {
  readonly id: string;

  constructor(protected readonly options: ModuleBackendOptions) {
    this.id = options.id;
  }

  protected qualify(name: string): string {
    return `${this.options.alias}.${name}`;
  }

  moduleImports(): string[] {
    const last = this.options.module.split("/").pop();
    return last === this.options.alias
      ? [`import ${this.options.module}`]
      : [`import ${this.options.module} as ${this.options.alias}`];
  }

  returnType(): string {
    return this.qualify(this.options.outputType);
  }

  encodeObject(entries: readonly ObjectEntry[], indent: string): string {
    if (entries.length === 0) return this.encodeEmptyObject();
    const lines = entries.map(
      ([key, value]) => `${indent}  #("${escapeGleamString(key)}", ${value}),`,
    );
    return `${this.qualify("object")}([\n${lines.join("\n")}\n${indent}])`;
  }

  encodeEmptyObject(): string {
    return `${this.qualify("object")}([])`;
  }

  encodeStringLiteral(value: string): string {
    return `${this.qualify("string")}("${escapeGleamString(value)}")`;
  }

  encodeString(valueExpr: string): string {
    return `${this.qualify("string")}(${valueExpr})`;
  }

  encodeInt(valueExpr: string): string {
    return `${this.qualify("int")}(${valueExpr})`;
  }

  encodeFloat(valueExpr: string): string {
    return `${this.qualify("float")}(${valueExpr})`;
  }

  encodeBool(valueExpr: string): string {
    return `${this.qualify("bool")}(${valueExpr})`;
  }

  encodeNullable(valueExpr: string, innerEncoder: string): string {
    return `${this.qualify("nullable")}(${valueExpr}, ${innerEncoder})`;
  }

  encodeArray(valueExpr: string, innerEncoder: string): string {
    return `${this.qualify("array")}(${valueExpr}, ${innerEncoder})`;
  }

  requiredPackages(): readonly string[] {
    return this.options.packages;
  }
}

export class JsonEncoderBackend extends ModuleEncoderBackend {
  constructor() {
    super({
      id: "json",
      module: "gleam/json",
      alias: "json",
      outputType: "Json",
      packages: ["gleam_json"],
    });
  }
}
