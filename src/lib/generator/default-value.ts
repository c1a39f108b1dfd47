/**
 * Default value synthesizer - fallback payload for decode failures
 *
 * Builds a value of a type from its first declared constructor. Anything it
 * cannot build (cycles, unknown types, functions, variables, holes) becomes a
 * `panic` expression that only fails if it is ever evaluated.
 */

import type { ConstructorDecl, TypeDecl, TypeExpr } from "../../types/data-model.js";
import { OPTION_MODULE } from "../../types/data-model.js";
import { escapeGleamString } from "../../utils/case.js";
import type { TypeGenerationContext } from "./context.js";

const PRIMITIVE_DEFAULTS = new Map<string, string>([
  ["String", '""'],
  ["Int", "0"],
  ["Float", "0.0"],
  ["Bool", "False"],
]);

export function panicPlaceholder(subject: string): string {
  return `panic as "${escapeGleamString(`No default value for ${subject}`)}"`;
}

export class DefaultValueSynthesizer {
  private readonly visiting = new Set<string>();

  constructor(private readonly ctx: TypeGenerationContext) {}

  forType(decl: TypeDecl): string {
    return this.customType(decl.modulePath, decl.name) ?? panicPlaceholder(decl.name);
  }

  private subject(modulePath: string, name: string): string {
    if (modulePath === this.ctx.modulePath) return name;
    return `${modulePath.replaceAll("/", ".")}.${name}`;
  }

  /**
   * undefined when the type is already being built on the current path
   */
  private customType(modulePath: string, name: string): string | undefined {
    const key = `${modulePath}#${name}`;
    if (this.visiting.has(key)) return undefined;

    const decl = this.ctx.registry.find({ module: modulePath, name }, this.ctx.modulePath)?.decl;
    const [first] = decl?.constructors ?? [];
    if (!decl || !first) return undefined;

    this.visiting.add(key);
    try {
      return this.constructorValue(decl, first);
    } finally {
      this.visiting.delete(key);
    }
  }

  private constructorValue(decl: TypeDecl, ctor: ConstructorDecl): string {
    const name = this.ctx.qualify(decl.modulePath, ctor.name);
    if (ctor.fields.length === 0) return name;

    const args = ctor.fields.map((field) => {
      const value = this.typeExpr(field.type, decl.modulePath);
      return field.label === undefined ? value : `${field.label}: ${value}`;
    });
    return `${name}(${args.join(", ")})`;
  }

  /**
   * `declaringModule` resolves unqualified names in the type expression
   */
  private typeExpr(type: TypeExpr, declaringModule: string): string {
    switch (type.kind) {
      case "named": {
        if (type.module === undefined && type.args.length === 0) {
          const primitive = PRIMITIVE_DEFAULTS.get(type.name);
          if (primitive !== undefined) return primitive;
        }
        if (type.module === undefined && type.name === "List") return "[]";
        if (type.module === OPTION_MODULE && type.name === "Option") {
          this.ctx.markOptionHelpers();
          return "option.None";
        }
        const modulePath = type.module ?? declaringModule;
        return (
          this.customType(modulePath, type.name) ??
          panicPlaceholder(this.subject(modulePath, type.name))
        );
      }
      case "tuple":
        return `#(${type.elements.map((el) => this.typeExpr(el, declaringModule)).join(", ")})`;
      case "function":
        return panicPlaceholder("function type");
      case "var":
        return panicPlaceholder(`type variable ${type.name}`);
      case "hole":
        return panicPlaceholder("type hole");
    }
  }
}
