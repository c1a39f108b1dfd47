/**
 * Resolve module hints in field types against the module's imports
 */

import { OPTION_MODULE } from "../../types/data-model.js";
import type { ImportDecl, TypeExpr } from "../../types/data-model.js";
import { lastSegment } from "../../utils/case.js";
import { ParseError } from "../../utils/errors.js";
import type { ScannedModule } from "./types.js";

export interface ImportScope {
  aliases: Map<string, string>; // alias -> module path
  unqualified: Map<string, string>; // type name -> module path
  optionUnqualified: boolean;
}

export function importAlias(decl: ImportDecl): string {
  return decl.alias ?? lastSegment(decl.module);
}

/**
 * `Option` refers to gleam/option when imported unqualified from it, or when
 * no other module provides an unqualified `Option`. Other unqualified type
 * imports resolve to their module.
 */
export function buildImportScope(imports: ImportDecl[], filePath: string): ImportScope {
  const aliases = new Map<string, string>();
  const unqualified = new Map<string, string>();
  let fromOptionModule = false;
  const others: string[] = [];

  for (const decl of imports) {
    aliases.set(importAlias(decl), decl.module);
    decl.unqualifiedTypes.forEach((type) => unqualified.set(type, decl.module));
    if (decl.unqualifiedTypes.includes("Option")) {
      if (decl.module === OPTION_MODULE) fromOptionModule = true;
      else others.push(decl.module);
    }
  }

  if (fromOptionModule && others.length > 0) {
    throw new ParseError(
      `${filePath}: \`Option\` is imported unqualified from both ${OPTION_MODULE} and ${others.join(", ")}`,
      { filePath, modules: [OPTION_MODULE, ...others] },
    );
  }

  return { aliases, unqualified, optionUnqualified: fromOptionModule || others.length === 0 };
}

export function resolveTypeExpr(type: TypeExpr, scope: ImportScope): TypeExpr {
  switch (type.kind) {
    case "named": {
      const args = type.args.map((arg) => resolveTypeExpr(arg, scope));
      if (type.module === undefined) {
        if (type.name === "Option" && scope.optionUnqualified) {
          return { kind: "named", module: OPTION_MODULE, name: type.name, args };
        }
        const imported = scope.unqualified.get(type.name);
        return imported === undefined
          ? { kind: "named", name: type.name, args }
          : { kind: "named", module: imported, name: type.name, args };
      }
      const module = scope.aliases.get(type.module) ?? type.module;
      return { kind: "named", module, name: type.name, args };
    }
    case "tuple":
      return { kind: "tuple", elements: type.elements.map((el) => resolveTypeExpr(el, scope)) };
    case "function":
      return {
        kind: "function",
        args: type.args.map((arg) => resolveTypeExpr(arg, scope)),
        returns: resolveTypeExpr(type.returns, scope),
      };
    case "var":
    case "hole":
      return type;
  }
}

export function normalizeModule(module: ScannedModule): ScannedModule {
  const scope = buildImportScope(module.imports, module.filePath);
  return {
    ...module,
    types: module.types.map((decl) => ({
      ...decl,
      constructors: decl.constructors.map((ctor) => ({
        ...ctor,
        fields: ctor.fields.map((field) => ({ ...field, type: resolveTypeExpr(field.type, scope) })),
      })),
    })),
  };
}
