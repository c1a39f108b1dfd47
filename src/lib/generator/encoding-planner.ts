/**
 * Encoding planner - the JSON layout of a type
 */

import type { ConstructorDecl } from "../../types/data-model.js";
import { toSnakeCase } from "../../utils/case.js";
import type { EncodingMode } from "./types.js";

export const DEFAULT_TYPE_TAG = "type";

/**
 * All-zero-field types are plain strings whatever the tag setting. A single
 * constructor with fields, or a disabled tag, gives untagged objects.
 */
export function planEncoding(
  constructors: readonly ConstructorDecl[],
  disableTypeTag: boolean,
): EncodingMode {
  if (constructors.every((ctor) => ctor.fields.length === 0)) return "plain-string";
  if (disableTypeTag || constructors.length === 1) return "object-with-no-type-tag";
  return "object-with-type-tag";
}

export function constructorTag(ctor: ConstructorDecl): string {
  return toSnakeCase(ctor.name);
}

/**
 * `one of a, b` over the sorted distinct tags, the single tag, or `value`
 */
export function expectedVariants(constructors: readonly ConstructorDecl[]): string {
  const tags = [...new Set(constructors.map(constructorTag))].sort();
  if (tags.length === 0) return "value";
  if (tags.length === 1) return tags[0] ?? "value";
  return `one of ${tags.join(", ")}`;
}

export function unknownVariantMessage(
  typeName: string,
  template: string | undefined,
  constructors: readonly ConstructorDecl[],
): string {
  return template === undefined
    ? expectedVariants(constructors)
    : template.replaceAll("{type}", typeName);
}
