/**
 * Field codec resolver - JSON key, presence and value codec of a field
 */

import type { AbsentFieldMode, FieldNamingStrategy } from "../../types/config.js";
import { fieldBinding, renderTypeExpr } from "../../types/data-model.js";
import type { FieldDecl, NamedTypeExpr, TypeExpr } from "../../types/data-model.js";
import { OPTION_MODULE } from "../../types/data-model.js";
import { toCamelCase } from "../../utils/case.js";
import { GenerationError } from "../../utils/errors.js";
import type { EncoderBackend } from "../backend/types.js";
import type { TypeGenerationContext } from "./context.js";

export type Primitive = "String" | "Int" | "Float" | "Bool";

const PRIMITIVES: readonly Primitive[] = ["String", "Int", "Float", "Bool"];

const PRIMITIVE_DECODERS: Record<Primitive, string> = {
  String: "decode.string",
  Int: "decode.int",
  Float: "decode.float",
  Bool: "decode.bool",
};

type Leaf = { kind: "primitive"; primitive: Primitive } | { kind: "named"; type: NamedTypeExpr };

/**
 * FieldShape - The structurally derivable form of a field type
 */
export interface FieldShape {
  wrapper?: "list" | "option";
  leaf: Leaf;
}

export interface FunctionReference {
  modulePath?: string;
  name: string;
}

export interface FieldSite {
  typeName: string;
  field: FieldDecl;
  index: number;
}

function asPrimitive(type: NamedTypeExpr): Primitive | undefined {
  if (type.module !== undefined || type.args.length > 0) return undefined;
  return PRIMITIVES.find((primitive) => primitive === type.name);
}

function isList(type: NamedTypeExpr): boolean {
  return type.module === undefined && type.name === "List" && type.args.length === 1;
}

function isOption(type: NamedTypeExpr): boolean {
  return type.module === OPTION_MODULE && type.name === "Option" && type.args.length === 1;
}

export function jsonKey(field: FieldDecl, index: number, naming: FieldNamingStrategy): string {
  if (field.rename !== undefined) return field.rename;
  const binding = fieldBinding(field, index);
  return naming === "camel_case" ? toCamelCase(binding) : binding;
}

/**
 * An explicit marker wins. Otherwise only option-typed fields under
 * `maybe_absent` may be missing from the input.
 */
export function isAbsentTolerant(field: FieldDecl, absentFieldMode: AbsentFieldMode): boolean {
  if (field.marker === "optional") return true;
  if (field.marker === "required") return false;
  return absentFieldMode === "maybe_absent" && field.isOption;
}

function unsupported(site: FieldSite, shape: string, direction: "decoder" | "encoder"): GenerationError {
  const override = direction === "decoder" ? "a `decoder_with`" : "an `encoder_with`";
  const article = direction === "decoder" ? "a" : "an";
  const label = fieldBinding(site.field, site.index);
  return new GenerationError(
    `Cannot derive ${article} ${direction} for field \`${label}\` of type \`${site.typeName}\`: ${shape} is not supported. Provide ${override} override.`,
    { type: site.typeName, field: label, shape, remediation: `${direction}_with` },
  );
}

function describeShape(type: TypeExpr): string {
  switch (type.kind) {
    case "named":
      return `nested List/Option wrapping \`${renderTypeExpr(type)}\``;
    case "tuple":
      return `tuple type \`${renderTypeExpr(type)}\``;
    case "function":
      return `function type \`${renderTypeExpr(type)}\``;
    case "var":
      return `type variable \`${type.name}\``;
    case "hole":
      return `type hole \`${type.name}\``;
  }
}

function classifyLeaf(
  type: TypeExpr,
  site: FieldSite,
  direction: "decoder" | "encoder",
  outer: TypeExpr,
): Leaf {
  if (type.kind !== "named") throw unsupported(site, describeShape(type), direction);
  if (isList(type) || isOption(type)) throw unsupported(site, describeShape(outer), direction);
  const primitive = asPrimitive(type);
  return primitive ? { kind: "primitive", primitive } : { kind: "named", type };
}

/**
 * Zero or one level of List/Option around a primitive or named type
 */
export function classifyFieldType(
  type: TypeExpr,
  site: FieldSite,
  direction: "decoder" | "encoder",
): FieldShape {
  if (type.kind === "named" && (isList(type) || isOption(type))) {
    const [inner] = type.args;
    if (!inner) throw unsupported(site, describeShape(type), direction);
    return {
      wrapper: isList(type) ? "list" : "option",
      leaf: classifyLeaf(inner, site, direction, type),
    };
  }
  return { leaf: classifyLeaf(type, site, direction, type) };
}

/**
 * `module/path.function`, or a bare `function` in the current module
 */
export function parseFunctionReference(value: string): FunctionReference {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new GenerationError("Function reference cannot be empty", { reference: value });
  }

  const dot = trimmed.lastIndexOf(".");
  if (dot < 0) return { name: trimmed };

  const modulePath = trimmed.slice(0, dot).trim();
  const name = trimmed.slice(dot + 1).trim();
  if (name.length === 0) {
    throw new GenerationError(`Invalid function reference: \`${value}\``, { reference: value });
  }
  return modulePath.length > 0 ? { modulePath, name } : { name };
}

function renderReference(reference: FunctionReference, ctx: TypeGenerationContext): string {
  if (reference.modulePath === undefined) return reference.name;
  return ctx.qualify(reference.modulePath, reference.name);
}

function leafDecoder(leaf: Leaf, ctx: TypeGenerationContext): string {
  if (leaf.kind === "primitive") return PRIMITIVE_DECODERS[leaf.primitive];
  const resolved = ctx.registry.requireDecoder(leaf.type, ctx.modulePath);
  return `${ctx.qualify(resolved.entry.modulePath, resolved.name)}()`;
}

/**
 * Decoder expression for a field's value
 */
export function resolveFieldDecoder(site: FieldSite, ctx: TypeGenerationContext): string {
  if (site.field.decoderWith !== undefined) {
    return `${renderReference(parseFunctionReference(site.field.decoderWith), ctx)}()`;
  }

  const shape = classifyFieldType(site.field.type, site, "decoder");
  const inner = leafDecoder(shape.leaf, ctx);
  if (shape.wrapper === "list") return `decode.list(${inner})`;
  if (shape.wrapper === "option") return `decode.optional(${inner})`;
  return inner;
}

function primitiveEncoder(primitive: Primitive, backend: EncoderBackend, valueExpr: string): string {
  switch (primitive) {
    case "String":
      return backend.encodeString(valueExpr);
    case "Int":
      return backend.encodeInt(valueExpr);
    case "Float":
      return backend.encodeFloat(valueExpr);
    case "Bool":
      return backend.encodeBool(valueExpr);
  }
}

function namedEncoder(
  type: NamedTypeExpr,
  ctx: TypeGenerationContext,
  backendTag: string,
): string {
  const resolved = ctx.registry.requireEncoder(type, ctx.modulePath, backendTag);
  return ctx.qualify(resolved.entry.modulePath, resolved.name);
}

/**
 * Function value encoding one element of a list or option
 */
function innerEncoder(
  leaf: Leaf,
  ctx: TypeGenerationContext,
  backend: EncoderBackend,
  backendTag: string,
): string {
  if (leaf.kind === "named") return namedEncoder(leaf.type, ctx, backendTag);
  return `fn(item) { ${primitiveEncoder(leaf.primitive, backend, "item")} }`;
}

/**
 * Encoder expression for a field's value bound to `valueExpr`
 */
export function resolveFieldEncoder(
  site: FieldSite,
  ctx: TypeGenerationContext,
  backend: EncoderBackend,
  backendTag: string,
  valueExpr: string,
): string {
  if (site.field.encoderWith !== undefined) {
    return `${renderReference(parseFunctionReference(site.field.encoderWith), ctx)}(${valueExpr})`;
  }

  const shape = classifyFieldType(site.field.type, site, "encoder");
  if (shape.wrapper === "list") {
    return backend.encodeArray(valueExpr, innerEncoder(shape.leaf, ctx, backend, backendTag));
  }
  if (shape.wrapper === "option") {
    return backend.encodeNullable(valueExpr, innerEncoder(shape.leaf, ctx, backend, backendTag));
  }
  if (shape.leaf.kind === "primitive") {
    return primitiveEncoder(shape.leaf.primitive, backend, valueExpr);
  }
  return `${namedEncoder(shape.leaf.type, ctx, backendTag)}(${valueExpr})`;
}
