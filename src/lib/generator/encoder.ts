/**
 * Encoder generation
 */

import { fieldBinding } from "../../types/data-model.js";
import type { ConstructorDecl } from "../../types/data-model.js";
import { toSnakeCase } from "../../utils/case.js";
import { GenerationError } from "../../utils/errors.js";
import type { EncoderBackend, ObjectEntry } from "../backend/types.js";
import { renderEncoderNames } from "../config/naming.js";
import type { TypeGenerationContext } from "./context.js";
import { DEFAULT_TYPE_TAG, constructorTag, planEncoding } from "./encoding-planner.js";
import { jsonKey, resolveFieldEncoder } from "./field-codec.js";
import type { EncodingMode } from "./types.js";

/**
 * `Ctor(a:, b:)` or `Ctor(field_0)`, binding every field
 */
function constructorPattern(ctor: ConstructorDecl): string {
  if (ctor.fields.length === 0) return ctor.name;
  const bindings = ctor.fields.map((field, index) =>
    field.label === undefined ? fieldBinding(field, index) : `${field.label}:`,
  );
  return `${ctor.name}(${bindings.join(", ")})`;
}

function constructorValue(
  ctor: ConstructorDecl,
  mode: EncodingMode,
  ctx: TypeGenerationContext,
  backend: EncoderBackend,
  backendTag: string,
  indent: string,
): string {
  if (mode === "plain-string") {
    return backend.encodeStringLiteral(constructorTag(ctor));
  }

  const entries: ObjectEntry[] = [];
  if (mode === "object-with-type-tag") {
    entries.push([
      ctx.decl.typeTag ?? DEFAULT_TYPE_TAG,
      backend.encodeStringLiteral(constructorTag(ctor)),
    ]);
  }

  ctor.fields.forEach((field, index) => {
    const site = { typeName: ctx.decl.name, field, index };
    entries.push([
      jsonKey(field, index, ctx.config.fieldNaming),
      resolveFieldEncoder(site, ctx, backend, backendTag, fieldBinding(field, index)),
    ]);
  });

  return backend.encodeObject(entries, indent);
}

export function encoderName(ctx: TypeGenerationContext, backendTag: string): string {
  const names = renderEncoderNames(ctx.config.fnNaming.encoderFnPattern, ctx.decl.name, ctx.decl.encoders);
  const name = names.get(backendTag);
  if (name === undefined) {
    throw new GenerationError(
      `Type \`${ctx.decl.name}\` does not request an encoder for backend \`${backendTag}\``,
      { type: ctx.decl.name, backend: backendTag },
    );
  }
  return name;
}

/**
 * `pub fn <name>(<type_snake>: <Type>) -> <backend output type>`
 */
export function generateEncoder(
  ctx: TypeGenerationContext,
  backend: EncoderBackend,
  backendTag: string,
): string {
  const decl = ctx.decl;
  const mode = planEncoding(decl.constructors, decl.disableTypeTag);
  const argument = toSnakeCase(decl.name);
  const [single] = decl.constructors;
  const lines: string[] = [
    `pub fn ${encoderName(ctx, backendTag)}(${argument}: ${decl.name}) -> ${backend.returnType()} {`,
  ];

  if (decl.constructors.length === 1 && single) {
    if (mode !== "plain-string" && single.fields.length > 0) {
      lines.push(`  let ${constructorPattern(single)} = ${argument}`);
    }
    lines.push(`  ${constructorValue(single, mode, ctx, backend, backendTag, "  ")}`);
  } else {
    lines.push(`  case ${argument} {`);
    for (const ctor of decl.constructors) {
      const value = constructorValue(ctor, mode, ctx, backend, backendTag, "    ");
      lines.push(`    ${constructorPattern(ctor)} -> ${value}`);
    }
    lines.push("  }");
  }

  lines.push("}");
  return lines.join("\n");
}
