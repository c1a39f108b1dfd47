/**
 * Decoder generation
 */

import { fieldBinding } from "../../types/data-model.js";
import type { ConstructorDecl } from "../../types/data-model.js";
import { escapeGleamString } from "../../utils/case.js";
import { renderFnPattern } from "../config/naming.js";
import type { TypeGenerationContext } from "./context.js";
import { DefaultValueSynthesizer } from "./default-value.js";
import {
  DEFAULT_TYPE_TAG,
  constructorTag,
  planEncoding,
  unknownVariantMessage,
} from "./encoding-planner.js";
import { isAbsentTolerant, jsonKey, resolveFieldDecoder } from "./field-codec.js";
import type { EncodingMode } from "./types.js";

function indentLines(lines: string[], indent: string): string {
  return lines.map((line) => `${indent}${line}`).join("\n");
}

/**
 * `use` statements for each field followed by `decode.success(...)`
 */
function constructorStatements(
  ctor: ConstructorDecl,
  mode: EncodingMode,
  ctx: TypeGenerationContext,
): string[] {
  if (mode === "plain-string" || ctor.fields.length === 0) {
    return [`decode.success(${ctor.name})`];
  }

  const statements = ctor.fields.map((field, index) => {
    const site = { typeName: ctx.decl.name, field, index };
    const binding = fieldBinding(field, index);
    const key = escapeGleamString(jsonKey(field, index, ctx.config.fieldNaming));
    const decoder = resolveFieldDecoder(site, ctx);

    if (isAbsentTolerant(field, ctx.config.absentFieldMode)) {
      ctx.markOptionHelpers();
      return `use ${binding} <- decode.optional_field("${key}", option.None, ${decoder})`;
    }
    return `use ${binding} <- decode.field("${key}", ${decoder})`;
  });

  const args = ctor.fields.map((field, index) =>
    field.label === undefined ? fieldBinding(field, index) : `${field.label}:`,
  );
  statements.push(`decode.success(${ctor.name}(${args.join(", ")}))`);
  return statements;
}

function multiConstructorBody(mode: EncodingMode, ctx: TypeGenerationContext): string[] {
  const decl = ctx.decl;
  const tagField = escapeGleamString(decl.typeTag ?? DEFAULT_TYPE_TAG);
  const lines = [
    mode === "plain-string"
      ? "use variant <- decode.then(decode.string)"
      : `use variant <- decode.field("${tagField}", decode.string)`,
    "case variant {",
  ];

  for (const ctor of decl.constructors) {
    const tag = escapeGleamString(constructorTag(ctor));
    const statements = constructorStatements(ctor, mode, ctx);
    if (statements.length === 1) {
      lines.push(`  "${tag}" -> ${statements.join("")}`);
    } else {
      lines.push(`  "${tag}" -> {`, ...statements.map((line) => `    ${line}`), "  }");
    }
  }

  const fallback = new DefaultValueSynthesizer(ctx).forType(decl);
  const message = escapeGleamString(
    unknownVariantMessage(decl.name, ctx.config.unknownVariantMessage, decl.constructors),
  );
  lines.push(`  _ -> decode.failure(${fallback}, "${message}")`, "}");
  return lines;
}

export function decoderName(ctx: TypeGenerationContext): string {
  return renderFnPattern(ctx.config.fnNaming.decoderFnPattern, ctx.decl.name);
}

/**
 * `pub fn <name>() -> decode.Decoder(<Type>)`
 */
export function generateDecoder(ctx: TypeGenerationContext): string {
  const decl = ctx.decl;
  const mode = planEncoding(decl.constructors, decl.disableTypeTag);
  const [single] = decl.constructors;

  const body =
    decl.constructors.length === 1 && single
      ? constructorStatements(single, mode, ctx)
      : multiConstructorBody(mode, ctx);

  return [
    `pub fn ${decoderName(ctx)}() -> decode.Decoder(${decl.name}) {`,
    indentLines(body, "  "),
    "}",
  ].join("\n");
}
