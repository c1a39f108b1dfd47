/**
 * Attach directives to scanned declarations, producing the parsed-module contract
 */

import { isOptionType } from "../../types/data-model.js";
import type { ConstructorDecl, ParsedModule, TypeDecl } from "../../types/data-model.js";
import type { ScannedModule, ScannedType } from "../source/types.js";
import { foldFieldDirectives, foldFileDirectives, foldTypeDirectives } from "./fold.js";
import { parseFieldDirectives, parseFileDirectives, parseTypeDirectives } from "./parser.js";
import type { DirectiveDiagnostic } from "./types.js";

export interface ExtractedModule {
  module: ParsedModule;
  diagnostics: DirectiveDiagnostic[];
}

function withLocation(
  diagnostics: DirectiveDiagnostic[],
  location: string,
): DirectiveDiagnostic[] {
  return diagnostics.map((diagnostic) => ({ ...diagnostic, location }));
}

function buildTypeDecl(
  scanned: ScannedType,
  modulePath: string,
  filePath: string,
  diagnostics: DirectiveDiagnostic[],
): TypeDecl {
  const typeDirectives = parseTypeDirectives(scanned.comments.join("\n"));
  diagnostics.push(...withLocation(typeDirectives.diagnostics, `${filePath}:${scanned.line} (${scanned.name})`));
  const info = foldTypeDirectives(typeDirectives.directives);

  const constructors: ConstructorDecl[] = scanned.constructors.map((ctor) => ({
    name: ctor.name,
    fields: ctor.fields.map((field, index) => {
      const parsed = parseFieldDirectives(field.comments.join("\n"));
      const label = field.label ?? `field_${index}`;
      diagnostics.push(
        ...withLocation(parsed.diagnostics, `${filePath}:${field.line} (${scanned.name}.${label})`),
      );
      const fieldInfo = foldFieldDirectives(parsed.directives);
      return {
        label: field.label,
        type: field.type,
        isOption: isOptionType(field.type),
        marker: fieldInfo.marker,
        rename: fieldInfo.rename,
        decoderWith: fieldInfo.decoderWith,
        encoderWith: fieldInfo.encoderWith,
      };
    }),
  }));

  return {
    name: scanned.name,
    modulePath,
    parameters: scanned.parameters,
    constructors,
    encoders: info.encoders,
    decoder: info.decoder,
    fieldNaming: info.fieldNaming,
    typeTag: info.typeTag,
    disableTypeTag: info.disableTypeTag,
    output: info.output,
    unknownVariantMessage: info.unknownVariantMessage,
    fnNaming: info.fnNaming,
  };
}

export function extractModule(scanned: ScannedModule): ExtractedModule {
  const diagnostics: DirectiveDiagnostic[] = [];

  const fileDirectives = parseFileDirectives(scanned.comments.join("\n"));
  diagnostics.push(...withLocation(fileDirectives.diagnostics, scanned.filePath));

  const types = scanned.types
    .filter((decl) => decl.constructors.length > 0)
    .map((decl) => buildTypeDecl(decl, scanned.modulePath, scanned.filePath, diagnostics));

  return {
    module: {
      filePath: scanned.filePath,
      modulePath: scanned.modulePath,
      fileDirectives: foldFileDirectives(fileDirectives.directives),
      imports: scanned.imports,
      types,
    },
    diagnostics,
  };
}
