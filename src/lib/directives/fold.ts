/**
 * Fold parsed directives into declaration settings. Later directives win.
 */

import type { FieldNamingStrategy } from "../../types/config.js";
import type {
  FieldMarker,
  FileDirectives,
  FnNamingOverride,
  OutputOverride,
} from "../../types/data-model.js";
import type { FieldDirective, FileDirective, OutputDirective, TypeDirective } from "./types.js";
import { isOutputDirective } from "./parser.js";

export interface TypeDirectiveInfo extends FileDirectives {
  encoders: string[];
  decoder: boolean;
  fieldNaming?: FieldNamingStrategy;
  typeTag?: string;
  disableTypeTag: boolean;
}

export interface FieldDirectiveInfo {
  marker: FieldMarker;
  rename?: string;
  decoderWith?: string;
  encoderWith?: string;
}

function applyOutputDirective(target: FileDirectives, directive: OutputDirective): void {
  const output: OutputOverride = target.output ?? {};
  const fnNaming: FnNamingOverride = target.fnNaming ?? {};

  switch (directive.kind) {
    case "output_dir":
      output.directory = directive.directory;
      target.output = output;
      break;
    case "separate_encoder_decoder":
      output.separateEncoderDecoder = directive.enabled;
      target.output = output;
      break;
    case "generated_file_naming":
      output.generatedFileNaming = directive.pattern;
      target.output = output;
      break;
    case "encode_module_naming":
      output.encodeModuleNaming = directive.pattern;
      target.output = output;
      break;
    case "decode_module_naming":
      output.decodeModuleNaming = directive.pattern;
      target.output = output;
      break;
    case "unknown_variant_message":
      target.unknownVariantMessage = directive.template;
      break;
    case "encoder_fn":
      fnNaming.encoderFnPattern = directive.pattern;
      target.fnNaming = fnNaming;
      break;
    case "decoder_fn":
      fnNaming.decoderFnPattern = directive.pattern;
      target.fnNaming = fnNaming;
      break;
  }
}

export function foldFileDirectives(directives: FileDirective[]): FileDirectives {
  const result: FileDirectives = {};
  for (const directive of directives) {
    applyOutputDirective(result, directive);
  }
  return result;
}

export function foldTypeDirectives(directives: TypeDirective[]): TypeDirectiveInfo {
  const info: TypeDirectiveInfo = { encoders: [], decoder: false, disableTypeTag: false };

  for (const directive of directives) {
    if (isOutputDirective(directive)) {
      applyOutputDirective(info, directive);
      continue;
    }
    switch (directive.kind) {
      case "encoder":
        if (!info.encoders.includes(directive.backend)) {
          info.encoders.push(directive.backend);
        }
        break;
      case "decoder":
        info.decoder = true;
        break;
      case "naming":
        info.fieldNaming = directive.strategy;
        break;
      case "type_tag":
        info.typeTag = directive.field;
        break;
      case "no_type_tag":
        info.disableTypeTag = true;
        break;
    }
  }

  return info;
}

/**
 * The optional family beats the required family regardless of order
 */
export function foldFieldDirectives(directives: FieldDirective[]): FieldDirectiveInfo {
  const info: FieldDirectiveInfo = { marker: "default" };
  let optional = false;
  let required = false;

  for (const directive of directives) {
    switch (directive.kind) {
      case "presence":
        if (directive.marker === "optional") optional = true;
        else required = true;
        break;
      case "rename":
        info.rename = directive.name;
        break;
      case "decoder_with":
        info.decoderWith = directive.reference;
        break;
      case "encoder_with":
        info.encoderWith = directive.reference;
        break;
    }
  }

  if (optional) info.marker = "optional";
  else if (required) info.marker = "required";
  return info;
}
