/**
 * Configuration document schema
 */

import { z } from "zod";
import type { ConfigLayer } from "../../types/config.js";

const outputSectionSchema = z
  .object({
    directory: z.string().optional(),
    generated_file_naming: z.string().min(1).optional(),
    encode_module_naming: z.string().min(1).optional(),
    decode_module_naming: z.string().min(1).optional(),
    separate_files: z.boolean().optional(),
    separate_encoder_decoder: z.boolean().optional(),
  })
  .strict();

const fnNamingSectionSchema = z
  .object({
    encoder_function_naming: z.string().min(1).optional(),
    decoder_function_naming: z.string().min(1).optional(),
  })
  .strict();

export const configDocumentSchema = z
  .object({
    field_naming_strategy: z.enum(["snake_case", "camel_case"]).optional(),
    absent_field_mode: z.enum(["error_if_absent", "maybe_absent"]).optional(),
    decoder_unknown_variant_message: z.string().optional(),
    output: outputSectionSchema.optional(),
    fn_naming: fnNamingSectionSchema.optional(),
  })
  .strict();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

/**
 * Fields the document leaves out stay undefined in the layer
 */
export function toConfigLayer(document: ConfigDocument): ConfigLayer {
  const layer: ConfigLayer = {
    fieldNaming: document.field_naming_strategy,
    absentFieldMode: document.absent_field_mode,
    unknownVariantMessage: document.decoder_unknown_variant_message,
  };

  if (document.output) {
    layer.output = {
      directory: document.output.directory,
      generatedFileNaming: document.output.generated_file_naming,
      encodeModuleNaming: document.output.encode_module_naming,
      decodeModuleNaming: document.output.decode_module_naming,
      separateFiles: document.output.separate_files,
      separateEncoderDecoder: document.output.separate_encoder_decoder,
    };
  }

  if (document.fn_naming) {
    layer.fnNaming = {
      encoderFnPattern: document.fn_naming.encoder_function_naming,
      decoderFnPattern: document.fn_naming.decoder_function_naming,
    };
  }

  return layer;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
