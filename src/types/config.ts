/**
 * Configuration types
 */

export type FieldNamingStrategy = "snake_case" | "camel_case";

export type AbsentFieldMode = "error_if_absent" | "maybe_absent";

/**
 * PathMode - How an output directory is anchored
 */
export type PathMode = "file-relative" | "project-relative";

export interface OutputConfig {
  directory?: string; // kept as written, including any `@`, `/` or `./` marker
  generatedFileNaming: string;
  encodeModuleNaming: string;
  decodeModuleNaming: string;
  separateFiles: boolean;
  separateEncoderDecoder: boolean;
}

export interface FnNamingConfig {
  encoderFnPattern: string;
  decoderFnPattern: string;
}

export interface Config {
  fieldNaming: FieldNamingStrategy;
  absentFieldMode: AbsentFieldMode;
  unknownVariantMessage?: string;
  output: OutputConfig;
  fnNaming: FnNamingConfig;
}

/**
 * ConfigLayer - One configuration document; unset fields leave lower layers untouched
 */
export interface ConfigLayer {
  fieldNaming?: FieldNamingStrategy;
  absentFieldMode?: AbsentFieldMode;
  unknownVariantMessage?: string;
  output?: Partial<OutputConfig>;
  fnNaming?: Partial<FnNamingConfig>;
}

export const DEFAULT_OUTPUT_CONFIG: Readonly<OutputConfig> = {
  generatedFileNaming: "{module}_codecs.gleam",
  encodeModuleNaming: "encode_{module}.gleam",
  decodeModuleNaming: "decode_{module}.gleam",
  separateFiles: true,
  separateEncoderDecoder: false,
};

export const DEFAULT_FN_NAMING: Readonly<FnNamingConfig> = {
  encoderFnPattern: "{type_snake}_to_{backend}",
  decoderFnPattern: "{type_snake}_decoder",
};

export function defaultConfig(): Config {
  return {
    fieldNaming: "snake_case",
    absentFieldMode: "error_if_absent",
    output: { ...DEFAULT_OUTPUT_CONFIG },
    fnNaming: { ...DEFAULT_FN_NAMING },
  };
}
