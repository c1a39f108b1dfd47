/**
 * Directive parser - maps directive tokens onto the closed directive schema
 */

import { FILE_MARKER, TYPE_MARKER } from "./types.js";
import type {
  DirectiveDiagnostic,
  DirectiveLevel,
  DirectiveToken,
  FieldDirective,
  FileDirective,
  OutputDirective,
  ParsedDirectives,
  TypeDirective,
} from "./types.js";
import { isValidKey, tokenizeDirectiveLine } from "./tokenizer.js";

type AnyDirective = TypeDirective | FieldDirective;

/**
 * Result of building a directive from a token: the directive, or why the value was rejected
 */
type BuildResult<T> = { directive: T } | { invalid: string };

interface DirectiveRule {
  levels: readonly DirectiveLevel[];
  build(token: DirectiveToken): BuildResult<AnyDirective>;
}

const TYPE_AND_FILE: readonly DirectiveLevel[] = ["type", "file"];

function flag(directive: AnyDirective): DirectiveRule["build"] {
  return (token) =>
    token.value === undefined
      ? { directive }
      : { invalid: `\`${token.key}\` takes no value` };
}

function text(make: (value: string) => AnyDirective): DirectiveRule["build"] {
  return (token) => {
    if (token.value === undefined || token.value.length === 0) {
      return { invalid: `\`${token.key}\` requires a value` };
    }
    return { directive: make(token.value) };
  };
}

function bool(make: (value: boolean) => AnyDirective): DirectiveRule["build"] {
  return (token) => {
    if (token.value === "true") return { directive: make(true) };
    if (token.value === "false") return { directive: make(false) };
    return { invalid: `\`${token.key}\` expects true or false, got \`${token.value ?? ""}\`` };
  };
}

function backendTag(token: DirectiveToken): BuildResult<AnyDirective> {
  const value = token.value?.trim().toLowerCase();
  if (!value || !isValidKey(value)) {
    return { invalid: `\`encoder\` requires a backend identifier, e.g. \`encoder(json)\`` };
  }
  return { directive: { kind: "encoder", backend: value } };
}

const RULES: Record<string, DirectiveRule> = {
  encoder: { levels: ["type"], build: backendTag },
  decoder: { levels: ["type"], build: flag({ kind: "decoder" }) },
  snake_case: { levels: ["type"], build: flag({ kind: "naming", strategy: "snake_case" }) },
  camelCase: { levels: ["type"], build: flag({ kind: "naming", strategy: "camel_case" }) },
  type_tag: { levels: ["type"], build: text((field) => ({ kind: "type_tag", field })) },
  no_type_tag: { levels: ["type"], build: flag({ kind: "no_type_tag" }) },
  output_dir: {
    levels: TYPE_AND_FILE,
    build: text((directory) => ({ kind: "output_dir", directory })),
  },
  separate_encoder_decoder: {
    levels: TYPE_AND_FILE,
    build: bool((enabled) => ({ kind: "separate_encoder_decoder", enabled })),
  },
  generated_file_naming: {
    levels: TYPE_AND_FILE,
    build: text((pattern) => ({ kind: "generated_file_naming", pattern })),
  },
  encode_module_naming: {
    levels: TYPE_AND_FILE,
    build: text((pattern) => ({ kind: "encode_module_naming", pattern })),
  },
  decode_module_naming: {
    levels: TYPE_AND_FILE,
    build: text((pattern) => ({ kind: "decode_module_naming", pattern })),
  },
  unknown_variant_message: {
    levels: TYPE_AND_FILE,
    build: text((template) => ({ kind: "unknown_variant_message", template })),
  },
  encoder_fn: { levels: TYPE_AND_FILE, build: text((pattern) => ({ kind: "encoder_fn", pattern })) },
  decoder_fn: { levels: TYPE_AND_FILE, build: text((pattern) => ({ kind: "decoder_fn", pattern })) },

  maybe_absent: { levels: ["field"], build: flag({ kind: "presence", marker: "optional" }) },
  optional: { levels: ["field"], build: flag({ kind: "presence", marker: "optional" }) },
  must_exist: { levels: ["field"], build: flag({ kind: "presence", marker: "required" }) },
  required: { levels: ["field"], build: flag({ kind: "presence", marker: "required" }) },
  error_if_absent: { levels: ["field"], build: flag({ kind: "presence", marker: "required" }) },
  rename: { levels: ["field"], build: text((name) => ({ kind: "rename", name })) },
  decoder_with: {
    levels: ["field"],
    build: text((reference) => ({ kind: "decoder_with", reference })),
  },
  encoder_with: {
    levels: ["field"],
    build: text((reference) => ({ kind: "encoder_with", reference })),
  },
};

export const KNOWN_DIRECTIVE_KEYS: readonly string[] = Object.keys(RULES);

/**
 * Text following `marker` on each line that carries it
 */
export function extractDirectiveLines(text: string, marker: string): string[] {
  const lines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    let start = line.indexOf(marker);
    // `xweave!:` is not a marker
    while (start > 0 && /[\w-]/.test(line.charAt(start - 1))) {
      start = line.indexOf(marker, start + 1);
    }
    if (start >= 0) {
      lines.push(line.slice(start + marker.length).trim());
    }
  }
  return lines;
}

function parseTokens(
  lines: string[],
  level: DirectiveLevel,
): ParsedDirectives<AnyDirective> {
  const directives: AnyDirective[] = [];
  const diagnostics: DirectiveDiagnostic[] = [];

  for (const line of lines) {
    for (const token of tokenizeDirectiveLine(line)) {
      const rule = Object.hasOwn(RULES, token.key) ? RULES[token.key] : undefined;

      if (!rule) {
        diagnostics.push({
          level,
          key: token.key,
          raw: token.raw,
          reason: "unknown-key",
          message: `Unknown ${level} directive \`${token.key}\``,
        });
        continue;
      }

      if (!rule.levels.includes(level)) {
        diagnostics.push({
          level,
          key: token.key,
          raw: token.raw,
          reason: "wrong-level",
          message: `Directive \`${token.key}\` is not allowed at ${level} level (allowed: ${rule.levels.join(", ")})`,
        });
        continue;
      }

      const result = rule.build(token);
      if ("invalid" in result) {
        diagnostics.push({
          level,
          key: token.key,
          raw: token.raw,
          reason: "invalid-value",
          message: result.invalid,
        });
        continue;
      }
      directives.push(result.directive);
    }
  }

  return { directives, diagnostics };
}

function isTypeDirective(directive: AnyDirective): directive is TypeDirective {
  return directive.kind !== "presence"
    && directive.kind !== "rename"
    && directive.kind !== "decoder_with"
    && directive.kind !== "encoder_with";
}

function isFieldDirective(directive: AnyDirective): directive is FieldDirective {
  return !isTypeDirective(directive);
}

export function isOutputDirective(directive: TypeDirective): directive is OutputDirective {
  switch (directive.kind) {
    case "encoder":
    case "decoder":
    case "naming":
    case "type_tag":
    case "no_type_tag":
      return false;
    default:
      return true;
  }
}

/**
 * Parse `weave!:` lines from the comment block attached to a type
 */
export function parseTypeDirectives(commentText: string): ParsedDirectives<TypeDirective> {
  const parsed = parseTokens(extractDirectiveLines(commentText, TYPE_MARKER), "type");
  return { directives: parsed.directives.filter(isTypeDirective), diagnostics: parsed.diagnostics };
}

/**
 * Parse `weave!:` lines from the comment block attached to a field
 */
export function parseFieldDirectives(commentText: string): ParsedDirectives<FieldDirective> {
  const parsed = parseTokens(extractDirectiveLines(commentText, TYPE_MARKER), "field");
  return { directives: parsed.directives.filter(isFieldDirective), diagnostics: parsed.diagnostics };
}

/**
 * Parse every `weave-file!:` line of a module's comments
 */
export function parseFileDirectives(commentText: string): ParsedDirectives<FileDirective> {
  const parsed = parseTokens(extractDirectiveLines(commentText, FILE_MARKER), "file");
  const directives = parsed.directives.filter(isTypeDirective).filter(isOutputDirective);
  return { directives, diagnostics: parsed.diagnostics };
}
