/**
 * Configuration file parser - supports TOML, YAML and JSON
 */

import { readFileSync } from "fs";
import path from "path";
import { parse as parseToml } from "@iarna/toml";
import { parse as parseYaml } from "yaml";
import type { ConfigLayer } from "../../types/config.js";
import { ConfigError, FileIOError, describeCause } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { configDocumentSchema, formatIssues, toConfigLayer } from "./schema.js";

export type ConfigFormat = "toml" | "yaml" | "json";

export function detectFormat(filePath: string): ConfigFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".toml") return "toml";
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".json") return "json";
  throw new ConfigError(
    `Unsupported config file format: ${filePath}. Must be .toml, .yaml, .yml or .json`,
    { filePath },
  );
}

/**
 * Parse raw document text into its untyped tree
 */
export function parseDocumentText(content: string, format: ConfigFormat, origin: string): unknown {
  try {
    if (format === "toml") return parseToml(content);
    if (format === "yaml") return parseYaml(content) ?? {};
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${origin}`, {
      filePath: origin,
      reason: describeCause(error),
    }, { cause: error });
  }
}

/**
 * Validate an untyped document and convert it to a config layer
 */
export function parseConfigDocument(document: unknown, origin: string): ConfigLayer {
  const result = configDocumentSchema.safeParse(document);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid config file: ${origin}: ${issues.join("; ")}`, {
      filePath: origin,
      issues,
    });
  }
  return toConfigLayer(result.data);
}

/**
 * Parse configuration file (TOML, YAML or JSON)
 */
export function parseConfigFile(filePath: string): ConfigLayer {
  logger.debug("Parsing configuration file", { filePath });

  const format = detectFormat(filePath);
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  return parseConfigDocument(parseDocumentText(content, format, filePath), filePath);
}
