/**
 * Per-directory configuration loading and cascading
 */

import { existsSync } from "fs";
import path from "path";
import type { Config, ConfigLayer } from "../../types/config.js";
import { defaultConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "./parser.js";
import { mergeLayers } from "./resolver.js";

export const CONFIG_FILE_NAMES = [
  "typeweave.toml",
  "typeweave.yaml",
  "typeweave.yml",
  "typeweave.json",
] as const;

/**
 * ConfigSource - Where directory documents come from
 */
export interface ConfigSource {
  loadLayer(directory: string): ConfigLayer | undefined;
}

/**
 * Reads the first config document found in each directory. Results are cached.
 */
export class FileConfigSource implements ConfigSource {
  private readonly cache = new Map<string, ConfigLayer | undefined>();

  loadLayer(directory: string): ConfigLayer | undefined {
    const key = path.resolve(directory);
    if (this.cache.has(key)) return this.cache.get(key);

    let layer: ConfigLayer | undefined;
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(key, name);
      if (existsSync(candidate)) {
        layer = parseConfigFile(candidate);
        logger.debug("Loaded config layer", { file: candidate });
        break;
      }
    }

    this.cache.set(key, layer);
    return layer;
  }
}

/**
 * In-memory documents keyed by directory
 */
export class MemoryConfigSource implements ConfigSource {
  private readonly layers = new Map<string, ConfigLayer>();

  constructor(layers: Record<string, ConfigLayer> = {}) {
    for (const [directory, layer] of Object.entries(layers)) {
      this.layers.set(path.resolve(directory), layer);
    }
  }

  loadLayer(directory: string): ConfigLayer | undefined {
    return this.layers.get(path.resolve(directory));
  }
}

/**
 * Directories between the project root (exclusive) and the file, closest first
 */
export function cascadeDirectories(root: string, filePath: string): string[] {
  const rootDir = path.resolve(root);
  const directories: string[] = [];
  let current = path.dirname(path.resolve(filePath));

  while (current !== rootDir) {
    const relative = path.relative(rootDir, current);
    if (relative.startsWith("..") || path.isAbsolute(relative)) break;
    directories.push(current);
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return directories;
}

/**
 * Root document, then every directory document from the furthest to the
 * closest. The closest wins.
 */
export function loadCascaded(root: string, filePath: string, source: ConfigSource): Config {
  const layers: ConfigLayer[] = [];
  const rootLayer = source.loadLayer(root);
  if (rootLayer) layers.push(rootLayer);

  for (const directory of cascadeDirectories(root, filePath).reverse()) {
    const layer = source.loadLayer(directory);
    if (layer) layers.push(layer);
  }

  return mergeLayers(defaultConfig(), layers);
}
