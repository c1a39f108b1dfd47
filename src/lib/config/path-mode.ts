/**
 * Output directory anchoring
 */

import type { PathMode } from "../../types/config.js";

/**
 * A leading `@` or `/` anchors at the project root, `./` at the source file.
 * Anything else keeps the default of the layer that set the directory.
 */
export function inferPathMode(directory: string, defaultMode: PathMode): PathMode {
  if (directory.startsWith("@") || directory.startsWith("/")) return "project-relative";
  if (directory.startsWith("./")) return "file-relative";
  return defaultMode;
}

/**
 * Strip the anchoring marker from a directory
 */
export function cleanDirectory(directory: string): string {
  for (const marker of ["@/", "@", "/", "./"]) {
    if (directory.startsWith(marker)) {
      return directory.slice(marker.length);
    }
  }
  return directory;
}
