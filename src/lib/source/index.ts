/**
 * Source module - Gleam text to scanned declarations
 */

import { normalizeModule } from "./normalize.js";
import { scanModule } from "./scanner.js";
import type { ScannedModule } from "./types.js";

export * from "./types.js";
export { tokenize } from "./lexer.js";
export { scanModule } from "./scanner.js";
export * from "./normalize.js";

/**
 * Scan a module and resolve its type references against its imports
 */
export function scanSource(source: string, filePath: string, modulePath: string): ScannedModule {
  return normalizeModule(scanModule(source, filePath, modulePath));
}
