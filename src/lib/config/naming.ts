/**
 * Function and file name patterns
 */

import { toPascalCase, toSnakeCase } from "../../utils/case.js";

export const BACKEND_PLACEHOLDER = "{backend";

/**
 * Substitute `{type}`, `{type_snake}`, `{type_pascal}` and `{backend}`
 */
export function renderFnPattern(pattern: string, typeName: string, backend?: string): string {
  let rendered = pattern
    .replaceAll("{type_snake}", toSnakeCase(typeName))
    .replaceAll("{type_pascal}", toPascalCase(typeName))
    .replaceAll("{type}", typeName);
  if (backend !== undefined) {
    rendered = rendered.replaceAll("{backend}", backend);
  }
  return rendered;
}

export function usesBackendPlaceholder(pattern: string): boolean {
  return pattern.includes(BACKEND_PLACEHOLDER);
}

/**
 * Canonical encoder names for each requested backend. When a type asks for
 * more than one backend and the pattern cannot tell them apart, each name
 * gets `_<backend>` appended.
 */
export function renderEncoderNames(
  pattern: string,
  typeName: string,
  backends: readonly string[],
): Map<string, string> {
  const distinct = [...new Set(backends)];
  const suffix = distinct.length > 1 && !usesBackendPlaceholder(pattern);
  const names = new Map<string, string>();
  for (const backend of distinct) {
    const name = renderFnPattern(pattern, typeName, backend);
    names.set(backend, suffix ? `${name}_${backend}` : name);
  }
  return names;
}

/**
 * Substitute `{module}`, `{module_snake}` and `{module_pascal}` in a file pattern
 */
export function renderFilePattern(pattern: string, moduleName: string): string {
  return pattern
    .replaceAll("{module_snake}", toSnakeCase(moduleName))
    .replaceAll("{module_pascal}", toPascalCase(moduleName))
    .replaceAll("{module}", moduleName);
}
