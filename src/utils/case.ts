/**
 * Identifier case conversions used for tags, function names and JSON keys.
 */

const UPPERCASE = /\p{Lu}/u;

/**
 * `UserProfile` -> `user_profile`. Every uppercase character after the first
 * starts a new word, so `HTTPStatus` becomes `h_t_t_p_status`.
 */
export function toSnakeCase(value: string): string {
  let result = "";
  let index = 0;
  for (const char of value) {
    if (UPPERCASE.test(char)) {
      if (index > 0) result += "_";
      result += char.toLowerCase();
    } else {
      result += char;
    }
    index++;
  }
  return result;
}

/**
 * `user_profile` -> `UserProfile`
 */
export function toPascalCase(value: string): string {
  let result = "";
  let capitalizeNext = true;
  for (const char of value) {
    if (char === "_") {
      capitalizeNext = true;
    } else if (capitalizeNext) {
      result += char.toUpperCase();
      capitalizeNext = false;
    } else {
      result += char;
    }
  }
  return result;
}

/**
 * `created_at` -> `createdAt`. The first character is lowercased and each
 * underscore is dropped, uppercasing the character after it.
 */
export function toCamelCase(value: string): string {
  let result = "";
  let capitalizeNext = false;
  let index = 0;
  for (const char of value) {
    if (char === "_") {
      capitalizeNext = true;
    } else if (index === 0) {
      result += char.toLowerCase();
    } else if (capitalizeNext) {
      result += char.toUpperCase();
      capitalizeNext = false;
    } else {
      result += char;
    }
    index++;
  }
  return result;
}

export function escapeGleamString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/**
 * Alias used when importing a module into generated code: every
 * non-alphanumeric character becomes `_`.
 */
export function moduleAlias(modulePath: string): string {
  const alias = Array.from(modulePath, (char) => (/[\p{L}\p{N}]/u.test(char) ? char : "_")).join("");
  return alias.length > 0 ? alias : "module";
}

export function lastSegment(modulePath: string): string {
  const segments = modulePath.split("/");
  return segments[segments.length - 1] ?? modulePath;
}
