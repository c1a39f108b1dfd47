/**
 * Directive line tokenizer
 *
 * A directive line is a comma-separated list of entries. Each entry is a bare
 * keyword, `key = "value"`, `key = bare`, or `key(value)`. Commas inside
 * quotes or parentheses do not split entries.
 */

import type { DirectiveToken } from "./types.js";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function splitDirectiveEntries(line: string): string[] {
  const entries: string[] = [];
  let current = "";
  let depth = 0;
  let inQuotes = false;
  let escaped = false;

  for (const char of line) {
    if (inQuotes) {
      current += char;
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inQuotes = false;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === "(") {
      depth++;
    } else if (char === ")") {
      depth = Math.max(0, depth - 1);
    } else if (char === "," && depth === 0) {
      entries.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }

  entries.push(current.trim());
  return entries.filter((entry) => entry.length > 0);
}

/**
 * Strip surrounding quotes and resolve `\"` and `\\` escapes
 */
export function unquote(value: string): { text: string; quoted: boolean } {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    const body = trimmed.slice(1, -1).replace(/\\(["\\])/g, "$1");
    return { text: body, quoted: true };
  }
  return { text: trimmed, quoted: false };
}

export function tokenizeEntry(entry: string): DirectiveToken {
  const equals = entry.indexOf("=");
  const paren = entry.indexOf("(");

  if (equals > 0 && (paren < 0 || equals < paren)) {
    const { text, quoted } = unquote(entry.slice(equals + 1));
    return { key: entry.slice(0, equals).trim(), value: text, quoted, raw: entry };
  }

  if (paren > 0 && entry.endsWith(")")) {
    const { text, quoted } = unquote(entry.slice(paren + 1, -1));
    return { key: entry.slice(0, paren).trim(), value: text, quoted, raw: entry };
  }

  return { key: entry.trim(), quoted: false, raw: entry };
}

/**
 * Tokenize the text that follows a directive marker
 */
export function tokenizeDirectiveLine(line: string): DirectiveToken[] {
  return splitDirectiveEntries(line).map(tokenizeEntry);
}

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}
