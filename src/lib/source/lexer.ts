/**
 * Tokenizer for the subset of Gleam syntax the scanner needs.
 * Comments are not tokens; they are attached to the token that follows them.
 */

import { ParseError } from "../../utils/errors.js";
import type { Token, TokenKind } from "./types.js";

const TWO_CHAR_PUNCT = new Set(["->", "<-", "..", "|>", "==", "!=", "<=", ">=", "<>", "&&", "||"]);

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isIdentStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isIdentPart(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

export function tokenize(source: string, filePath = "<input>"): Token[] {
  const tokens: Token[] = [];
  let pending: string[] = [];
  let line = 1;
  let i = 0;

  const push = (kind: TokenKind, text: string, startLine: number) => {
    tokens.push({ kind, text, line: startLine, comments: pending });
    pending = [];
  };

  while (i < source.length) {
    const char = source.charAt(i);

    if (char === "\n") {
      line++;
      i++;
      continue;
    }
    if (char === " " || char === "\t" || char === "\r") {
      i++;
      continue;
    }

    if (char === "/" && source.charAt(i + 1) === "/") {
      let end = source.indexOf("\n", i);
      if (end < 0) end = source.length;
      const body = source.slice(i, end).replace(/^\/+/, "");
      pending.push(body.startsWith(" ") ? body.slice(1) : body);
      i = end;
      continue;
    }

    if (char === '"') {
      const startLine = line;
      let j = i + 1;
      while (j < source.length && source.charAt(j) !== '"') {
        if (source.charAt(j) === "\\") j++;
        else if (source.charAt(j) === "\n") line++;
        j++;
      }
      if (j >= source.length) {
        throw new ParseError(`${filePath}:${startLine}: unterminated string literal`, {
          filePath,
          line: startLine,
        });
      }
      push("string", source.slice(i, j + 1), startLine);
      i = j + 1;
      continue;
    }

    if (isDigit(char)) {
      let j = i + 1;
      while (j < source.length && /[0-9A-Za-z_.]/.test(source.charAt(j))) {
        // `1..` is not part of the number
        if (source.charAt(j) === "." && source.charAt(j + 1) === ".") break;
        j++;
      }
      push("number", source.slice(i, j), line);
      i = j;
      continue;
    }

    if (isIdentStart(char)) {
      let j = i + 1;
      while (j < source.length && isIdentPart(source.charAt(j))) j++;
      const text = source.slice(i, j);
      const kind: TokenKind = char === "_" ? "discard" : /[A-Z]/.test(char) ? "upname" : "name";
      push(kind, text, line);
      i = j;
      continue;
    }

    const pair = source.slice(i, i + 2);
    if (TWO_CHAR_PUNCT.has(pair)) {
      push("punct", pair, line);
      i += 2;
      continue;
    }

    push("punct", char, line);
    i++;
  }

  push("eof", "", line);
  return tokens;
}
