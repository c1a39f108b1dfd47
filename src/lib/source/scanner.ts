/**
 * Gleam source scanner - extracts imports and custom type declarations
 */

import type { ImportDecl, TypeExpr } from "../../types/data-model.js";
import { ParseError } from "../../utils/errors.js";
import { tokenize } from "./lexer.js";
import type {
  ScannedConstructor,
  ScannedField,
  ScannedModule,
  ScannedType,
  Token,
} from "./types.js";

const ITEM_STARTS = new Set(["import", "pub", "type", "fn", "const", "@"]);
const OPEN = new Set(["(", "[", "{"]);
const CLOSE = new Set([")", "]", "}"]);

class TokenCursor {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly filePath: string,
  ) {}

  peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      throw new ParseError(`${this.filePath}: empty token stream`, { filePath: this.filePath });
    }
    return token;
  }

  next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return token;
  }

  get position(): number {
    return this.index;
  }

  /**
   * Comments attached to the tokens from `start` up to and including the current one
   */
  commentsFrom(start: number): string[] {
    return this.tokens.slice(start, this.index + 1).flatMap((token) => token.comments);
  }

  atEnd(): boolean {
    return this.peek().kind === "eof";
  }

  is(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind !== "string" && token.kind !== "eof" && token.text === text;
  }

  accept(text: string): boolean {
    if (this.is(text)) {
      this.next();
      return true;
    }
    return false;
  }

  expect(text: string): Token {
    if (!this.is(text)) this.fail(`expected \`${text}\``);
    return this.next();
  }

  expectKind(kind: Token["kind"], what: string): Token {
    if (this.peek().kind !== kind) this.fail(`expected ${what}`);
    return this.next();
  }

  fail(message: string): never {
    const token = this.peek();
    const found = token.kind === "eof" ? "end of file" : `\`${token.text}\``;
    throw new ParseError(`${this.filePath}:${token.line}: ${message}, found ${found}`, {
      filePath: this.filePath,
      line: token.line,
    });
  }
}

/**
 * Scan one Gleam module
 */
export function scanModule(source: string, filePath: string, modulePath: string): ScannedModule {
  const tokens = tokenize(source, filePath);
  const cursor = new TokenCursor(tokens, filePath);
  const imports: ImportDecl[] = [];
  const types: ScannedType[] = [];

  while (!cursor.atEnd()) {
    if (cursor.is("import")) {
      imports.push(parseImport(cursor));
      continue;
    }

    const start = cursor.position;
    skipAttributes(cursor);

    const lookahead = cursor.is("pub") ? (cursor.is("opaque", 1) ? 2 : 1) : 0;
    if (cursor.is("type", lookahead)) {
      for (let i = 0; i < lookahead; i++) cursor.next();
      const declaration = parseTypeDefinition(cursor, cursor.commentsFrom(start));
      if (declaration) types.push(declaration);
      continue;
    }

    skipItem(cursor);
  }

  return {
    filePath,
    modulePath,
    imports,
    types,
    comments: tokens.flatMap((token) => token.comments),
  };
}

function skipAttributes(cursor: TokenCursor): void {
  while (cursor.is("@")) {
    cursor.next();
    cursor.expectKind("name", "attribute name");
    if (cursor.is("(")) skipBalanced(cursor);
  }
}

function skipBalanced(cursor: TokenCursor): void {
  let depth = 0;
  do {
    const token = cursor.next();
    if (token.kind === "eof") cursor.fail("unbalanced brackets");
    if (token.kind === "punct" && OPEN.has(token.text)) depth++;
    if (token.kind === "punct" && CLOSE.has(token.text)) depth--;
  } while (depth > 0);
}

/**
 * Skip a function, constant or other item up to the start of the next one
 */
function skipItem(cursor: TokenCursor): void {
  let depth = 0;
  let consumed = false;

  while (!cursor.atEnd()) {
    const token = cursor.peek();
    const isPunct = token.kind === "punct";

    if (depth === 0 && consumed && token.kind !== "string" && ITEM_STARTS.has(token.text)) {
      return;
    }

    if (isPunct && CLOSE.has(token.text) && depth === 0) {
      cursor.fail("unbalanced brackets");
    }

    cursor.next();
    consumed = true;

    if (isPunct && OPEN.has(token.text)) depth++;
    else if (isPunct && CLOSE.has(token.text)) depth--;
  }

  if (depth > 0) cursor.fail("unbalanced brackets");
}

function parseImport(cursor: TokenCursor): ImportDecl {
  cursor.expect("import");
  const segments = [cursor.expectKind("name", "module name").text];
  while (cursor.accept("/")) {
    segments.push(cursor.expectKind("name", "module name segment").text);
  }

  const decl: ImportDecl = {
    module: segments.join("/"),
    unqualifiedTypes: [],
    unqualifiedValues: [],
  };

  if (cursor.is(".") && cursor.is("{", 1)) {
    cursor.next();
    cursor.next();
    while (!cursor.is("}")) {
      if (cursor.accept("type")) {
        decl.unqualifiedTypes.push(cursor.expectKind("upname", "type name").text);
      } else {
        const token = cursor.next();
        if (token.kind !== "name" && token.kind !== "upname") {
          cursor.fail("expected an imported name");
        }
        decl.unqualifiedValues.push(token.text);
      }
      if (cursor.accept("as")) cursor.next();
      if (!cursor.accept(",")) break;
    }
    cursor.expect("}");
  }

  if (cursor.accept("as")) {
    const alias = cursor.next();
    if (alias.kind !== "name" && alias.kind !== "discard") cursor.fail("expected an import alias");
    decl.alias = alias.text;
  }

  return decl;
}

function parseTypeDefinition(cursor: TokenCursor, comments: string[]): ScannedType | undefined {
  const keyword = cursor.expect("type");
  const nameToken = cursor.expectKind("upname", "type name");

  const parameters: string[] = [];
  if (cursor.accept("(")) {
    while (!cursor.is(")")) {
      parameters.push(cursor.expectKind("name", "type parameter").text);
      if (!cursor.accept(",")) break;
    }
    cursor.expect(")");
  }

  if (cursor.is("=")) {
    // type alias
    skipItem(cursor);
    return undefined;
  }

  if (!cursor.accept("{")) {
    // external type without constructors
    return undefined;
  }

  const constructors: ScannedConstructor[] = [];
  while (!cursor.is("}")) {
    if (cursor.atEnd()) cursor.fail("expected `}`");
    skipAttributes(cursor);
    constructors.push(parseConstructor(cursor));
  }
  cursor.expect("}");

  return {
    name: nameToken.text,
    parameters,
    constructors,
    comments,
    line: keyword.line,
  };
}

function parseConstructor(cursor: TokenCursor): ScannedConstructor {
  const name = cursor.expectKind("upname", "constructor name").text;
  const fields: ScannedField[] = [];

  if (cursor.accept("(")) {
    while (!cursor.is(")")) {
      const start = cursor.peek();
      let label: string | undefined;
      if (start.kind === "name" && cursor.is(":", 1)) {
        label = cursor.next().text;
        cursor.next();
      }
      const type = parseTypeExpr(cursor);
      fields.push({ label, type, comments: start.comments, line: start.line });
      if (!cursor.accept(",")) break;
    }
    cursor.expect(")");
  }

  return { name, fields };
}

function parseTypeArgs(cursor: TokenCursor): TypeExpr[] {
  const args: TypeExpr[] = [];
  cursor.expect("(");
  while (!cursor.is(")")) {
    args.push(parseTypeExpr(cursor));
    if (!cursor.accept(",")) break;
  }
  cursor.expect(")");
  return args;
}

function parseTypeExpr(cursor: TokenCursor): TypeExpr {
  const token = cursor.peek();

  if (cursor.is("#")) {
    cursor.next();
    return { kind: "tuple", elements: parseTypeArgs(cursor) };
  }

  if (cursor.is("fn")) {
    cursor.next();
    const args = parseTypeArgs(cursor);
    cursor.expect("->");
    return { kind: "function", args, returns: parseTypeExpr(cursor) };
  }

  if (token.kind === "discard") {
    cursor.next();
    return { kind: "hole", name: token.text };
  }

  if (token.kind === "name") {
    cursor.next();
    if (cursor.is(".") && cursor.peek(1).kind === "upname") {
      cursor.next();
      const name = cursor.next().text;
      const args = cursor.is("(") ? parseTypeArgs(cursor) : [];
      return { kind: "named", module: token.text, name, args };
    }
    return { kind: "var", name: token.text };
  }

  if (token.kind === "upname") {
    cursor.next();
    const args = cursor.is("(") ? parseTypeArgs(cursor) : [];
    return { kind: "named", name: token.text, args };
  }

  return cursor.fail("expected a type");
}
