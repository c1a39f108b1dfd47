/**
 * Encoder backend types
 */

export type ObjectEntry = readonly [key: string, value: string];

/**
 * EncoderBackend - Rendering rules for one serialization target
 */
export interface EncoderBackend {
  /** Backend tag used by `encoder(<tag>)` and in function names */
  readonly id: string;

  moduleImports(): string[];

  /** Encoder return type, e.g. `json.Json` */
  returnType(): string;

  /**
   * Object expression over ordered entries. `indent` is the indentation of
   * the line the expression starts on.
   */
  encodeObject(entries: readonly ObjectEntry[], indent: string): string;
  encodeEmptyObject(): string;

  encodeStringLiteral(value: string): string;
  encodeString(valueExpr: string): string;
  encodeInt(valueExpr: string): string;
  encodeFloat(valueExpr: string): string;
  encodeBool(valueExpr: string): string;

  encodeNullable(valueExpr: string, innerEncoder: string): string;
  encodeArray(valueExpr: string, innerEncoder: string): string;

  /** Packages that must appear in the project manifest */
  requiredPackages(): readonly string[];
}

/**
 * ProjectManifest - Dependency tables of the project manifest
 */
export interface ProjectManifest {
  path?: string;
  dependencies: Record<string, unknown>;
  devDependencies: Record<string, unknown>;
}
