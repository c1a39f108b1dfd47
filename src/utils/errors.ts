/**
 * Standard error classes for typeweave
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  GENERATION_ERROR = "GENERATION_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class TypeweaveError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TypeweaveError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: describeCause(this.cause) } : {}),
      },
    };
  }
}

/**
 * Malformed source, directive or reference syntax.
 */
export class ParseError extends TypeweaveError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.PARSE_ERROR, message, details, options);
    this.name = "ParseError";
  }
}

export class ConfigError extends TypeweaveError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

/**
 * A type cannot be encoded or decoded as requested.
 */
export class GenerationError extends TypeweaveError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.GENERATION_ERROR, message, details, options);
    this.name = "GenerationError";
  }
}

export class FileIOError extends TypeweaveError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.GENERAL_ERROR]: 1,
  [ErrorCode.GENERATION_ERROR]: 1,
  [ErrorCode.CONFIG_ERROR]: 2,
  [ErrorCode.PARSE_ERROR]: 3,
  [ErrorCode.FILE_IO_ERROR]: 4,
};

export function exitCodeFor(error: unknown): number {
  return error instanceof TypeweaveError ? EXIT_CODES[error.code] : 1;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
