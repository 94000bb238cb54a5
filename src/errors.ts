/**
 * Error taxonomy. Every hard failure aborts the operation before the
 * config file is written. Missing names in batch operations are not
 * errors; they come back in a `not_found` bucket.
 */

export type HolsterErrorCode =
  | "E_PARSE"
  | "E_IO"
  | "E_DUPLICATE"
  | "E_NOT_FOUND"
  | "E_VALIDATION";

export class HolsterError extends Error {
  public readonly code: HolsterErrorCode;

  constructor(code: HolsterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "HolsterError";
  }
}

/** Config file exists but is not valid JSON, or not the expected shape. */
export class ParseError extends HolsterError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("E_PARSE", `Config file ${path} is not valid: ${detail}`, options);
    this.name = "ParseError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? "unknown error" : String(cause);
}

/** Config file could not be read or written. */
export class ConfigIOError extends HolsterError {
  constructor(
    public readonly path: string,
    operation: "read" | "write",
    options?: { cause?: unknown }
  ) {
    super("E_IO", `Cannot ${operation} config file ${path}: ${describeCause(options?.cause)}`, options);
    this.name = "ConfigIOError";
  }
}

export class DuplicateNameError extends HolsterError {
  constructor(
    public readonly serverName: string,
    public readonly existingStatus: "active" | "inactive"
  ) {
    super("E_DUPLICATE", `Server '${serverName}' already exists (${existingStatus})`);
    this.name = "DuplicateNameError";
  }
}

export class ServerNotFoundError extends HolsterError {
  constructor(public readonly serverName: string) {
    super("E_NOT_FOUND", `Server '${serverName}' not found`);
    this.name = "ServerNotFoundError";
  }
}

export class ValidationError extends HolsterError {
  constructor(message: string) {
    super("E_VALIDATION", message);
    this.name = "ValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
