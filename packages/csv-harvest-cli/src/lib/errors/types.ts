/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Validation errors
  | "VALIDATION_MISSING_COLUMN"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Input file errors
  | "FILE_NOT_FOUND"
  | "FILE_NOT_READABLE"
  | "CSV_INVALID"
  // Filesystem side effects
  | "FS_WRITE_FAILED"
  | "FS_MOVE_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  /** Multi-line context such as available columns or files already processed */
  details?: string;
  cause?: Error;
}

/** Shape of the error object printed in --json mode */
export interface CLIErrorJson {
  code: ErrorCode;
  message: string;
  suggestion?: string;
  example?: string;
  details?: string;
}

/**
 * Fatal error for a csv-harvest run. Per-row download failures are not
 * CLIErrors; they are logged and counted instead.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.details = options.details;
  }

  /** Only the fields that are set, so JSON output has no nulls */
  toJSON(): CLIErrorJson {
    const json: CLIErrorJson = { code: this.code, message: this.message };
    if (this.suggestion !== undefined) json.suggestion = this.suggestion;
    if (this.example !== undefined) json.example = this.example;
    if (this.details !== undefined) json.details = this.details;
    return json;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
