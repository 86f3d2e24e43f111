import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Validation Errors
// ============================================================================

export function missingColumn(
  column: string,
  flag: string,
  source: string,
  available: string[]
): CLIError {
  return new CLIError(
    "VALIDATION_MISSING_COLUMN",
    `Column "${column}" (from --${flag}) is not in ${source}`,
    {
      suggestion: "Pick one of the columns in the header",
      details: available.length
        ? `Available columns: ${available.join(", ")}`
        : "The file has no header row",
    }
  );
}

export function invalidOption(
  optionName: string,
  reason: string,
  validValues?: string[]
): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function optionRequiresOther(optionName: string, requiredName: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `--${optionName} requires --${requiredName}`,
    {
      suggestion: `Pass both --${optionName} and --${requiredName}, or neither`,
    }
  );
}

export function manifestRequired(filterColumn: string, manifestFile: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `Can't look up --filter_column "${filterColumn}" without ${manifestFile}`,
    {
      suggestion:
        "Restore the manifest written by the download command, or pass --name_column when filtering on the column the files were named from",
      example: `csv-harvest filter ... --filter_column ${filterColumn} --name_column ${filterColumn}`,
    }
  );
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Input File Errors
// ============================================================================

export function fileNotFound(path: string): CLIError {
  return new CLIError("FILE_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the path exists and try again",
  });
}

export function fileNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("FILE_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check file permissions or if another app has it open",
    details: reason,
  });
}

export function invalidCsv(path: string, reason: string): CLIError {
  return new CLIError("CSV_INVALID", `"${path}" is not a valid CSV file`, {
    suggestion: "Export the sheet again as comma-separated values with a header row",
    details: reason,
  });
}

// ============================================================================
// Filesystem Side Effects
// ============================================================================

export function writeFailed(path: string, reason: string, written: string[]): CLIError {
  return new CLIError("FS_WRITE_FAILED", `Couldn't write "${path}"`, {
    suggestion: "Check free disk space and permissions on the output directory, then re-run",
    details: completedDetails(reason, "Already written", written),
  });
}

export function moveFailed(
  path: string,
  reason: string,
  moved: string[],
  cause?: Error
): CLIError {
  return new CLIError("FS_MOVE_FAILED", `Couldn't move "${path}"`, {
    suggestion: "Fix the problem below and run the filter again; moved files stay moved",
    details: completedDetails(reason, "Already moved", moved),
    cause,
  });
}

function completedDetails(reason: string, label: string, done: string[]): string {
  if (done.length === 0) return reason;
  return `${reason}\n${label} (${done.length}): ${done.join(", ")}`;
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}
