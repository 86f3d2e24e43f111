/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    durationMs?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  outputDir: string;
  files: Array<{
    path: string;
    url: string;
    baseName: string;
    sequence: number;
    bytes: number;
  }>;
  skipped: Array<{
    row: number;
    url: string;
    reason: string;
  }>;
  summary: {
    rows: number;
    succeeded: number;
    skipped: number;
    stoppedAtLimit: boolean;
  };
}

export interface FilterResultJson {
  originalDir: string;
  excludedDir: string;
  dryRun: boolean;
  moved: Array<{
    file: string;
    reason: "count" | "value";
    to: string;
  }>;
  summary: {
    kept: number;
    moved: number;
    movedForCount: number;
    movedForValue: number;
    ignored: number;
    unmatched: number;
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
