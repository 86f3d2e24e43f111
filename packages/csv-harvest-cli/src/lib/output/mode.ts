/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode } from "../cli-context.js";

export type OutputMode = "interactive" | "static" | "json";

/**
 * Detect the appropriate output mode based on the CLI context and environment.
 *
 * - `interactive`: a terminal that can show spinners and colour
 * - `static`: plain text output (for CI, pipes, non-interactive)
 * - `json`: structured JSON output for scripting
 */
export function getOutputMode(): OutputMode {
  if (isJsonMode()) {
    return "json";
  }

  if (process.env.CI || process.env.CSV_HARVEST_NON_INTERACTIVE) {
    return "static";
  }

  // Piped output
  if (!process.stdout.isTTY) {
    return "static";
  }

  if (process.env.TERM === "dumb") {
    return "static";
  }

  return "interactive";
}
