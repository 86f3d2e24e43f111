/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

import { parseLogLevel, type LogLevel } from "./logger.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Request timeout in milliseconds; unset falls back to config */
  timeout?: number;
  /** Log level override; unset falls back to config */
  logLevel?: LogLevel;
  /** Explicit config file path */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function flagValue(argv: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const idx = argv.findIndex((arg) => arg === name);
    if (idx !== -1 && argv[idx + 1] !== undefined) {
      return argv[idx + 1];
    }
    const inline = argv.find((arg) => arg.startsWith(`${name}=`));
    if (inline) {
      return inline.slice(name.length + 1);
    }
  }
  return undefined;
}

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  currentContext.timeout = parseTimeout(flagValue(argv, "--timeout"));
  currentContext.logLevel = parseLogLevel(flagValue(argv, "--log-level"));
  currentContext.configPath = flagValue(argv, "--config", "-c");

  // Environment variable overrides
  if (isTruthyEnv(env.CSV_HARVEST_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.CSV_HARVEST_QUIET)) {
    currentContext.quiet = true;
  }

  const envTimeout = parseTimeout(env.CSV_HARVEST_TIMEOUT);
  if (currentContext.timeout === undefined && envTimeout !== undefined) {
    currentContext.timeout = envTimeout;
  }

  const envLevel = parseLogLevel(env.CSV_HARVEST_LOG_LEVEL);
  if (currentContext.logLevel === undefined && envLevel !== undefined) {
    currentContext.logLevel = envLevel;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
