import { getContext } from "./cli-context.js";
import {
  TIMEOUT_MS_MAX,
  TIMEOUT_MS_MIN,
  TimeoutMsSchema,
  loadConfig,
  type ResolvedConfig,
} from "./config.js";
import { invalidOption } from "./errors/catalog.js";
import { createLogger, type Logger } from "./logger.js";

export interface Runtime {
  config: ResolvedConfig;
  sources: string[];
  logger: Logger;
}

/**
 * --timeout and CSV_HARVEST_TIMEOUT get the same bounds as download.timeoutMs.
 */
function checkTimeout(timeout: number | undefined): number | undefined {
  if (timeout === undefined || TimeoutMsSchema.safeParse(timeout).success) {
    return timeout;
  }
  throw invalidOption(
    "timeout",
    `${timeout} ms is outside ${TIMEOUT_MS_MIN}-${TIMEOUT_MS_MAX}`
  );
}

/**
 * Resolve configuration for the current invocation and build its logger.
 * Global flags (--timeout, --log-level, --config) take precedence over files.
 */
export function createRuntime(command: string): Runtime {
  const context = getContext();
  const { config, sources } = loadConfig(context.configPath, {
    timeoutMs: checkTimeout(context.timeout),
    logLevel: context.logLevel,
  });

  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson || context.json,
    // keep stdout for the result document in JSON mode
    destination: context.json ? "stderr" : "split",
  }).child({ command });

  logger.debug("Configuration resolved", {
    sources: sources.length ? sources : ["defaults"],
    timeoutMs: config.timeoutMs,
  });

  return { config, sources, logger };
}
