import { Command, Option } from "commander";
import { LOG_LEVEL_NAMES } from "./lib/logger.js";
import { registerDownloadCommands } from "./modules/download.js";
import { registerFilterCommands } from "./modules/filter.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

/**
 * Build the command tree. Global flags are declared here so commander
 * accepts them anywhere on the line; their values are read by initContext.
 */
export function createProgram(
  version: string,
  fetchImpl: typeof fetch = globalThis.fetch
): Command {
  const program = new Command()
    .name("csv-harvest")
    .description("Download files listed in a CSV and curate the result")
    .version(version)
    .option("--json", "Print the result as JSON")
    .option("-q, --quiet", "Hide spinners and progress")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .addOption(new Option("--log-level <level>", "Log verbosity").choices(LOG_LEVEL_NAMES))
    .option("-c, --config <path>", "Use this config file instead of the user config");

  registerDownloadCommands(program, fetchImpl);
  registerFilterCommands(program);
  registerConfigCommands(program);

  return program;
}
