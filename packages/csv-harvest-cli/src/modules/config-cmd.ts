import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { getContext } from "../lib/cli-context.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";
import { maybeOutputJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# csv-harvest configuration
# Place at ~/.config/csv-harvest/config.yaml (user) or /etc/csv-harvest/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (--timeout, --log-level)
# 2. User config (~/.config/csv-harvest/config.yaml, or --config <path>)
# 3. System config (/etc/csv-harvest/config.yaml)
# 4. Built-in defaults

download:
  # Per-request timeout in milliseconds (1000-600000)
  timeoutMs: 30000

  # User-Agent header sent with every request
  userAgent: "csv-harvest"

  # Manifest written into the output directory and read by "filter"
  manifestName: output.csv

logging:
  # Log level: debug, info, warn, error
  level: info

  # One JSON object per log line
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage csv-harvest configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/csv-harvest/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${(error as Error).message}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s); honours --config")
    .action(() => {
      const explicitPath = getContext().configPath;
      const pathsToCheck = explicitPath
        ? [explicitPath]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicitPath) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          const detail = isCLIError(error) && error.details ? `\n${error.details}` : "";
          console.error(chalk.red(`  ✗ Invalid: ${(error as Error).message}${detail}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !explicitPath) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'csv-harvest config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration; honours --config")
    .action(() => {
      try {
        const { config: resolved, sources } = loadConfig(getContext().configPath);

        if (maybeOutputJson({ effective: resolved, sources })) {
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));
        console.log(
          chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`)
        );

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  timeoutMs:      ${resolved.timeoutMs}`);
        console.log(`  userAgent:      ${resolved.userAgent}`);
        console.log(`  manifestName:   ${resolved.manifestName}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
