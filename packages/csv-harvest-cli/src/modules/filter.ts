import { Command } from "commander";
import chalk from "chalk";
import { readFileSync, statSync } from "fs";
import { join, resolve } from "path";
import { requireColumns, type CsvTable, type InputRow } from "../lib/csv.js";
import {
  groupByBaseName,
  listDirectory,
  sanitizeBaseName,
  type OutputName,
} from "../lib/naming.js";
import {
  EXCLUDED_MANIFEST_NAME,
  INCLUDED_MANIFEST_NAME,
  OUTPUT_FILENAME_COLUMN,
  indexManifest,
  loadManifest,
  manifestPath,
  mergeHeaders,
  saveManifest,
} from "../lib/manifest.js";
import {
  fileNotFound,
  fileNotReadable,
  invalidOption,
  manifestRequired,
  moveFailed,
  optionRequiresOther,
  writeFailed,
} from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { parseNonNegativeInteger } from "../lib/flags.js";
import { moveFile } from "../lib/file-mover.js";
import { maybeOutputJson, type FilterResultJson } from "../lib/json-output.js";
import { createSpinner } from "../lib/spinner.js";
import { createRuntime } from "../lib/runtime.js";
import type { ResolvedConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw commander options, named after the flags */
export interface FilterCommandOptions {
  original_output_dir: string;
  excluded_output_dir: string;
  max_count_per_base_name?: string;
  filter_column?: string;
  excluded_values_file?: string;
  name_column?: string;
  dryRun?: boolean;
}

export interface ValueFilter {
  column: string;
  excludedValues: Set<string>;
}

export interface FilterRunOptions {
  originalDir: string;
  excludedDir: string;
  maxCountPerBaseName?: number;
  valueFilter?: ValueFilter;
  /** Column the files were named from; lets the filter work without a manifest */
  nameColumn?: string;
  dryRun: boolean;
  manifestName: string;
}

export type ExclusionReason = "count" | "value";

/** Outcome of looking up a file's filter-column value */
export type ValueMatch = "excluded" | "allowed" | "unknown";

export type ValueMatcher = (file: OutputName) => ValueMatch;

export interface FilterPolicy {
  maxCountPerBaseName?: number;
  matchValue?: ValueMatcher;
}

export type FilterDecision =
  | { file: OutputName; action: "keep"; unmatched: boolean }
  | { file: OutputName; action: "exclude"; reason: ExclusionReason };

export interface MovedFile {
  filename: string;
  reason: ExclusionReason;
  to: string;
}

export interface FilterRunResult {
  originalDir: string;
  excludedDir: string;
  dryRun: boolean;
  kept: string[];
  moved: MovedFile[];
  ignored: string[];
  unmatched: string[];
  sidecars: string[];
}

// ---------------------------------------------------------------------------
// Exclusion Values
// ---------------------------------------------------------------------------

/**
 * Load a line-separated exclusion file: lines are trimmed, blanks dropped.
 */
export function loadExclusionSet(path: string): Set<string> {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ENOENT") {
      throw fileNotFound(path);
    }
    throw fileNotReadable(path, err.message);
  }

  const values = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const value = line.trim();
    if (value) values.add(value);
  }
  return values;
}

/**
 * Match files through the manifest row that produced them.
 */
export function createManifestMatcher(
  manifest: CsvTable,
  filter: ValueFilter
): ValueMatcher {
  const rowsByFile = indexManifest(manifest);
  return (file) => {
    const row = rowsByFile.get(file.filename);
    if (!row) return "unknown";
    const value = (row[filter.column] ?? "").trim();
    return filter.excludedValues.has(value) ? "excluded" : "allowed";
  };
}

/**
 * Without a manifest the only recoverable value is the one the file was
 * named from, and only in its sanitized form.
 */
export function createBaseNameMatcher(filter: ValueFilter): ValueMatcher {
  const excludedBaseNames = new Set([...filter.excludedValues].map(sanitizeBaseName));
  return (file) => (excludedBaseNames.has(file.baseName) ? "excluded" : "allowed");
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Decide keep/exclude for each output file. Files come back grouped by base
 * name (alphabetical) and ordered by sequence within a group. The count cap
 * wins over the value check, so a file is excluded at most once.
 */
export function planFilter(files: OutputName[], policy: FilterPolicy): FilterDecision[] {
  const groups = groupByBaseName(files);
  const baseNames = [...groups.keys()].sort();
  const decisions: FilterDecision[] = [];

  for (const baseName of baseNames) {
    for (const file of groups.get(baseName) ?? []) {
      if (
        policy.maxCountPerBaseName !== undefined &&
        file.sequence > policy.maxCountPerBaseName
      ) {
        decisions.push({ file, action: "exclude", reason: "count" });
        continue;
      }

      const match = policy.matchValue?.(file);
      if (match === "excluded") {
        decisions.push({ file, action: "exclude", reason: "value" });
      } else {
        decisions.push({ file, action: "keep", unmatched: match === "unknown" });
      }
    }
  }

  return decisions;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function requireDirectory(path: string): void {
  let stats;
  try {
    stats = statSync(path);
  } catch {
    throw fileNotFound(path);
  }
  if (!stats.isDirectory()) {
    throw fileNotReadable(path, "Not a directory");
  }
}

export function resolveFilterOptions(
  options: FilterCommandOptions,
  config: ResolvedConfig
): FilterRunOptions {
  const maxCountPerBaseName = parseNonNegativeInteger(
    "max_count_per_base_name",
    options.max_count_per_base_name
  );

  if (options.filter_column && !options.excluded_values_file) {
    throw optionRequiresOther("filter_column", "excluded_values_file");
  }
  if (options.excluded_values_file && !options.filter_column) {
    throw optionRequiresOther("excluded_values_file", "filter_column");
  }

  const valueFilter =
    options.filter_column && options.excluded_values_file
      ? {
          column: options.filter_column,
          excludedValues: loadExclusionSet(options.excluded_values_file),
        }
      : undefined;

  const originalDir = resolve(options.original_output_dir);
  const excludedDir = resolve(options.excluded_output_dir);
  if (originalDir === excludedDir) {
    throw invalidOption("excluded_output_dir", "must differ from --original_output_dir");
  }

  return {
    originalDir,
    excludedDir,
    maxCountPerBaseName,
    valueFilter,
    nameColumn: options.name_column,
    dryRun: options.dryRun ?? false,
    manifestName: config.manifestName,
  };
}

function createValueMatcher(
  options: FilterRunOptions,
  manifest: CsvTable | undefined,
  manifestFile: string
): ValueMatcher | undefined {
  const filter = options.valueFilter;
  if (!filter) return undefined;

  if (manifest) {
    requireColumns(manifest, manifestFile, [[filter.column, "filter_column"]]);
    return createManifestMatcher(manifest, filter);
  }

  if (options.nameColumn !== undefined && options.nameColumn === filter.column) {
    return createBaseNameMatcher(filter);
  }

  throw manifestRequired(filter.column, manifestFile);
}

// ---------------------------------------------------------------------------
// Sidecar Manifests
// ---------------------------------------------------------------------------

function writeSidecars(
  options: FilterRunOptions,
  manifest: CsvTable,
  kept: Set<string>,
  moved: Set<string>
): string[] {
  const rowFile = (row: InputRow) => row[OUTPUT_FILENAME_COLUMN] ?? "";

  const includedPath = join(options.originalDir, INCLUDED_MANIFEST_NAME);
  const excludedPath = join(options.excludedDir, EXCLUDED_MANIFEST_NAME);

  const previouslyExcluded = loadManifest(excludedPath);
  const excludedRows: InputRow[] = [];
  const seen = new Set<string>();
  for (const row of [
    ...(previouslyExcluded?.rows ?? []),
    ...manifest.rows.filter((row) => moved.has(rowFile(row))),
  ]) {
    if (seen.has(rowFile(row))) continue;
    seen.add(rowFile(row));
    excludedRows.push(row);
  }

  const writes: Array<[string, CsvTable]> = [
    [
      includedPath,
      {
        header: mergeHeaders(manifest.header),
        rows: manifest.rows.filter((row) => kept.has(rowFile(row))),
      },
    ],
    [
      excludedPath,
      {
        header: mergeHeaders(manifest.header, previouslyExcluded?.header ?? []),
        rows: excludedRows,
      },
    ],
  ];

  for (const [path, table] of writes) {
    try {
      saveManifest(path, table);
    } catch (error) {
      throw writeFailed(path, (error as Error).message, [...moved]);
    }
  }

  return writes.map(([path]) => path);
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Move files that break the count cap or carry an excluded value into the
 * excluded directory. Compliant files are not touched.
 *
 * All configuration is checked before the first move. A failed move aborts
 * the rest of the run; the thrown error lists what had already been moved,
 * and the sidecar manifests are written for those moves first.
 */
export async function filterOutputs(
  options: FilterRunOptions,
  logger: Logger
): Promise<FilterRunResult> {
  requireDirectory(options.originalDir);

  const manifestFile = manifestPath(options.originalDir, options.manifestName);
  const manifest = loadManifest(manifestFile);
  const matchValue = createValueMatcher(options, manifest, manifestFile);

  const { outputs, ignored } = listDirectory(options.originalDir);
  const decisions = planFilter(outputs, {
    maxCountPerBaseName: options.maxCountPerBaseName,
    matchValue,
  });

  const kept: string[] = [];
  const unmatched: string[] = [];
  const moved: MovedFile[] = [];

  const saveSidecars = (inPlace: string[]): string[] =>
    manifest && manifest.rows.length > 0 && !options.dryRun
      ? writeSidecars(options, manifest, new Set(inPlace), new Set(moved.map((m) => m.filename)))
      : [];

  for (const decision of decisions) {
    const { filename } = decision.file;

    if (decision.action === "keep") {
      kept.push(filename);
      if (decision.unmatched) {
        unmatched.push(filename);
        logger.debug("No manifest row for file, keeping it", { file: filename });
      }
      continue;
    }

    const to = join(options.excludedDir, filename);

    if (options.dryRun) {
      logger.info("Dry run - would move", { file: filename, reason: decision.reason, to });
      moved.push({ filename, reason: decision.reason, to });
      continue;
    }

    try {
      await moveFile(join(options.originalDir, filename), to, logger);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const done = new Set(moved.map((m) => m.filename));
      saveSidecars(outputs.map((o) => o.filename).filter((name) => !done.has(name)));
      throw moveFailed(filename, err.message, [...done], err);
    }

    logger.info("Moved", { file: filename, reason: decision.reason, to });
    moved.push({ filename, reason: decision.reason, to });
  }

  const sidecars = saveSidecars(kept);

  return {
    originalDir: options.originalDir,
    excludedDir: options.excludedDir,
    dryRun: options.dryRun,
    kept,
    moved,
    ignored,
    unmatched,
    sidecars,
  };
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

function countByReason(result: FilterRunResult, reason: ExclusionReason): number {
  return result.moved.filter((m) => m.reason === reason).length;
}

export function toFilterResultJson(result: FilterRunResult): FilterResultJson {
  return {
    originalDir: result.originalDir,
    excludedDir: result.excludedDir,
    dryRun: result.dryRun,
    moved: result.moved.map((m) => ({ file: m.filename, reason: m.reason, to: m.to })),
    summary: {
      kept: result.kept.length,
      moved: result.moved.length,
      movedForCount: countByReason(result, "count"),
      movedForValue: countByReason(result, "value"),
      ignored: result.ignored.length,
      unmatched: result.unmatched.length,
    },
  };
}

export function formatFilterSummary(result: FilterRunResult): string[] {
  const verb = result.dryRun ? "Would move" : "Moved";
  const lines = [
    chalk.cyan(result.dryRun ? "\nFilter preview:" : "\nFilter complete:"),
    `  Kept:                ${result.kept.length}`,
    `  ${`${verb}:`.padEnd(21)}${chalk.yellow(String(result.moved.length))}`,
    `    count too high:    ${countByReason(result, "count")}`,
    `    excluded value:    ${countByReason(result, "value")}`,
  ];

  if (result.ignored.length > 0) {
    lines.push(chalk.gray(`  Ignored (not downloader output): ${result.ignored.length}`));
  }
  if (result.unmatched.length > 0) {
    lines.push(chalk.gray(`  Kept without a manifest row: ${result.unmatched.length}`));
  }
  if (result.moved.length > 0 && !result.dryRun) {
    lines.push(chalk.gray(`  Excluded files are in ${result.excludedDir}`));
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFilterCommands(program: Command): void {
  program
    .command("filter")
    .description("Move downloaded files that exceed a per-name count or carry an excluded value")
    .requiredOption("--original_output_dir <dir>", "Directory written by the download command")
    .requiredOption("--excluded_output_dir <dir>", "Directory to move excluded files into")
    .option(
      "--max_count_per_base_name <count>",
      "Move files whose sequence number is above this (e.g. 3 moves pizza_004 and later)"
    )
    .option("--filter_column <column>", "Column checked against --excluded_values_file")
    .option("--excluded_values_file <path>", "Line-separated values to exclude")
    .option(
      "--name_column <column>",
      "Column the files were named from; used when the manifest is missing"
    )
    .option("--dry-run", "Show what would move without moving anything")
    .action(async (options: FilterCommandOptions) => {
      const spinner = createSpinner();

      try {
        const { config, logger } = createRuntime("filter");
        const runOptions = resolveFilterOptions(options, config);

        spinner.start(`Scanning ${runOptions.originalDir}`);
        const result = await filterOutputs(runOptions, logger);
        spinner.succeed(
          `${result.dryRun ? "Would move" : "Moved"} ${result.moved.length} file(s), kept ${result.kept.length}`
        );

        if (!maybeOutputJson(toFilterResultJson(result))) {
          for (const line of formatFilterSummary(result)) {
            console.log(line);
          }
        }
      } catch (error) {
        spinner.fail("Filter failed");
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
