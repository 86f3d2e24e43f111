import { Command } from "commander";
import chalk from "chalk";
import { mkdirSync } from "fs";
import { writeFile } from "fs/promises";
import { join, resolve } from "path";
import { readCsvTable, requireColumns, type InputRow } from "../lib/csv.js";
import { resolveExtension } from "../lib/extension.js";
import {
  createSequenceAllocator,
  formatOutputFilename,
  mergeSequenceIndexes,
  sanitizeBaseName,
  scanExistingOutputs,
} from "../lib/naming.js";
import {
  appendToManifest,
  loadManifest,
  manifestPath,
  manifestSequences,
  saveManifest,
  OUTPUT_FILENAME_COLUMN,
} from "../lib/manifest.js";
import { writeFailed } from "../lib/errors/catalog.js";
import { parseNonNegativeInteger } from "../lib/flags.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type DownloadResultJson } from "../lib/json-output.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { createRuntime } from "../lib/runtime.js";
import { createFetchDownloadService } from "../lib/adapters/fetch-download.js";
import type { ResolvedConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import {
  DownloadError,
  type DownloadService,
  type DownloadedResource,
} from "../lib/ports/download.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw commander options, named after the flags */
export interface DownloadCommandOptions {
  input: string;
  url_column: string;
  name_column: string;
  output_dir: string;
  max_downloads?: string;
}

export interface DownloadRunOptions {
  inputPath: string;
  urlColumn: string;
  nameColumn: string;
  outputDir: string;
  /** 0 means unlimited */
  maxDownloads: number;
  timeoutMs: number;
  manifestName: string;
}

export interface DownloadDeps {
  downloader: DownloadService;
  logger: Logger;
  /** Milliseconds since the epoch; used for the run duration */
  now?: () => number;
  spinner?: Spinner;
}

export interface DownloadedFile {
  /** 1-based index of the data row in the input */
  row: number;
  url: string;
  baseName: string;
  sequence: number;
  filename: string;
  path: string;
  bytes: number;
}

export type SkipReason = "invalid-url" | "status" | "timeout" | "network";

export interface SkippedRow {
  row: number;
  url: string;
  baseName: string;
  reason: SkipReason;
  message: string;
}

export interface DownloadRunResult {
  outputDir: string;
  rows: number;
  files: DownloadedFile[];
  skipped: SkippedRow[];
  stoppedAtLimit: boolean;
  durationMs: number;
  manifestPath?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Failed URLs listed in the human summary */
const MAX_LISTED_FAILURES = 100;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Parse --max_downloads. Unset and 0 both mean unlimited.
 */
export function parseMaxDownloads(value: string | undefined): number {
  return parseNonNegativeInteger("max_downloads", value) ?? 0;
}

export function resolveDownloadOptions(
  options: DownloadCommandOptions,
  config: ResolvedConfig
): DownloadRunOptions {
  return {
    inputPath: options.input,
    urlColumn: options.url_column,
    nameColumn: options.name_column,
    outputDir: resolve(options.output_dir),
    maxDownloads: parseMaxDownloads(options.max_downloads),
    timeoutMs: config.timeoutMs,
    manifestName: config.manifestName,
  };
}

function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

function ensureOutputDir(outputDir: string): void {
  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw writeFailed(outputDir, `Cannot create output directory: ${(error as Error).message}`, []);
  }
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Download every row's URL into the output directory, one at a time and in
 * input order, naming each file `<base>_<NNN><ext>`.
 *
 * Configuration problems are thrown before anything is written. Fetch failures
 * skip the row. A failed write stops the run after the manifest has been
 * saved for the files already on disk.
 */
export async function downloadFromCsv(
  options: DownloadRunOptions,
  deps: DownloadDeps
): Promise<DownloadRunResult> {
  const { downloader, logger, now = Date.now, spinner } = deps;
  const startedAt = now();

  const table = readCsvTable(options.inputPath);
  requireColumns(table, options.inputPath, [
    [options.urlColumn, "url_column"],
    [options.nameColumn, "name_column"],
  ]);

  ensureOutputDir(options.outputDir);

  const manifestFile = manifestPath(options.outputDir, options.manifestName);
  const previousManifest = loadManifest(manifestFile);
  const allocator = createSequenceAllocator(
    mergeSequenceIndexes(scanExistingOutputs(options.outputDir), manifestSequences(previousManifest))
  );

  const files: DownloadedFile[] = [];
  const skipped: SkippedRow[] = [];
  const manifestRows: InputRow[] = [];
  let stoppedAtLimit = false;

  const persistManifest = (): string | undefined => {
    if (manifestRows.length === 0) return undefined;
    const manifest = appendToManifest(previousManifest, table.header, manifestRows);
    try {
      saveManifest(manifestFile, manifest);
    } catch (error) {
      throw writeFailed(
        manifestFile,
        (error as Error).message,
        files.map((f) => f.filename)
      );
    }
    return manifestFile;
  };

  for (const [index, row] of table.rows.entries()) {
    if (options.maxDownloads > 0 && files.length >= options.maxDownloads) {
      stoppedAtLimit = true;
      logger.info("Reached --max_downloads, stopping", { limit: options.maxDownloads });
      break;
    }

    const rowNumber = index + 1;
    const url = row[options.urlColumn].trim();
    const baseName = sanitizeBaseName(row[options.nameColumn]);
    const log = logger.child({ row: rowNumber });

    spinner?.progress(rowNumber, table.rows.length, url || "(empty URL)");

    if (!isHttpUrl(url)) {
      const message = url ? "Not an http(s) URL" : "Empty URL";
      log.warn("Skipping row", { url, reason: message });
      skipped.push({ row: rowNumber, url, baseName, reason: "invalid-url", message });
      continue;
    }

    let fetched: DownloadedResource;
    try {
      fetched = await downloader.fetch(url, { timeoutMs: options.timeoutMs });
    } catch (error) {
      const reason: SkipReason = error instanceof DownloadError ? error.kind : "network";
      const message = error instanceof Error ? error.message : String(error);
      log.warn("Download failed, skipping row", { url, reason, error: message });
      skipped.push({ row: rowNumber, url, baseName, reason, message });
      continue;
    }

    const extension = resolveExtension(url, fetched.contentType);
    const sequence = allocator.next(baseName);
    const filename = formatOutputFilename(baseName, sequence, extension);
    const path = join(options.outputDir, filename);

    try {
      // "wx": never overwrite a file from an earlier run
      await writeFile(path, fetched.body, { flag: "wx" });
    } catch (error) {
      persistManifest();
      throw writeFailed(path, (error as Error).message, files.map((f) => f.filename));
    }

    allocator.commit(baseName, sequence);
    manifestRows.push({ ...row, [OUTPUT_FILENAME_COLUMN]: filename });
    files.push({
      row: rowNumber,
      url,
      baseName,
      sequence,
      filename,
      path,
      bytes: fetched.body.length,
    });
    log.debug("Saved", { file: filename, bytes: fetched.body.length });
  }

  return {
    outputDir: options.outputDir,
    rows: table.rows.length,
    files,
    skipped,
    stoppedAtLimit,
    durationMs: now() - startedAt,
    manifestPath: persistManifest(),
  };
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

export function toDownloadResultJson(result: DownloadRunResult): DownloadResultJson {
  return {
    outputDir: result.outputDir,
    files: result.files.map((f) => ({
      path: f.path,
      url: f.url,
      baseName: f.baseName,
      sequence: f.sequence,
      bytes: f.bytes,
    })),
    skipped: result.skipped.map((s) => ({ row: s.row, url: s.url, reason: s.reason })),
    summary: {
      rows: result.rows,
      succeeded: result.files.length,
      skipped: result.skipped.length,
      stoppedAtLimit: result.stoppedAtLimit,
    },
  };
}

export function formatDownloadSummary(result: DownloadRunResult): string[] {
  const minutes = (result.durationMs / 60000).toFixed(2);
  const lines = [
    chalk.cyan(`\nDownloads took ${minutes} minutes`),
    `  Rows in input:  ${result.rows}`,
    `  Downloaded:     ${chalk.green(String(result.files.length))}`,
    `  Skipped:        ${result.skipped.length ? chalk.yellow(String(result.skipped.length)) : "0"}`,
  ];

  if (result.stoppedAtLimit) {
    lines.push(chalk.gray("  Stopped early at --max_downloads"));
  }

  const failedUrls = [...new Set(result.skipped.map((s) => s.url).filter(Boolean))].sort();
  if (failedUrls.length > 0) {
    const listed = failedUrls.slice(0, MAX_LISTED_FAILURES).join(", ");
    lines.push(chalk.gray(`  Failed downloads include: ${listed}`));
  }

  if (result.manifestPath) {
    lines.push(chalk.gray(`  Manifest: ${result.manifestPath}`));
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(
  program: Command,
  fetchImpl: typeof fetch = globalThis.fetch
): void {
  program
    .command("download")
    .description("Download the URLs in a CSV column, naming files from another column")
    .requiredOption("--input <path>", "CSV file with URLs")
    .requiredOption("--url_column <column>", "Column holding the URL")
    .requiredOption("--name_column <column>", "Column holding the base name for output files")
    .requiredOption("--output_dir <dir>", "Directory for downloaded files (created if missing)")
    .option("--max_downloads <count>", "Stop after this many successful downloads (0 = no limit)")
    .action(async (options: DownloadCommandOptions) => {
      const spinner = createSpinner();

      try {
        const { config, logger } = createRuntime("download");
        const runOptions = resolveDownloadOptions(options, config);
        const downloader = createFetchDownloadService(fetchImpl, {
          userAgent: config.userAgent,
        });

        spinner.start(`Reading ${options.input}`);
        const result = await downloadFromCsv(runOptions, { downloader, logger, spinner });
        spinner.succeed(`Downloaded ${result.files.length} of ${result.rows} rows`);

        if (!maybeOutputJson(toDownloadResultJson(result), { durationMs: result.durationMs })) {
          for (const line of formatDownloadSummary(result)) {
            console.log(line);
          }
        }
      } catch (error) {
        spinner.fail("Download failed");
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
