/**
 * The manifest is a CSV in the output directory listing every downloaded
 * row together with the file it produced. The filter uses it to get back
 * from a filename to the row's other columns.
 */

import { existsSync } from "fs";
import { join } from "path";
import { readCsvTable, writeCsvTable, type CsvTable, type InputRow } from "./csv.js";
import { parseOutputFilename, type SequenceIndex } from "./naming.js";

export const OUTPUT_FILENAME_COLUMN = "output_filename";

/** Rows kept by the filter, written next to the manifest */
export const INCLUDED_MANIFEST_NAME = "output-included.csv";

/** Rows moved by the filter, written into the excluded directory */
export const EXCLUDED_MANIFEST_NAME = "output-excluded.csv";

/**
 * Read a manifest-shaped CSV, or undefined when the file does not exist.
 */
export function loadManifest(path: string): CsvTable | undefined {
  if (!existsSync(path)) return undefined;
  return readCsvTable(path);
}

export function manifestPath(dir: string, manifestName: string): string {
  return join(dir, manifestName);
}

/**
 * Union of headers in first-seen order, with the filename column last.
 */
export function mergeHeaders(...headers: string[][]): string[] {
  const merged: string[] = [];
  for (const header of headers) {
    for (const column of header) {
      if (column !== OUTPUT_FILENAME_COLUMN && !merged.includes(column)) {
        merged.push(column);
      }
    }
  }
  merged.push(OUTPUT_FILENAME_COLUMN);
  return merged;
}

/**
 * Append rows produced by this run to whatever an earlier run recorded.
 */
export function appendToManifest(
  existing: CsvTable | undefined,
  inputHeader: string[],
  newRows: InputRow[]
): CsvTable {
  return {
    header: mergeHeaders(existing?.header ?? [], inputHeader),
    rows: [...(existing?.rows ?? []), ...newRows],
  };
}

export function saveManifest(path: string, table: CsvTable): void {
  writeCsvTable(path, table);
}

/**
 * Map each output filename to its row. Later rows win on duplicates.
 */
export function indexManifest(table: CsvTable): Map<string, InputRow> {
  const index = new Map<string, InputRow>();
  for (const row of table.rows) {
    const filename = row[OUTPUT_FILENAME_COLUMN];
    if (filename) index.set(filename, row);
  }
  return index;
}

/**
 * Highest recorded sequence per base name. Files the filter has moved out of
 * the directory keep their manifest rows, so their numbers stay taken.
 */
export function manifestSequences(table: CsvTable | undefined): SequenceIndex {
  const index: SequenceIndex = new Map();
  for (const row of table?.rows ?? []) {
    const parsed = parseOutputFilename(row[OUTPUT_FILENAME_COLUMN] ?? "");
    if (parsed && parsed.sequence > (index.get(parsed.baseName) ?? 0)) {
      index.set(parsed.baseName, parsed.sequence);
    }
  }
  return index;
}
