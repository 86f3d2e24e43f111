import { readFileSync, writeFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { fileNotFound, fileNotReadable, invalidCsv, missingColumn } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One CSV record keyed by column name */
export type InputRow = Record<string, string>;

export interface CsvTable {
  /** Column names in file order */
  header: string[];
  rows: InputRow[];
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (record) => Array.isArray(record) && record.every((cell) => typeof cell === "string")
    )
  );
}

/**
 * Parse CSV text whose first record is the header.
 * Short records are padded with empty strings and blank lines are skipped.
 * A record with more cells than the header is a CSV_INVALID error.
 */
export function parseCsvTable(content: string, source: string): CsvTable {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count_less: true,
    });
  } catch (error) {
    throw invalidCsv(source, (error as Error).message);
  }

  if (!isStringMatrix(records)) {
    throw invalidCsv(source, "Unexpected record shape");
  }

  const [header = [], ...body] = records;
  const rows = body.map((record) => {
    const row: InputRow = {};
    header.forEach((column, i) => {
      row[column] = record[i] ?? "";
    });
    return row;
  });

  return { header, rows };
}

export function readCsvTable(path: string): CsvTable {
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
  return parseCsvTable(content, path);
}

/**
 * Fail with a MissingColumn error unless every column is in the header.
 *
 * @param columns - Pairs of [column name, flag it came from]
 */
export function requireColumns(
  table: CsvTable,
  source: string,
  columns: Array<[column: string, flag: string]>
): void {
  for (const [column, flag] of columns) {
    if (!table.header.includes(column)) {
      throw missingColumn(column, flag, source, table.header);
    }
  }
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export function formatCsvTable(table: CsvTable): string {
  return stringify(table.rows, { header: true, columns: table.header });
}

export function writeCsvTable(path: string, table: CsvTable): void {
  writeFileSync(path, formatCsvTable(table), "utf-8");
}
