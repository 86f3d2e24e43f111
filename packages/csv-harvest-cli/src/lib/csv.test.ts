import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  parseCsvTable,
  readCsvTable,
  requireColumns,
  writeCsvTable,
} from "./csv.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("csv", () => {
  describe("parseCsvTable", () => {
    it("keys rows by the header", () => {
      const table = parseCsvTable("url,name\nhttps://a.test/1.jpg,Pizza\n", "input.csv");

      expect(table.header).toEqual(["url", "name"]);
      expect(table.rows).toEqual([{ url: "https://a.test/1.jpg", name: "Pizza" }]);
    });

    it("handles quoted fields with commas and newlines", () => {
      const table = parseCsvTable('name,notes\n"Pizza, large","line one\nline two"\n', "in.csv");

      expect(table.rows[0]).toEqual({ name: "Pizza, large", notes: "line one\nline two" });
    });

    it("strips a byte order mark", () => {
      const table = parseCsvTable("\uFEFFurl,name\nu,n\n", "in.csv");
      expect(table.header).toEqual(["url", "name"]);
    });

    it("pads short rows and skips blank lines", () => {
      const table = parseCsvTable("a,b,c\n1,2\n\n4,5,6\n", "in.csv");

      expect(table.rows).toEqual([
        { a: "1", b: "2", c: "" },
        { a: "4", b: "5", c: "6" },
      ]);
    });

    it("rejects rows with more cells than the header", () => {
      const error = thrown(() => parseCsvTable("a,b\n1,2\n3,4,5\n", "long.csv"));

      expect(error).toMatchObject({
        code: "CSV_INVALID",
        message: '"long.csv" is not a valid CSV file',
      });
    });

    it("returns an empty table for empty input", () => {
      expect(parseCsvTable("", "in.csv")).toEqual({ header: [], rows: [] });
    });

    it("wraps parser errors as CSV_INVALID", () => {
      const error = thrown(() => parseCsvTable('a,b\n"unterminated,1\n', "broken.csv"));

      expect(error).toMatchObject({
        code: "CSV_INVALID",
        message: '"broken.csv" is not a valid CSV file',
      });
    });
  });

  describe("requireColumns", () => {
    const table = { header: ["url", "name"], rows: [] };

    it("passes when every column is present", () => {
      expect(() =>
        requireColumns(table, "in.csv", [
          ["url", "url_column"],
          ["name", "name_column"],
        ])
      ).not.toThrow();
    });

    it("names the missing column and the flag it came from", () => {
      const error = thrown(() => requireColumns(table, "in.csv", [["image", "url_column"]]));

      expect(error).toMatchObject({
        code: "VALIDATION_MISSING_COLUMN",
        message: 'Column "image" (from --url_column) is not in in.csv',
        details: "Available columns: url, name",
      });
    });
  });

  describe("file round trip", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "csv-harvest-csv-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes header and rows in column order", () => {
      const path = join(dir, "out.csv");
      writeCsvTable(path, {
        header: ["name", "url"],
        rows: [{ url: "https://a.test/1.jpg", name: "Pizza, large" }],
      });

      expect(readFileSync(path, "utf-8")).toBe(
        'name,url\n"Pizza, large",https://a.test/1.jpg\n'
      );
    });

    it("maps a missing file to FILE_NOT_FOUND", () => {
      expect(thrown(() => readCsvTable(join(dir, "missing.csv")))).toMatchObject({
        code: "FILE_NOT_FOUND",
      });
    });

    it("reads what was written", () => {
      const path = join(dir, "in.csv");
      writeFileSync(path, "url,name\nhttps://a.test/1.jpg,Pizza\n");

      expect(readCsvTable(path).rows).toEqual([
        { url: "https://a.test/1.jpg", name: "Pizza" },
      ]);
    });
  });
});
