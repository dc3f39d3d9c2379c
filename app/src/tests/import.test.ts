import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { buildDataset, uniqueHeaders } from "../lib/import/buildDataset";
import { parseCsvText } from "../lib/import/parseCsv";
import { parseFile } from "../lib/import/parseFile";
import { parseXlsxBuffer } from "../lib/import/parseXlsx";
import { findColumn } from "../lib/import/types";

const buildWorkbookBuffer = (sheetName: string, rows: unknown[][]): ArrayBuffer => {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
  return XLSX.write(workbook, { type: "array", bookType: "xlsx" });
};

const textBuffer = (text: string): ArrayBuffer => {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

describe("import parsing", () => {
  it("reads the named sheet and skips rows below the header", () => {
    const buffer = buildWorkbookBuffer("School Info", [
      ["School Type", "Students"],
      ["Counts refreshed weekly", null],
      ["Do not edit", null],
      ["Public", 10],
      ["PRVT", 5]
    ]);

    const parsed = parseXlsxBuffer(buffer, { sheetName: "School Info", rowsToSkip: 2 });

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.sheetNames).toEqual(["School Info"]);
      expect(parsed.table.headers).toEqual(["School Type", "Students"]);
      expect(parsed.table.rows).toEqual([
        ["Public", 10],
        ["PRVT", 5]
      ]);
    }
  });

  it("reports a missing sheet with the sheets that do exist", () => {
    const buffer = buildWorkbookBuffer("Programs", [["A"], [1]]);
    const parsed = parseXlsxBuffer(buffer, { sheetName: "School Info", rowsToSkip: 0 });

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.failures[0]).toMatchObject({
        code: "SHEET_UNREADABLE",
        sheetName: "School Info",
        availableSheets: ["Programs"]
      });
    }
  });

  it("keeps spreadsheet dates as dates", () => {
    const buffer = buildWorkbookBuffer("Visits", [
      ["Visit Date"],
      [new Date(Date.UTC(2024, 0, 15, 12))],
      [new Date(Date.UTC(2024, 1, 20, 12))]
    ]);
    const parsed = parseXlsxBuffer(buffer, { sheetName: "Visits", rowsToSkip: 0 });

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      const dataset = buildDataset(parsed.table);
      expect(dataset.columns[0].storage).toBe("datetime");
      expect(dataset.columns[0].values[0]).toBeInstanceOf(Date);
    }
  });

  it("parses CSV and keeps formatted values as text", () => {
    const csv = 'School Type,Students,Zip\nnote,,\nPublic,10,02134\n PRVT ,"1,200",02135';
    const table = parseCsvText(csv, 1);

    expect(table.headers).toEqual(["School Type", "Students", "Zip"]);
    expect(table.rows).toEqual([
      ["Public", 10, "02134"],
      ["PRVT", "1,200", "02135"]
    ]);
  });

  it("keeps quoted delimiters and line breaks inside one cell", () => {
    const csv = 'School,Notes\n"Hill; Annex","Visits on\nFridays"\n\nValley,"""late"" start"';
    const table = parseCsvText(csv);

    expect(table.rows).toEqual([
      ["Hill; Annex", "Visits on\nFridays"],
      ["Valley", '"late" start']
    ]);
  });

  it("parses CSV with semicolon delimiter", () => {
    const table = parseCsvText("type;count\nPublic;3.5");
    expect(table.rows).toEqual([["Public", 3.5]]);
  });

  it("dispatches by file extension", () => {
    const parsedCsv = parseFile(
      { name: "counts.CSV", data: textBuffer("Type,Count\nPublic,3") },
      { sheetName: "School Info", rowsToSkip: 0 }
    );
    expect(parsedCsv.ok).toBe(true);
    if (parsedCsv.ok) {
      expect(parsedCsv.fileType).toBe("csv");
      expect(parsedCsv.table.rows).toEqual([["Public", 3]]);
    }

    const unsupported = parseFile(
      { name: "counts.txt", data: textBuffer("Type,Count") },
      { sheetName: "School Info", rowsToSkip: 0 }
    );
    expect(unsupported).toEqual({
      ok: false,
      failures: [
        {
          code: "UNSUPPORTED_FILE",
          message: "Unsupported file type. Please upload a .xlsx or .csv file.",
          fileName: "counts.txt"
        }
      ]
    });
  });
});

describe("buildDataset", () => {
  it("makes repeated and blank headers unique", () => {
    expect(uniqueHeaders(["Type", "Type", "", "Type"])).toEqual([
      "Type",
      "Type (2)",
      "Column 3",
      "Type (3)"
    ]);
  });

  it("derives a storage type per column", () => {
    const dataset = buildDataset({
      sheetName: "School Info",
      headers: ["Mixed", "Numbers", "Blank"],
      rows: [
        ["a", 1, null],
        [2, 3, null]
      ]
    });

    expect(dataset.name).toBe("School Info");
    expect(dataset.rowCount).toBe(2);
    expect(dataset.columns.map((column) => column.storage)).toEqual(["mixed", "number", "empty"]);
  });

  it("looks columns up by exact name", () => {
    const dataset = buildDataset({ headers: ["Type", "Count"], rows: [["Public", 3]] });
    expect(findColumn(dataset.columns, "Count")?.values).toEqual([3]);
    expect(findColumn(dataset.columns, "count")).toBeUndefined();
  });
});
