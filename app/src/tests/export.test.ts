import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { buildResultSheetRows, exportAggregationToXlsx, XLSX_MIME_TYPE } from "../lib/export/exportXlsx";

const rows = [
  { key: "Charter", total: 7 },
  { key: "Public", total: 3 }
];

describe("exportAggregationToXlsx", () => {
  it("lays out a header row followed by one row per group", () => {
    expect(buildResultSheetRows(rows)).toEqual([
      ["School Type", "Total Students"],
      ["Charter", 7],
      ["Public", 3]
    ]);
  });

  it("writes a single Student Counts sheet", () => {
    const exported = exportAggregationToXlsx(rows);
    expect(exported.fileName).toBe("student_counts_by_school_type.xlsx");
    expect(exported.mimeType).toBe(XLSX_MIME_TYPE);

    const workbook = XLSX.read(exported.data, { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["Student Counts"]);
    expect(
      XLSX.utils.sheet_to_json(workbook.Sheets["Student Counts"], { header: 1 })
    ).toEqual([
      ["School Type", "Total Students"],
      ["Charter", 7],
      ["Public", 3]
    ]);
  });
});
