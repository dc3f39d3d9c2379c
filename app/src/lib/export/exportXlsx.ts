import * as XLSX from "xlsx";
import { defaultConfig, type RollupConfig } from "../config";
import type { AggregationRow } from "../aggregation/aggregate";

export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export type ExportedWorkbook = {
  fileName: string;
  mimeType: string;
  data: Uint8Array;
};

export const buildResultSheetRows = (
  rows: AggregationRow[],
  labels: RollupConfig["export"] = defaultConfig.export
): (string | number)[][] => [
  [labels.groupHeader, labels.totalHeader],
  ...rows.map((row) => [row.key, row.total])
];

export const exportAggregationToXlsx = (
  rows: AggregationRow[],
  labels: RollupConfig["export"] = defaultConfig.export
): ExportedWorkbook => {
  const sheet = XLSX.utils.aoa_to_sheet(buildResultSheetRows(rows, labels));
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, labels.sheetName);
  const data: Uint8Array = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

  return {
    fileName: labels.fileName,
    mimeType: XLSX_MIME_TYPE,
    data
  };
};
