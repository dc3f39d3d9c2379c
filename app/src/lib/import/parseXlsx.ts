import * as XLSX from "xlsx";
import { sheetUnreadable, type PipelineResult } from "../pipeline/failures";
import type { CellValue, RawTable } from "./types";

export type SheetSelection = {
  sheetName: string;
  rowsToSkip: number;
};

const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return String(value);
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  rawHeaders.map((header, index) => {
    const label = normalizeCell(header);
    if (label === null || label === "") {
      return `Column ${index + 1}`;
    }
    return label instanceof Date ? label.toISOString() : String(label);
  });

export const parseXlsxBuffer = (
  buffer: ArrayBuffer,
  { sheetName, rowsToSkip }: SheetSelection
): PipelineResult<{ table: RawTable; sheetNames: string[] }> => {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "array", cellDates: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message : "workbook could not be read";
    return { ok: false, failures: [sheetUnreadable(sheetName, [], detail)] };
  }

  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    return {
      ok: false,
      failures: [
        sheetUnreadable(
          sheetName,
          workbook.SheetNames,
          `Worksheet named '${sheetName}' not found`
        )
      ]
    };
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: null
  });

  const rawHeaders = rows[0] ?? [];
  const headers = buildHeaders(rawHeaders);
  const dataRows = rows.slice(1 + Math.max(0, rowsToSkip)).map((row) =>
    headers.map((_, index) => normalizeCell(row[index]))
  );

  return {
    ok: true,
    sheetNames: workbook.SheetNames,
    table: {
      sheetName,
      headers,
      rows: dataRows
    }
  };
};
