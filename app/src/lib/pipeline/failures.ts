export type PipelineFailureCode =
  | "UNSUPPORTED_FILE"
  | "SHEET_UNREADABLE"
  | "COLUMN_NOT_FOUND"
  | "VALUE_COLUMN_NOT_NUMERIC"
  | "NO_TEXT_COLUMNS"
  | "NO_NUMERIC_COLUMNS";

export type PipelineFailure =
  | { code: "UNSUPPORTED_FILE"; message: string; fileName: string }
  | { code: "SHEET_UNREADABLE"; message: string; sheetName: string; availableSheets: string[] }
  | { code: "COLUMN_NOT_FOUND"; message: string; column: string }
  | { code: "VALUE_COLUMN_NOT_NUMERIC"; message: string; column: string; reason: string }
  | { code: "NO_TEXT_COLUMNS"; message: string }
  | { code: "NO_NUMERIC_COLUMNS"; message: string };

export type PipelineResult<T> = ({ ok: true } & T) | { ok: false; failures: PipelineFailure[] };

export const unsupportedFile = (fileName: string): PipelineFailure => ({
  code: "UNSUPPORTED_FILE",
  message: "Unsupported file type. Please upload a .xlsx or .csv file.",
  fileName
});

export const sheetUnreadable = (
  sheetName: string,
  availableSheets: string[],
  detail?: string
): PipelineFailure => ({
  code: "SHEET_UNREADABLE",
  message: detail
    ? `Error reading sheet '${sheetName}': ${detail}`
    : `Error reading sheet '${sheetName}'. Please check that the sheet name is correct.`,
  sheetName,
  availableSheets
});

export const columnNotFound = (column: string): PipelineFailure => ({
  code: "COLUMN_NOT_FOUND",
  message: `Column '${column}' does not exist in the selected sheet.`,
  column
});

export const valueColumnNotNumeric = (column: string, reason: string): PipelineFailure => ({
  code: "VALUE_COLUMN_NOT_NUMERIC",
  message: `Could not convert '${column}' to numeric values. Error: ${reason}`,
  column,
  reason
});

export const noTextColumns = (): PipelineFailure => ({
  code: "NO_TEXT_COLUMNS",
  message: "No text columns found in the data."
});

export const noNumericColumns = (): PipelineFailure => ({
  code: "NO_NUMERIC_COLUMNS",
  message: "No numeric columns found in the data."
});
