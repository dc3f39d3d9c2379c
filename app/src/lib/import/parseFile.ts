import { sheetUnreadable, unsupportedFile, type PipelineResult } from "../pipeline/failures";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer, type SheetSelection } from "./parseXlsx";
import type { RawTable } from "./types";

export type UploadedFile = {
  name: string;
  data: ArrayBuffer;
};

export type ParseFileResult = PipelineResult<{
  table: RawTable;
  fileType: "csv" | "xlsx";
  sheetNames: string[];
}>;

const fileExtension = (name: string): string =>
  name.split(".").pop()?.toLowerCase() ?? "";

export const parseFile = (file: UploadedFile, selection: SheetSelection): ParseFileResult => {
  const extension = fileExtension(file.name);

  if (extension === "csv") {
    try {
      const text = new TextDecoder("utf-8").decode(file.data);
      const table = parseCsvText(text, selection.rowsToSkip);
      return { ok: true, table, fileType: "csv", sheetNames: [] };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "CSV could not be read";
      return { ok: false, failures: [sheetUnreadable(file.name, [], detail)] };
    }
  }

  if (extension === "xlsx") {
    const parsed = parseXlsxBuffer(file.data, selection);
    if (!parsed.ok) {
      return parsed;
    }
    return {
      ok: true,
      table: parsed.table,
      fileType: "xlsx",
      sheetNames: parsed.sheetNames
    };
  }

  return { ok: false, failures: [unsupportedFile(file.name)] };
};
