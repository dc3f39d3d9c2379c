export type CellValue = string | number | Date | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: CellValue[][];
};

export type StorageType = "number" | "string" | "datetime" | "mixed" | "empty";

export type Column = {
  name: string;
  storage: StorageType;
  values: CellValue[];
};

export type Dataset = {
  name: string;
  rowCount: number;
  columns: Column[];
};

export const isMissingCell = (value: CellValue | undefined): value is null | undefined => {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return Number.isNaN(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime());
  }
  return false;
};

export const findColumn = <C extends { name: string }>(columns: C[], name: string): C | undefined =>
  columns.find((column) => column.name === name);
