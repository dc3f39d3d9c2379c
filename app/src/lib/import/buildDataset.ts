import type { CellValue, Column, Dataset, RawTable, StorageType } from "./types";
import { isMissingCell } from "./types";

const cellStorage = (value: CellValue): Exclude<StorageType, "mixed" | "empty"> => {
  if (typeof value === "number") {
    return "number";
  }
  if (value instanceof Date) {
    return "datetime";
  }
  return "string";
};

export const detectStorageType = (values: CellValue[]): StorageType => {
  let detected: StorageType = "empty";
  for (const value of values) {
    if (isMissingCell(value)) {
      continue;
    }
    const storage = cellStorage(value);
    if (detected === "empty") {
      detected = storage;
    } else if (detected !== storage) {
      return "mixed";
    }
  }
  return detected;
};

export const uniqueHeaders = (headers: string[]): string[] => {
  const seen = new Map<string, number>();
  const taken = new Set(headers);
  return headers.map((header, index) => {
    const base = header.trim() ? header.trim() : `Column ${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    if (count === 0) {
      return base;
    }
    let suffix = count + 1;
    while (taken.has(`${base} (${suffix})`)) {
      suffix += 1;
    }
    const name = `${base} (${suffix})`;
    taken.add(name);
    return name;
  });
};

export const buildDataset = (table: RawTable, name = table.sheetName ?? "Sheet"): Dataset => {
  const headers = uniqueHeaders(table.headers);
  const columns: Column[] = headers.map((header, index) => {
    const values = table.rows.map((row) => row[index] ?? null);
    return {
      name: header,
      storage: detectStorageType(values),
      values
    };
  });

  return {
    name,
    rowCount: table.rows.length,
    columns
  };
};
