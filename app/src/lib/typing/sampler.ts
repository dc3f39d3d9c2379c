import { isMissingCell, type CellValue } from "../import/types";

export const SAMPLE_SIZE = 100;

export const cellToText = (value: CellValue): string => {
  if (isMissingCell(value)) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
};

/**
 * First `limit` non-missing values of a column, stringified and trimmed.
 * Values past the cap never influence classification.
 */
export const sampleColumn = (values: CellValue[], limit = SAMPLE_SIZE): string[] => {
  const sample: string[] = [];
  for (const value of values) {
    if (sample.length >= limit) {
      break;
    }
    if (isMissingCell(value)) {
      continue;
    }
    sample.push(cellToText(value).trim());
  }
  return sample;
};

export const ratioOf = (sample: string[], predicate: (value: string) => boolean): number => {
  if (sample.length === 0) {
    return 0;
  }
  const matches = sample.filter(predicate).length;
  return matches / sample.length;
};

export const matchRatio = (values: CellValue[], pattern: RegExp): number =>
  ratioOf(sampleColumn(values), (value) => pattern.test(value));
