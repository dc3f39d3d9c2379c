import type { CellValue } from "../import/types";

const numericPattern = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const strippedSymbols = /[$,€%]/g;

export const cleanNumericText = (value: string): string =>
  value.trim().replace(strippedSymbols, "").trim();

/**
 * Salvages a number from a cell written as "$1,234.50", "12%" or " 42 ".
 * Anything that still does not parse becomes null; this never throws.
 */
export const cleanNumericCell = (value: CellValue): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = cleanNumericText(value);
  if (!cleaned || !numericPattern.test(cleaned)) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const cleanNumericColumn = (values: CellValue[]): (number | null)[] =>
  values.map(cleanNumericCell);
