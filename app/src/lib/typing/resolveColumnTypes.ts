import { isMissingCell, type CellValue, type Column, type Dataset } from "../import/types";
import { classifyColumn } from "./classifyColumns";
import { cleanNumericColumn } from "./numericCleaner";
import { cellToText } from "./sampler";
import type {
  ColumnClassification,
  ExclusionReason,
  NumericColumn,
  OverrideSet,
  ResolvedTyping,
  TextColumn,
  TypedColumn
} from "./types";
import { exclusionReasons } from "./types";

export const NUMERIC_SUCCESS_THRESHOLD = 0.5;

export const emptyOverrides: OverrideSet = { forceNumeric: [], forceText: [] };

const toTextColumn = (column: Column): TextColumn => ({
  name: column.name,
  storage: column.storage,
  kind: "text",
  values: column.values.map((value: CellValue) => (isMissingCell(value) ? null : cellToText(value)))
});

const toNumericColumn = (column: Column, values: (number | null)[]): NumericColumn => ({
  name: column.name,
  storage: column.storage,
  kind: "numeric",
  values
});

/**
 * Share of originally non-missing cells that survived numeric cleaning.
 * A column without any value scores 0 and therefore never becomes numeric.
 */
export const conversionSuccessRate = (
  raw: CellValue[],
  converted: (number | null)[]
): number => {
  const present = raw.filter((value) => !isMissingCell(value)).length;
  if (present === 0) {
    return 0;
  }
  const parsed = converted.filter((value) => value !== null).length;
  return parsed / present;
};

export const resolveColumnTypes = (
  dataset: Dataset,
  overrides: OverrideSet = emptyOverrides
): ResolvedTyping => {
  const forceText = new Set(overrides.forceText);
  const forceNumeric = new Set(overrides.forceNumeric);
  const autoNumeric: string[] = [];
  const excluded: Record<string, ExclusionReason> = {};
  const classifications: Record<string, ColumnClassification> = {};

  const columns = dataset.columns.map((column): TypedColumn => {
    if (forceText.has(column.name)) {
      return toTextColumn(column);
    }
    if (forceNumeric.has(column.name)) {
      return toNumericColumn(column, cleanNumericColumn(column.values));
    }

    const classification = classifyColumn(column);
    classifications[column.name] = classification;
    if (classification.kind === "match") {
      excluded[column.name] = exclusionReasons[classification.label];
      return toTextColumn(column);
    }

    const converted = cleanNumericColumn(column.values);
    if (conversionSuccessRate(column.values, converted) > NUMERIC_SUCCESS_THRESHOLD) {
      autoNumeric.push(column.name);
      return toNumericColumn(column, converted);
    }
    return toTextColumn(column);
  });

  return {
    dataset: {
      name: dataset.name,
      rowCount: dataset.rowCount,
      columns
    },
    autoNumeric,
    excluded,
    classifications
  };
};

export const textColumnNames = (columns: TypedColumn[]): string[] =>
  columns.filter((column) => column.kind === "text").map((column) => column.name);

export const numericColumnNames = (columns: TypedColumn[]): string[] =>
  columns.filter((column) => column.kind === "numeric").map((column) => column.name);
