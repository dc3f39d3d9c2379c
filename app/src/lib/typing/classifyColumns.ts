import type { Column, Dataset } from "../import/types";
import { looksLikeDate, parseCalendarDate } from "./dates";
import { matchRatio, ratioOf, sampleColumn } from "./sampler";
import type { ClassificationLabel, ColumnClassification } from "./types";

export const MATCH_THRESHOLD = 0.5;

export const IDENTIFIER_PATTERN = /^\d-\d{8}$/;
export const ZIP_CODE_PATTERN = /^\d{5}(-\d{4})?$/;
export const PHONE_NUMBER_PATTERN = /^\(?\d{3}[)\-.\s]?\d{3}[\-.\s]?\d{4}$/;

const DATE_SHAPE_THRESHOLD = 0.5;

type ClassificationRule = {
  label: ClassificationLabel;
  matches: (column: Column) => boolean;
};

const patternRule = (label: ClassificationLabel, pattern: RegExp): ClassificationRule => ({
  label,
  matches: (column) => matchRatio(column.values, pattern) > MATCH_THRESHOLD
});

export const isDateColumn = (column: Column): boolean => {
  if (column.storage === "datetime") {
    return true;
  }
  if (column.storage === "number") {
    return false;
  }
  const sample = sampleColumn(column.values);
  if (ratioOf(sample, looksLikeDate) < DATE_SHAPE_THRESHOLD) {
    return false;
  }
  return ratioOf(sample, (value) => parseCalendarDate(value) !== null) > MATCH_THRESHOLD;
};

// Evaluated in order; the first rule that matches decides the label.
export const classificationRules: ClassificationRule[] = [
  patternRule("identifier", IDENTIFIER_PATTERN),
  patternRule("zip-code", ZIP_CODE_PATTERN),
  patternRule("phone-number", PHONE_NUMBER_PATTERN),
  { label: "date", matches: isDateColumn }
];

export const classifyColumn = (column: Column): ColumnClassification => {
  const rule = classificationRules.find((candidate) => candidate.matches(column));
  return rule ? { kind: "match", label: rule.label } : { kind: "no-match" };
};

export const classifyColumns = (dataset: Dataset): Record<string, ColumnClassification> => {
  const result: Record<string, ColumnClassification> = {};
  dataset.columns.forEach((column) => {
    result[column.name] = classifyColumn(column);
  });
  return result;
};
