export const EMPTY_GROUP = "Empty";
export const PRIVATE_SCHOOL_LABEL = "Private School (includes Montessori, Homeschool, etc)";
export const CHARTER_LABEL = "Charter";

const schoolTypeRewrites = new Map<string, string>([
  ["PRVT", PRIVATE_SCHOOL_LABEL],
  ["Prvt", PRIVATE_SCHOOL_LABEL],
  ["Charter School", CHARTER_LABEL]
]);

export type GroupingMissingCounts = {
  nullCount: number;
  blankOrNanCount: number;
};

export type NormalizedGrouping = {
  values: string[];
  missing: GroupingMissingCounts;
};

const isBlankOrNan = (value: string): boolean => {
  const lowered = value.trim().toLowerCase();
  return lowered === "" || lowered === "nan";
};

// Diagnostic only. A value can land in both counts when an upstream step
// already stringified a null; the counts are reported as computed.
export const countMissingGroupValues = (
  values: (string | number | null)[]
): GroupingMissingCounts => {
  let nullCount = 0;
  let blankOrNanCount = 0;
  values.forEach((value) => {
    if (value === null || (typeof value === "number" && Number.isNaN(value))) {
      nullCount += 1;
      return;
    }
    if (isBlankOrNan(String(value))) {
      blankOrNanCount += 1;
    }
  });
  return { nullCount, blankOrNanCount };
};

export const normalizeGroupingValue = (value: string | number | null): string => {
  if (value === null || (typeof value === "number" && Number.isNaN(value))) {
    return EMPTY_GROUP;
  }
  const trimmed = String(value).trim();
  if (isBlankOrNan(trimmed)) {
    return EMPTY_GROUP;
  }
  return schoolTypeRewrites.get(trimmed) ?? trimmed;
};

export const normalizeGroupingColumn = (
  values: (string | number | null)[]
): NormalizedGrouping => ({
  values: values.map(normalizeGroupingValue),
  missing: countMissingGroupValues(values)
});
