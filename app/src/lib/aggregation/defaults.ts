export type ColumnDefaults = {
  groupColumn: string | null;
  valueColumn: string | null;
};

const lastMatching = (names: string[], matches: (lowered: string) => boolean): string | null => {
  let found: string | null = null;
  names.forEach((name) => {
    if (matches(name.toLowerCase())) {
      found = name;
    }
  });
  return found;
};

export const pickDefaultColumns = (
  textColumns: string[],
  numericColumns: string[]
): ColumnDefaults => ({
  groupColumn:
    lastMatching(textColumns, (name) => name.includes("school type")) ?? textColumns[0] ?? null,
  valueColumn:
    lastMatching(
      numericColumns,
      (name) => name.includes("students") || name.includes("pending")
    ) ??
    numericColumns[0] ??
    null
});
