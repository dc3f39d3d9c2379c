import type { StorageType } from "../import/types";

export type ClassificationLabel = "identifier" | "zip-code" | "phone-number" | "date";

export type ColumnClassification =
  | { kind: "match"; label: ClassificationLabel }
  | { kind: "no-match" };

export type ExclusionReason = "Identifier" | "Zip Code" | "Phone Number" | "Date";

export const exclusionReasons: Record<ClassificationLabel, ExclusionReason> = {
  identifier: "Identifier",
  "zip-code": "Zip Code",
  "phone-number": "Phone Number",
  date: "Date"
};

export type OverrideSet = {
  forceNumeric: string[];
  forceText: string[];
};

export type NumericColumn = {
  name: string;
  storage: StorageType;
  kind: "numeric";
  values: (number | null)[];
};

export type TextColumn = {
  name: string;
  storage: StorageType;
  kind: "text";
  values: (string | null)[];
};

export type TypedColumn = NumericColumn | TextColumn;

export type TypedDataset = {
  name: string;
  rowCount: number;
  columns: TypedColumn[];
};

export type ResolvedTyping = {
  dataset: TypedDataset;
  autoNumeric: string[];
  excluded: Record<string, ExclusionReason>;
  classifications: Record<string, ColumnClassification>;
};
