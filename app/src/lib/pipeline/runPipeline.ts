import { sumByGroup, type AggregationRow } from "../aggregation/aggregate";
import { pickDefaultColumns, type ColumnDefaults } from "../aggregation/defaults";
import { normalizeGroupingColumn } from "../aggregation/normalizeGrouping";
import { defaultConfig, type RollupConfig } from "../config";
import { buildDataset } from "../import/buildDataset";
import { parseFile, type UploadedFile } from "../import/parseFile";
import { findColumn } from "../import/types";
import {
  reconcileOverrideSession,
  toOverrideSet,
  type OverrideSession
} from "../session/overrideSession";
import {
  numericColumnNames,
  resolveColumnTypes,
  textColumnNames
} from "../typing/resolveColumnTypes";
import type { ResolvedTyping, TypedDataset } from "../typing/types";
import {
  columnNotFound,
  noNumericColumns,
  noTextColumns,
  valueColumnNotNumeric,
  type PipelineFailure,
  type PipelineResult
} from "./failures";

export type PipelineFindingCode =
  | "MISSING_GROUP_VALUES"
  | "VALUES_FILLED_WITH_ZERO"
  | "CATEGORIES_STANDARDIZED";

export type PipelineFinding = {
  code: PipelineFindingCode;
  severity: "info" | "warn";
  title: string;
  description: string;
  details?: {
    groupColumn?: string;
    valueColumn?: string;
    nullCount?: number;
    blankOrNanCount?: number;
    filledCount?: number;
  };
};

export type TypingPhaseInput = {
  file: UploadedFile;
  sheetName?: string;
  rowsToSkip?: number;
  session?: OverrideSession | null;
  config?: RollupConfig;
};

export type TypingPhaseOutput = {
  fileType: "csv" | "xlsx";
  sheetNames: string[];
  typing: ResolvedTyping;
  session: OverrideSession;
  textColumns: string[];
  numericColumns: string[];
  defaults: ColumnDefaults;
  issues: PipelineFailure[];
};

export type AggregationSelection = {
  groupColumn?: string | null;
  valueColumn?: string | null;
};

export type AggregationDiagnostics = {
  groupColumn: string;
  valueColumn: string;
  nullCount: number;
  blankOrNanCount: number;
  filledCount: number;
};

export type AggregationOutcome = {
  groupColumn: string;
  valueColumn: string;
  rows: AggregationRow[];
  total: number;
  diagnostics: AggregationDiagnostics;
  findings: PipelineFinding[];
};

export const missingColumnTypeIssues = (
  textColumns: string[],
  numericColumns: string[]
): PipelineFailure[] => {
  const issues: PipelineFailure[] = [];
  if (textColumns.length === 0) {
    issues.push(noTextColumns());
  }
  if (numericColumns.length === 0) {
    issues.push(noNumericColumns());
  }
  return issues;
};

export const runTypingPhase = ({
  file,
  sheetName,
  rowsToSkip,
  session,
  config = defaultConfig
}: TypingPhaseInput): PipelineResult<TypingPhaseOutput> => {
  const sheet = sheetName ?? config.defaultSheetName;
  const parsed = parseFile(file, {
    sheetName: sheet,
    rowsToSkip: rowsToSkip ?? config.defaultRowsToSkip
  });
  if (!parsed.ok) {
    return parsed;
  }

  const activeSession = reconcileOverrideSession(session, file.name);
  const dataset = buildDataset(parsed.table, parsed.fileType === "xlsx" ? sheet : file.name);
  const typing = resolveColumnTypes(dataset, toOverrideSet(activeSession));
  const textColumns = textColumnNames(typing.dataset.columns);
  const numericColumns = numericColumnNames(typing.dataset.columns);

  return {
    ok: true,
    fileType: parsed.fileType,
    sheetNames: parsed.sheetNames,
    typing,
    session: activeSession,
    textColumns,
    numericColumns,
    defaults: pickDefaultColumns(textColumns, numericColumns),
    issues: missingColumnTypeIssues(textColumns, numericColumns)
  };
};

const buildFindings = (diagnostics: AggregationDiagnostics): PipelineFinding[] => {
  const findings: PipelineFinding[] = [];
  const { groupColumn, valueColumn, nullCount, blankOrNanCount, filledCount } = diagnostics;

  if (nullCount > 0 || blankOrNanCount > 0) {
    findings.push({
      code: "MISSING_GROUP_VALUES",
      severity: "warn",
      title: "Missing group values",
      description: `Found ${nullCount} null and ${blankOrNanCount} blank or 'nan' values in '${groupColumn}'. Their '${valueColumn}' amounts are grouped under 'Empty'.`,
      details: { groupColumn, valueColumn, nullCount, blankOrNanCount }
    });
  }

  if (filledCount > 0) {
    findings.push({
      code: "VALUES_FILLED_WITH_ZERO",
      severity: "info",
      title: "Missing values counted as zero",
      description: `${filledCount} rows had no usable number in '${valueColumn}' and were counted as 0.`,
      details: { valueColumn, filledCount }
    });
  }

  findings.push({
    code: "CATEGORIES_STANDARDIZED",
    severity: "info",
    title: "Data cleaning applied",
    description:
      "Whitespace trimmed and school types standardized (PRVT/Prvt → Private School, Charter School → Charter)."
  });

  return findings;
};

export const runAggregationPhase = (
  dataset: TypedDataset,
  selection: AggregationSelection
): PipelineResult<AggregationOutcome> => {
  const failures: PipelineFailure[] = [];
  const textColumns = textColumnNames(dataset.columns);
  const numericColumns = numericColumnNames(dataset.columns);
  const defaults = pickDefaultColumns(textColumns, numericColumns);

  const groupName = selection.groupColumn ?? defaults.groupColumn;
  const valueName = selection.valueColumn ?? defaults.valueColumn;
  if (groupName === null) {
    failures.push(noTextColumns());
  }
  if (valueName === null) {
    failures.push(noNumericColumns());
  }
  if (groupName === null || valueName === null) {
    return { ok: false, failures };
  }

  const groupColumn = findColumn(dataset.columns, groupName);
  const valueColumn = findColumn(dataset.columns, valueName);
  if (!groupColumn) {
    failures.push(columnNotFound(groupName));
  }
  if (!valueColumn) {
    failures.push(columnNotFound(valueName));
  } else if (valueColumn.kind !== "numeric") {
    failures.push(
      valueColumnNotNumeric(
        valueName,
        "the column is typed as text; mark it as numeric to aggregate it"
      )
    );
  }
  if (!groupColumn || !valueColumn || valueColumn.kind !== "numeric") {
    return { ok: false, failures };
  }

  const grouping = normalizeGroupingColumn(groupColumn.values);
  const summed = sumByGroup(grouping.values, valueColumn.values);
  const diagnostics: AggregationDiagnostics = {
    groupColumn: groupName,
    valueColumn: valueName,
    nullCount: grouping.missing.nullCount,
    blankOrNanCount: grouping.missing.blankOrNanCount,
    filledCount: summed.filledCount
  };

  return {
    ok: true,
    groupColumn: groupName,
    valueColumn: valueName,
    rows: summed.rows,
    total: summed.total,
    diagnostics,
    findings: buildFindings(diagnostics)
  };
};
