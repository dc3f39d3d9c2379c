import { z } from "zod";

export const MAX_ROWS_TO_SKIP = 10;

const envSchema = z.object({
  ROLLUP_DEFAULT_SHEET: z.string().trim().min(1).optional(),
  ROLLUP_ROWS_TO_SKIP: z.coerce.number().int().min(0).max(MAX_ROWS_TO_SKIP).optional(),
  ROLLUP_MAX_UPLOAD_BYTES: z.coerce.number().int().positive().optional()
});

export type RollupConfig = {
  defaultSheetName: string;
  defaultRowsToSkip: number;
  maxUploadBytes: number;
  previewRowCount: number;
  export: {
    sheetName: string;
    fileName: string;
    groupHeader: string;
    totalHeader: string;
  };
};

export const defaultConfig: RollupConfig = {
  defaultSheetName: "School Info",
  defaultRowsToSkip: 2,
  maxUploadBytes: 10 * 1024 * 1024,
  previewRowCount: 10,
  export: {
    sheetName: "Student Counts",
    fileName: "student_counts_by_school_type.xlsx",
    groupHeader: "School Type",
    totalHeader: "Total Students"
  }
};

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): RollupConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error("[config] invalid environment, using defaults", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
    return defaultConfig;
  }
  return {
    ...defaultConfig,
    defaultSheetName: parsed.data.ROLLUP_DEFAULT_SHEET ?? defaultConfig.defaultSheetName,
    defaultRowsToSkip: parsed.data.ROLLUP_ROWS_TO_SKIP ?? defaultConfig.defaultRowsToSkip,
    maxUploadBytes: parsed.data.ROLLUP_MAX_UPLOAD_BYTES ?? defaultConfig.maxUploadBytes
  };
};
