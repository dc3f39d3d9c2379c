import { z } from "zod";
import { MAX_ROWS_TO_SKIP } from "../../src/lib/config";

const columnName = z.string().min(1);

export const sessionSchema = z
  .object({
    fileName: z.string().min(1),
    forceNumeric: z.array(columnName).max(500).default([]),
    forceText: z.array(columnName).max(500).default([])
  })
  .strict();

export const uploadSchema = z
  .object({
    fileName: z.string().min(1).transform((value) => value.trim()),
    fileBase64: z.string().min(1),
    sheetName: z.string().min(1).optional(),
    rowsToSkip: z.number().int().min(0).max(MAX_ROWS_TO_SKIP).optional(),
    session: sessionSchema.nullable().optional()
  })
  .strict();

export const aggregateSchema = uploadSchema
  .extend({
    groupColumn: columnName.optional(),
    valueColumn: columnName.optional(),
    includeExport: z.boolean().optional().default(false)
  })
  .strict();

export const estimatedDecodedBytes = (encoded: string): number =>
  Math.floor((encoded.length * 3) / 4);
