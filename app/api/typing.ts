import { loadConfig } from "../src/lib/config";
import { runTypingPhase } from "../src/lib/pipeline/runPipeline";
import type { TypedDataset } from "../src/lib/typing/types";
import {
  createRequestId,
  decodeBase64File,
  failureStatus,
  jsonResponse,
  logFailure,
  readRequestBody,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";
import { estimatedDecodedBytes, uploadSchema } from "./utils/uploadSchema";

export const config = {
  runtime: "nodejs"
};

const TAG = "typing";

const previewRows = (dataset: TypedDataset, count: number): (string | number | null)[][] =>
  Array.from({ length: Math.min(count, dataset.rowCount) }, (_, rowIndex) =>
    dataset.columns.map((column) => column.values[rowIndex] ?? null)
  );

export default async function handler(req: ApiRequest, res: ApiResponse): Promise<void> {
  const requestId = createRequestId();
  const appConfig = loadConfig();

  if (req.method !== "POST") {
    return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }

  let parsedBody: unknown;
  try {
    parsedBody = await readRequestBody(req);
  } catch (error) {
    logFailure(TAG, requestId, error, "Invalid JSON");
    return jsonResponse(res, 400, { ok: false, error: "Invalid request", requestId });
  }

  const validated = uploadSchema.safeParse(parsedBody);
  if (!validated.success) {
    logFailure(TAG, requestId, validated.error, "Invalid request");
    return jsonResponse(res, 400, { ok: false, error: "Invalid request", requestId });
  }

  const body = validated.data;
  if (estimatedDecodedBytes(body.fileBase64) > appConfig.maxUploadBytes) {
    logFailure(TAG, requestId, null, "Upload too large");
    return jsonResponse(res, 413, { ok: false, error: "Upload too large", requestId });
  }

  console.info(`[${TAG}] start`, {
    requestId,
    fileName: body.fileName,
    sheetName: body.sheetName ?? appConfig.defaultSheetName,
    rowsToSkip: body.rowsToSkip ?? appConfig.defaultRowsToSkip
  });

  try {
    const result = runTypingPhase({
      file: { name: body.fileName, data: decodeBase64File(body.fileBase64) },
      sheetName: body.sheetName,
      rowsToSkip: body.rowsToSkip,
      session: body.session,
      config: appConfig
    });

    if (!result.ok) {
      logFailure(TAG, requestId, null, result.failures.map((failure) => failure.message).join("; "));
      return jsonResponse(res, failureStatus(result.failures), {
        ok: false,
        error: result.failures[0]?.message ?? "Typing failed",
        code: result.failures[0]?.code ?? null,
        failures: result.failures,
        requestId
      });
    }

    const { typing } = result;
    console.info(`[${TAG}] success`, {
      requestId,
      columns: typing.dataset.columns.length,
      autoNumeric: typing.autoNumeric.length,
      excluded: Object.keys(typing.excluded).length
    });

    return jsonResponse(res, 200, {
      ok: true,
      requestId,
      result: {
        fileType: result.fileType,
        sheetNames: result.sheetNames,
        rowCount: typing.dataset.rowCount,
        columns: typing.dataset.columns.map((column) => ({
          name: column.name,
          kind: column.kind,
          storage: column.storage
        })),
        autoNumeric: typing.autoNumeric,
        excluded: typing.excluded,
        textColumns: result.textColumns,
        numericColumns: result.numericColumns,
        defaults: result.defaults,
        issues: result.issues,
        preview: previewRows(typing.dataset, appConfig.previewRowCount),
        session: result.session
      }
    });
  } catch (error) {
    logFailure(TAG, requestId, error, "Typing failed");
    return jsonResponse(res, 500, { ok: false, error: "Typing failed", requestId });
  }
}
