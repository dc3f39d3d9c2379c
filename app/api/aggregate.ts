import { loadConfig } from "../src/lib/config";
import { exportAggregationToXlsx } from "../src/lib/export/exportXlsx";
import { runAggregationPhase, runTypingPhase } from "../src/lib/pipeline/runPipeline";
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
import { aggregateSchema, estimatedDecodedBytes } from "./utils/uploadSchema";

export const config = {
  runtime: "nodejs"
};

const TAG = "aggregate";

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

  const validated = aggregateSchema.safeParse(parsedBody);
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
    groupColumn: body.groupColumn ?? null,
    valueColumn: body.valueColumn ?? null,
    includeExport: body.includeExport
  });

  try {
    const typed = runTypingPhase({
      file: { name: body.fileName, data: decodeBase64File(body.fileBase64) },
      sheetName: body.sheetName,
      rowsToSkip: body.rowsToSkip,
      session: body.session,
      config: appConfig
    });
    if (!typed.ok) {
      logFailure(TAG, requestId, null, typed.failures.map((failure) => failure.message).join("; "));
      return jsonResponse(res, failureStatus(typed.failures), {
        ok: false,
        error: typed.failures[0]?.message ?? "Aggregation failed",
        code: typed.failures[0]?.code ?? null,
        failures: typed.failures,
        requestId
      });
    }

    const aggregated = runAggregationPhase(typed.typing.dataset, {
      groupColumn: body.groupColumn,
      valueColumn: body.valueColumn
    });
    if (!aggregated.ok) {
      logFailure(
        TAG,
        requestId,
        null,
        aggregated.failures.map((failure) => failure.message).join("; ")
      );
      return jsonResponse(res, 422, {
        ok: false,
        error: aggregated.failures[0]?.message ?? "Aggregation failed",
        code: aggregated.failures[0]?.code ?? null,
        failures: aggregated.failures,
        requestId
      });
    }

    aggregated.findings
      .filter((finding) => finding.severity === "warn")
      .forEach((finding) => {
        console.warn(`[${TAG}] ${finding.code}`, { requestId, ...finding.details });
      });

    const exported = body.includeExport
      ? exportAggregationToXlsx(aggregated.rows, appConfig.export)
      : null;

    console.info(`[${TAG}] success`, {
      requestId,
      groups: aggregated.rows.length,
      total: aggregated.total
    });

    return jsonResponse(res, 200, {
      ok: true,
      requestId,
      result: {
        groupColumn: aggregated.groupColumn,
        valueColumn: aggregated.valueColumn,
        columns: [appConfig.export.groupHeader, appConfig.export.totalHeader],
        rows: aggregated.rows,
        total: aggregated.total,
        diagnostics: aggregated.diagnostics,
        findings: aggregated.findings,
        autoNumeric: typed.typing.autoNumeric,
        excluded: typed.typing.excluded,
        session: typed.session,
        export: exported
          ? {
              fileName: exported.fileName,
              mimeType: exported.mimeType,
              base64: Buffer.from(exported.data).toString("base64")
            }
          : null
      }
    });
  } catch (error) {
    logFailure(TAG, requestId, error, "Aggregation failed");
    return jsonResponse(res, 500, { ok: false, error: "Aggregation failed", requestId });
  }
}
