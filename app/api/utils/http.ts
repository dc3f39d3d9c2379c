import { randomUUID } from "crypto";
import type { PipelineFailure } from "../../src/lib/pipeline/failures";

export type ApiRequest = AsyncIterable<Buffer | string> & {
  method?: string;
  body?: unknown;
};

export type ApiResponse = {
  statusCode: number;
  setHeader: (name: string, value: string) => unknown;
  end: (chunk?: string) => unknown;
};

export const jsonResponse = (
  res: ApiResponse,
  statusCode: number,
  payload: Record<string, unknown>
): void => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

export const failureStatus = (failures: PipelineFailure[]): number =>
  failures.some((failure) => failure.code === "UNSUPPORTED_FILE") ? 415 : 422;

export const createRequestId = (): string => randomUUID();

export const readRequestBody = async (req: ApiRequest): Promise<unknown> => {
  if (req.body !== undefined && req.body !== null) {
    if (typeof req.body === "string") {
      return JSON.parse(req.body);
    }
    if (Buffer.isBuffer(req.body)) {
      return JSON.parse(req.body.toString("utf8"));
    }
    if (typeof req.body === "object") {
      return req.body;
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  if (chunks.length === 0) {
    return null;
  }
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
};

export const decodeBase64File = (encoded: string): ArrayBuffer => {
  const bytes = Buffer.from(encoded, "base64");
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

export const logFailure = (
  tag: string,
  requestId: string,
  error: unknown,
  fallbackMessage: string
): void => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error(`[${tag}] fail`, { requestId, ...payload });
};
