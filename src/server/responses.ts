import { z } from "zod";
import type { ErrorCause, ErrorResponse } from "./types.js";

export const ERROR_TYPE_HEADER = "Lambda-Runtime-Function-Error-Type";

const errorCauseSchema: z.ZodType<ErrorCause> = z.lazy(() =>
  z.object({
    errorMessage: z.string(),
    errorType: z.string().optional(),
    stackTrace: z.array(z.string()).optional(),
    cause: errorCauseSchema.optional(),
  }),
);

export const errorResponseSchema = z
  .object({
    errorMessage: z.string(),
    errorType: z.string(),
    stackTrace: z.array(z.string()).optional(),
    cause: errorCauseSchema.optional(),
    causes: z.array(errorCauseSchema).optional(),
  })
  .passthrough();

export type InvocationHeaders = {
  requestId: string;
  traceId: string;
  deadlineMs: number;
  functionArn: string;
};

export function sendJson(statusCode: number, body: string, headers?: Record<string, string>): Response {
  return new Response(body, {
    status: statusCode,
    headers: {
      "content-type": "application/json",
      "content-length": String(Buffer.byteLength(body, "utf8")),
      ...headers,
    },
  });
}

/** Builds the get-next answer. Extra headers are applied last and may replace runtime headers. */
export function createEventResponse(
  body: string,
  invocation: InvocationHeaders,
  ...extraHeaders: Array<Record<string, string> | undefined>
): Response {
  const headers: Record<string, string> = {
    date: new Date().toUTCString(),
    "Lambda-Runtime-Deadline-Ms": String(invocation.deadlineMs),
    "Lambda-Runtime-Aws-Request-Id": invocation.requestId,
    "Lambda-Runtime-Trace-Id": invocation.traceId,
    "Lambda-Runtime-Invoked-Function-Arn": invocation.functionArn,
  };

  for (const extra of extraHeaders) {
    for (const [name, value] of Object.entries(extra ?? {})) {
      const existing = Object.keys(headers).find((key) => key.toLowerCase() === name.toLowerCase());
      if (existing) {
        delete headers[existing];
      }
      headers[name] = value;
    }
  }

  return sendJson(200, body, headers);
}

export function createAcceptedResponse(): Response {
  return sendJson(202, JSON.stringify({ status: "success" }));
}

/**
 * Reads an error report posted by the bootstrap. An empty body falls back to the error type header.
 */
export function parseErrorResponse(text: string, errorTypeHeader: string | null): ErrorResponse {
  if (text.trim().length === 0) {
    return { errorMessage: "", errorType: errorTypeHeader ?? "UnknownError" };
  }

  const parsed = errorResponseSchema.parse(JSON.parse(text));
  return {
    errorMessage: parsed.errorMessage,
    errorType: parsed.errorType,
    ...(parsed.stackTrace ? { stackTrace: parsed.stackTrace } : {}),
    ...(parsed.cause ? { cause: parsed.cause } : {}),
    ...(parsed.causes ? { causes: parsed.causes } : {}),
  };
}
