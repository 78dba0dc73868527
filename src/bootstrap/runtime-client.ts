import { RuntimeApiError } from "../errors.js";
import { ERROR_TYPE_HEADER } from "../server/responses.js";
import type { ErrorCause, ErrorResponse, RuntimeFetch } from "../server/types.js";

// See: https://docs.aws.amazon.com/lambda/latest/dg/runtimes-api.html
export const RUNTIME_API_VERSION = "2018-06-01";
export const DEFAULT_RUNTIME_API = "127.0.0.1:9001";

export type RuntimeApiClientOptions = {
  runtimeApi?: string;
  apiVersion?: string;
};

export type NextInvocation = {
  requestId: string;
  traceId: string;
  deadlineMs: number;
  invokedFunctionArn: string;
  headers: Headers;
  body: string;
};

function toErrorCause(error: Error, seen: Set<Error>): ErrorCause {
  seen.add(error);
  const cause = error.cause instanceof Error && !seen.has(error.cause) ? toErrorCause(error.cause, seen) : undefined;
  return {
    errorMessage: error.message,
    errorType: error.name,
    ...(error.stack ? { stackTrace: error.stack.split("\n") } : {}),
    ...(cause ? { cause } : {}),
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? toErrorCause(error.cause, new Set([error])) : undefined;
    return {
      errorType: error.name || "Error",
      errorMessage: error.message || "Unknown error",
      ...(error.stack ? { stackTrace: error.stack.split("\n") } : {}),
      ...(cause ? { cause } : {}),
    };
  }

  return { errorType: "Error", errorMessage: String(error) };
}

/** Speaks the bootstrap side of the Runtime API over an injected `fetch`. */
export class RuntimeApiClient {
  private readonly fetch: RuntimeFetch;
  private readonly baseUrl: string;

  public constructor(fetch: RuntimeFetch, options: RuntimeApiClientOptions = {}) {
    this.fetch = fetch;
    const runtimeApi = options.runtimeApi ?? DEFAULT_RUNTIME_API;
    this.baseUrl = `http://${runtimeApi}/${options.apiVersion ?? RUNTIME_API_VERSION}/runtime`;
  }

  public async nextInvocation(signal?: AbortSignal): Promise<NextInvocation> {
    const response = await this.send(`${this.baseUrl}/invocation/next`, { method: "GET", signal });

    const requestId = response.headers.get("Lambda-Runtime-Aws-Request-Id");
    if (!requestId) {
      throw new RuntimeApiError(response.status, "Runtime received a request without a request ID");
    }

    return {
      requestId,
      traceId: response.headers.get("Lambda-Runtime-Trace-Id") ?? "",
      deadlineMs: Number(response.headers.get("Lambda-Runtime-Deadline-Ms") ?? "0") || 0,
      invokedFunctionArn: response.headers.get("Lambda-Runtime-Invoked-Function-Arn") ?? "",
      headers: response.headers,
      body: await response.text(),
    };
  }

  public async postResponse(requestId: string, body: string, signal?: AbortSignal): Promise<void> {
    await this.send(`${this.baseUrl}/invocation/${encodeURIComponent(requestId)}/response`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
      signal,
    });
  }

  public async postError(requestId: string, error: ErrorResponse, signal?: AbortSignal): Promise<void> {
    await this.sendError(`${this.baseUrl}/invocation/${encodeURIComponent(requestId)}/error`, error, signal);
  }

  public async postInitError(error: ErrorResponse, signal?: AbortSignal): Promise<void> {
    await this.sendError(`${this.baseUrl}/init/error`, error, signal);
  }

  private async sendError(url: string, error: ErrorResponse, signal?: AbortSignal): Promise<void> {
    await this.send(url, {
      method: "POST",
      headers: {
        "content-type": "application/vnd.aws.lambda.error+json",
        [ERROR_TYPE_HEADER]: error.errorType,
      },
      body: JSON.stringify(error),
      signal,
    });
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    const response = await this.fetch(url, init);
    if (!response.ok) {
      throw new RuntimeApiError(
        response.status,
        `Runtime failed to send request to Lambda [status: ${response.status}]`,
      );
    }
    return response;
  }
}
