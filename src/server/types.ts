import type { Logger } from "winston";
import type { ZodType } from "zod";

export enum ServerState {
  Created = "Created",
  Starting = "Starting",
  Running = "Running",
  Stopping = "Stopping",
  Stopped = "Stopped",
  Disposed = "Disposed",
}

export enum RequestType {
  GetNextInvocation = "GetNextInvocation",
  PostResponse = "PostResponse",
  PostError = "PostError",
  PostInitError = "PostInitError",
}

export enum InitStatus {
  InitCompleted = "InitCompleted",
  InitAlreadyCompleted = "InitAlreadyCompleted",
  InitError = "InitError",
  HostExited = "HostExited",
}

export type ErrorCause = {
  errorMessage: string;
  errorType?: string;
  stackTrace?: string[];
  cause?: ErrorCause;
};

export type ErrorResponse = {
  errorMessage: string;
  errorType: string;
  stackTrace?: string[];
  cause?: ErrorCause;
  causes?: ErrorCause[];
};

export type InitResponse = {
  status: InitStatus;
  error?: ErrorResponse;
};

export type CancellationReason = "aborted" | "shutdown" | "timeout";

/**
 * Outcome of one invocation. Application failures are data, not exceptions: a handler error
 * arrives as `outcome: "error"`, a missed deadline or aborted signal as `outcome: "cancelled"`.
 */
export type InvocationResponse<TResponse> =
  | { outcome: "success"; wasSuccess: true; response: TResponse }
  | { outcome: "error"; wasSuccess: false; error: ErrorResponse }
  | { outcome: "cancelled"; wasSuccess: false; reason: CancellationReason };

export type InvocationCompletion = {
  type: RequestType.PostResponse | RequestType.PostError;
  request: Request;
};

export type RuntimeFetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * The application under test. `run` resolves once the application has exited: with `undefined`
 * after a clean exit, or with the error that ended it.
 */
export interface LambdaEntryPoint {
  run(fetch: RuntimeFetch): Promise<Error | undefined>;
  stop(): void;
}

export type JsonConvention = {
  stringify(value: unknown): string;
  parse(text: string): unknown;
};

export type LambdaServerOptions = {
  functionArn?: string;
  functionTimeoutMs?: number;
  additionalHeaders?: Record<string, string>;
  json?: JsonConvention;
  logger?: Logger;
  /** Aborting this signal shuts the server down as if `dispose` had started. */
  signal?: AbortSignal;
};

export type InvokeOptions = {
  traceId?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  noResponse?: boolean;
};

export type TypedInvokeOptions<TResponse> = InvokeOptions & {
  schema: ZodType<TResponse>;
};

export interface LambdaTestServer {
  readonly state: ServerState;
  start(signal?: AbortSignal): Promise<InitResponse>;
  invoke<TResponse>(event: unknown, options: TypedInvokeOptions<TResponse>): Promise<InvocationResponse<TResponse>>;
  invoke(event: unknown, options?: InvokeOptions): Promise<InvocationResponse<unknown>>;
  invokeNoEvent<TResponse>(options: TypedInvokeOptions<TResponse>): Promise<InvocationResponse<TResponse>>;
  invokeNoEvent(options?: InvokeOptions): Promise<InvocationResponse<unknown>>;
  invokeNoResponse(event: unknown, options?: Omit<InvokeOptions, "noResponse">): Promise<InvocationResponse<undefined>>;
  stop(signal?: AbortSignal): Promise<void>;
  dispose(): Promise<void>;
}
