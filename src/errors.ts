export class LambdaTestServerError extends Error {
  public readonly code: string;

  public constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidServerStateError extends LambdaTestServerError {
  public constructor(message: string) {
    super("InvalidServerState", message);
  }
}

export class UnexpectedRequestError extends LambdaTestServerError {
  public constructor(method: string, url: string) {
    super("UnexpectedRequest", `Unexpected request received from the Lambda HTTP handler: ${method} ${url}`);
  }
}

export class UnknownRequestIdError extends LambdaTestServerError {
  public readonly requestId: string;

  public constructor(requestId: string) {
    super("UnknownRequestId", `No pending invocation is registered for request id: ${requestId}`);
    this.requestId = requestId;
  }
}

export class InitErrorAfterStartError extends LambdaTestServerError {
  public constructor() {
    super(
      "InitErrorAfterStart",
      "Test server is already started and as such an initialization error cannot be reported.",
    );
  }
}

export class ChannelClosedError extends LambdaTestServerError {
  public constructor() {
    super("ChannelClosed", "The channel has been closed");
  }
}

export class CancelledError extends LambdaTestServerError {
  public constructor(message = "The operation was cancelled") {
    super("Cancelled", message);
  }
}

export class RuntimeApiError extends LambdaTestServerError {
  public readonly statusCode: number;

  public constructor(statusCode: number, message: string) {
    super("RuntimeApiError", message);
    this.statusCode = statusCode;
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(String(value));
}
