import { setTimeout as sleep } from "node:timers/promises";
import { afterEach, describe, expect, it } from "vitest";
import {
  CancelledError,
  createLambdaTestServer,
  createLogger,
  InitErrorAfterStartError,
  InitStatus,
  InvalidServerStateError,
  ServerState,
  UnexpectedRequestError,
  UnknownRequestIdError,
  type LambdaServerOptions,
  type LambdaTestServer,
} from "../../../src/index.js";
import { RUNTIME_BASE_URL, ScriptedEntryPoint } from "./scripted-entry-point.js";

const logger = createLogger("silent");

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe("runtime api protocol", () => {
  const servers: LambdaTestServer[] = [];

  function createServer(entryPoint: ScriptedEntryPoint, options: LambdaServerOptions = {}): LambdaTestServer {
    const server = createLambdaTestServer(entryPoint, { logger, ...options });
    servers.push(server);
    return server;
  }

  /** Starts the server and leaves the first get-next request waiting for an invocation. */
  async function startWithPendingNext(
    entryPoint: ScriptedEntryPoint,
    options: LambdaServerOptions = {},
  ): Promise<{ server: LambdaTestServer; next: Promise<Response> }> {
    const server = createServer(entryPoint, options);
    const started = server.start();
    const next = entryPoint.next();
    expect(await started).toEqual({ status: InitStatus.InitCompleted });
    return { server, next };
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.dispose()));
  });

  it("serves the event with the runtime headers", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint, {
      functionArn: "arn:aws:lambda:eu-west-1:000000000000:function:greeter",
      functionTimeoutMs: 60_000,
      additionalHeaders: { "X-Stage": "test" },
    });

    const before = Date.now();
    const invocation = server.invoke({ Name: "World" }, { traceId: "Root=1-test-trace", headers: { "X-Source": "unit" } });
    const response = await next;

    expect(response.status).toBe(200);
    expect(response.headers.get("Lambda-Runtime-Aws-Request-Id")).toBe("000000000001");
    expect(response.headers.get("Lambda-Runtime-Trace-Id")).toBe("Root=1-test-trace");
    expect(response.headers.get("Lambda-Runtime-Invoked-Function-Arn")).toBe(
      "arn:aws:lambda:eu-west-1:000000000000:function:greeter",
    );
    expect(response.headers.get("X-Stage")).toBe("test");
    expect(response.headers.get("X-Source")).toBe("unit");
    const deadline = Number(response.headers.get("Lambda-Runtime-Deadline-Ms"));
    expect(deadline).toBeGreaterThanOrEqual(before + 60_000);
    expect(deadline).toBeLessThanOrEqual(Date.now() + 60_000);
    expect(await response.json()).toEqual({ Name: "World" });

    const ack = await entryPoint.post("invocation/000000000001/response", JSON.stringify({ Message: "Hello World!" }));
    expect(ack.status).toBe(202);
    expect(await ack.json()).toEqual({ status: "success" });

    expect(await invocation).toEqual({ outcome: "success", wasSuccess: true, response: { Message: "Hello World!" } });
  });

  it("generates a trace id when none is given", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);

    const invocation = server.invoke(null);
    const response = await next;

    expect(response.headers.get("Lambda-Runtime-Trace-Id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(await response.text()).toBe("null");

    await entryPoint.post("invocation/000000000001/response", "");
    expect(await invocation).toEqual({ outcome: "success", wasSuccess: true, response: undefined });
  });

  it("lets additional headers replace the runtime headers", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint, {
      additionalHeaders: { "Lambda-Runtime-Invoked-Function-Arn": "arn:override" },
    });

    const invocation = server.invoke({}, { headers: { "lambda-runtime-trace-id": "call-trace" } });
    const response = await next;

    expect(response.headers.get("Lambda-Runtime-Invoked-Function-Arn")).toBe("arn:override");
    expect(response.headers.get("Lambda-Runtime-Trace-Id")).toBe("call-trace");

    await entryPoint.post("invocation/000000000001/response", "{}");
    expect(await invocation).toEqual({ outcome: "success", wasSuccess: true, response: {} });
  });

  it("returns posted errors as error results", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);

    const invocation = server.invoke({ Name: "" });
    await next;
    const ack = await entryPoint.post(
      "invocation/000000000001/error",
      JSON.stringify({ errorType: "ValidationError", errorMessage: "Name is required", stackTrace: ["at handler"] }),
      { "Lambda-Runtime-Function-Error-Type": "ValidationError" },
    );

    expect(ack.status).toBe(202);
    expect(await invocation).toEqual({
      outcome: "error",
      wasSuccess: false,
      error: { errorType: "ValidationError", errorMessage: "Name is required", stackTrace: ["at handler"] },
    });
  });

  it("uses the error type header when the error body is empty", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);

    const invocation = server.invoke({});
    await next;
    await entryPoint.post("invocation/000000000001/error", "", { "Lambda-Runtime-Function-Error-Type": "Runtime.Crash" });

    expect(await invocation).toEqual({
      outcome: "error",
      wasSuccess: false,
      error: { errorMessage: "", errorType: "Runtime.Crash" },
    });
  });

  it("reports an init error posted while starting", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const server = createServer(entryPoint);

    const started = server.start();
    const ack = entryPoint.post("init/error", JSON.stringify({ errorType: "Error", errorMessage: "missing config" }));

    expect(await started).toEqual({
      status: InitStatus.InitError,
      error: { errorType: "Error", errorMessage: "missing config" },
    });
    expect((await ack).status).toBe(202);
    expect(server.state).toBe(ServerState.Stopped);
  });

  it("fails the start on an unexpected request", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const server = createServer(entryPoint);

    const started = server.start();
    const stray = captureRejection(entryPoint.fetch(`${RUNTIME_BASE_URL}/restart`, { method: "POST" }));
    const failure = await captureRejection(started);

    expect(failure).toBeInstanceOf(AggregateError);
    const errors: unknown[] = failure instanceof AggregateError ? failure.errors : [];
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(UnexpectedRequestError);
    expect(errors[0] instanceof Error ? errors[0].message : undefined).toBe(
      `Unexpected request received from the Lambda HTTP handler: POST ${RUNTIME_BASE_URL}/restart`,
    );
    expect(server.state).toBe(ServerState.Stopped);

    await server.dispose();
    expect(await stray).toBeInstanceOf(CancelledError);
  });

  it("fails the start when the entry point exits with an error", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const server = createServer(entryPoint);

    const started = server.start();
    entryPoint.exit(new Error("bootstrap crashed"));
    const failure = await captureRejection(started);

    expect(failure instanceof AggregateError ? failure.errors.map((error: Error) => error.message) : []).toEqual([
      "bootstrap crashed",
    ]);
    expect(server.state).toBe(ServerState.Stopped);
  });

  it("rejects a start whose signal aborts", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const server = createServer(entryPoint);
    const controller = new AbortController();

    const started = server.start(controller.signal);
    controller.abort();

    await expect(started).rejects.toBeInstanceOf(CancelledError);
    await server.dispose();
    expect(entryPoint.stopCalls).toBe(1);
  });

  it("faults the loop on an init error after start", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);
    const invocation = server.invoke({});
    await next;

    const late = captureRejection(
      entryPoint.post("init/error", JSON.stringify({ errorType: "Error", errorMessage: "too late" })),
    );
    await sleep(20);
    const failure = await captureRejection(server.stop());

    expect(failure).toBeInstanceOf(AggregateError);
    const errors: unknown[] = failure instanceof AggregateError ? failure.errors : [];
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(InitErrorAfterStartError);
    expect(await invocation).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "shutdown" });
    expect(await late).toBeInstanceOf(CancelledError);
  });

  it("faults the loop on a result for an unknown request id", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);
    const invocation = server.invoke({});
    await next;

    const stray = captureRejection(entryPoint.post("invocation/000000000042/response", "{}"));
    await sleep(20);
    const failure = await captureRejection(server.stop());

    const errors: unknown[] = failure instanceof AggregateError ? failure.errors : [];
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(UnknownRequestIdError);
    expect(errors[0] instanceof UnknownRequestIdError ? errors[0].requestId : undefined).toBe("000000000042");
    expect(await invocation).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "shutdown" });
    expect(await stray).toBeInstanceOf(CancelledError);
  });

  it("cancels waiting invocations on dispose", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);

    const served = server.invoke({ Name: "served" });
    await next;
    const queued = server.invoke({ Name: "queued" });

    await server.dispose();

    expect(await served).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "shutdown" });
    expect(await queued).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "shutdown" });
    expect(entryPoint.stopCalls).toBe(1);
  });

  it("cancels a caller-aborted invocation", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);
    const controller = new AbortController();

    const invocation = server.invoke({}, { signal: controller.signal });
    await next;
    controller.abort();

    expect(await invocation).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "aborted" });
    expect(server.state).toBe(ServerState.Running);
  });

  it("cancels runtime requests made after dispose", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);
    const pendingNext = captureRejection(next);

    await server.dispose();

    expect(await pendingNext).toBeInstanceOf(CancelledError);
    await expect(entryPoint.next()).rejects.toBeInstanceOf(CancelledError);
  });

  it("stays disposed when dispose lands while start is waiting", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const server = createServer(entryPoint);

    const started = captureRejection(server.start());
    await server.dispose();
    const failure = await started;

    expect(failure).toBeInstanceOf(InvalidServerStateError);
    expect(server.state).toBe(ServerState.Disposed);
    expect(entryPoint.stopCalls).toBe(1);
    await server.dispose();
    await expect(server.invoke({})).rejects.toThrowError("Test server has been disposed.");
  });

  it("stays disposed when dispose lands while stop is waiting", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint);
    const pendingNext = captureRejection(next);

    const stopping = server.stop();
    await server.dispose();
    await stopping;

    expect(server.state).toBe(ServerState.Disposed);
    expect(await pendingNext).toBeInstanceOf(CancelledError);
  });

  it("skips a queued invocation whose deadline passed before pickup", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const { server, next } = await startWithPendingNext(entryPoint, { functionTimeoutMs: 100 });

    const first = server.invoke({ Name: "first" });
    await next;
    const expired = await server.invoke({ Name: "expired" });
    expect(expired).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "timeout" });
    expect(await first).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "timeout" });

    const lateAck = await entryPoint.post("invocation/000000000001/response", "{}");
    expect(lateAck.status).toBe(202);

    const following = entryPoint.next();
    const latest = server.invoke({ Name: "latest" });
    const response = await following;

    expect(response.headers.get("Lambda-Runtime-Aws-Request-Id")).toBe("000000000003");
    expect(await response.json()).toEqual({ Name: "latest" });
    await entryPoint.post("invocation/000000000003/response", '{"ok":true}');
    expect(await latest).toEqual({ outcome: "success", wasSuccess: true, response: { ok: true } });
  });

  it("shuts down when the external signal aborts", async () => {
    const entryPoint = new ScriptedEntryPoint();
    const controller = new AbortController();
    const { server, next } = await startWithPendingNext(entryPoint, { signal: controller.signal });

    const invocation = server.invoke({});
    await next;
    controller.abort();

    expect(await invocation).toEqual({ outcome: "cancelled", wasSuccess: false, reason: "shutdown" });
  });
});
