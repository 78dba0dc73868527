import { randomUUID } from "node:crypto";
import type { ZodType } from "zod";
import { resolveServerOptions, type ResolvedServerOptions } from "../config.js";
import {
  CancelledError,
  ChannelClosedError,
  InitErrorAfterStartError,
  InvalidServerStateError,
  UnexpectedRequestError,
} from "../errors.js";
import { AsyncQueue } from "./async-queue.js";
import { Deferred } from "./deferred.js";
import { PendingInvocation, PendingInvocationTable } from "./pending-invocations.js";
import {
  createAcceptedResponse,
  createEventResponse,
  ERROR_TYPE_HEADER,
  parseErrorResponse,
} from "./responses.js";
import { matchRoute } from "./routes.js";
import { linkSignals, whenAborted } from "./signals.js";
import { throwIfFaulted, whenAll, whenAny } from "./task-helpers.js";
import { bufferRequest, LambdaHttpTransaction } from "./transaction.js";
import {
  InitStatus,
  RequestType,
  ServerState,
  type CancellationReason,
  type InitResponse,
  type InvocationCompletion,
  type InvocationResponse,
  type InvokeOptions,
  type LambdaEntryPoint,
  type LambdaServerOptions,
  type LambdaTestServer,
  type RuntimeFetch,
  type TypedInvokeOptions,
} from "./types.js";

const REQUEST_ID_WIDTH = 12;

type InvokeCoreOptions = InvokeOptions & {
  schema?: ZodType<unknown>;
};

class InMemoryLambdaTestServer implements LambdaTestServer {
  private readonly entryPoint: LambdaEntryPoint;
  private readonly options: ResolvedServerOptions;
  private readonly shutdown = new AbortController();
  private readonly transactions = new AsyncQueue<LambdaHttpTransaction>();
  private readonly pending = new PendingInvocationTable();
  private readonly initCompletion = new Deferred<InitResponse>();
  private readonly detachExternalSignal: () => void;
  private currentState = ServerState.Created;
  private requestCounter = 0;
  private startPromise?: Promise<InitResponse>;
  private implicitStart?: Promise<InitResponse>;
  private processing?: Promise<void>;
  private entryPointCompletion?: Promise<Error | undefined>;
  private entryPointStopped = false;

  public constructor(entryPoint: LambdaEntryPoint, options: LambdaServerOptions = {}) {
    this.entryPoint = entryPoint;
    this.options = resolveServerOptions(options);
    this.detachExternalSignal = this.linkExternalSignal(this.options.signal);
  }

  public get state(): ServerState {
    return this.currentState;
  }

  //
  // Public API
  //

  public start(signal?: AbortSignal): Promise<InitResponse> {
    if (this.currentState === ServerState.Disposed) {
      return Promise.reject(new InvalidServerStateError("Test server has been disposed."));
    }
    // Check-and-set without an await in between: a second caller always sees the first start.
    if (this.startPromise || this.currentState !== ServerState.Created) {
      return Promise.reject(
        new InvalidServerStateError("Test server has already been started and cannot be restarted."),
      );
    }

    this.startPromise = this.startCore(signal);
    return this.startPromise;
  }

  public invoke<TResponse>(event: unknown, options: TypedInvokeOptions<TResponse>): Promise<InvocationResponse<TResponse>>;
  public invoke(event: unknown, options?: InvokeOptions): Promise<InvocationResponse<unknown>>;
  public invoke(event: unknown, options: InvokeCoreOptions = {}): Promise<InvocationResponse<unknown>> {
    return this.invokeCore(event, options);
  }

  public invokeNoEvent<TResponse>(options: TypedInvokeOptions<TResponse>): Promise<InvocationResponse<TResponse>>;
  public invokeNoEvent(options?: InvokeOptions): Promise<InvocationResponse<unknown>>;
  public invokeNoEvent(options: InvokeCoreOptions = {}): Promise<InvocationResponse<unknown>> {
    return this.invokeCore(null, options);
  }

  public async invokeNoResponse(
    event: unknown,
    options: Omit<InvokeOptions, "noResponse"> = {},
  ): Promise<InvocationResponse<undefined>> {
    const result = await this.invokeCore(event, { ...options, noResponse: true });
    return result.outcome === "success" ? { outcome: "success", wasSuccess: true, response: undefined } : result;
  }

  public async stop(signal?: AbortSignal): Promise<void> {
    if (this.currentState !== ServerState.Running) {
      throw new InvalidServerStateError("Test server is not running and as such cannot be stopped.");
    }

    this.currentState = ServerState.Stopping;
    this.options.logger.debug("stopping test server");

    this.shutdown.abort();
    this.stopEntryPoint();

    const aborted = whenAborted(signal);
    try {
      const joined = whenAll(this.backgroundTasks());
      const winner = await Promise.race([joined, aborted.promise.then(() => undefined)]);
      if (winner === undefined) {
        throw new CancelledError("Stopping the test server was cancelled");
      }

      this.transition(ServerState.Stopping, ServerState.Stopped);
      throwIfFaulted(winner, "Exception(s) encountered while running stop");
    } finally {
      aborted.dispose();
    }
  }

  public async dispose(): Promise<void> {
    if (this.currentState === ServerState.Disposed) {
      return;
    }

    if (this.currentState === ServerState.Running) {
      try {
        await this.stop();
      } catch (error) {
        this.options.logger.debug(`suppressed error while stopping during dispose: ${String(error)}`);
      }
    } else {
      this.stopEntryPoint();
    }

    this.transactions.close();
    this.pending.close();
    this.shutdown.abort();
    this.detachExternalSignal();
    this.currentState = ServerState.Disposed;
  }

  /** `fetch` replacement handed to the application; every call becomes one transaction. */
  private readonly interceptFetch: RuntimeFetch = async (input, init) => {
    const linked = linkSignals(init?.signal ?? undefined, this.shutdown.signal);
    try {
      const request = await bufferRequest(new Request(input, init));
      const transaction = new LambdaHttpTransaction(request);
      const onAbort = (): void => {
        transaction.cancel();
      };
      linked.signal.addEventListener("abort", onAbort, { once: true });

      try {
        if (linked.signal.aborted || !this.transactions.tryWrite(transaction)) {
          transaction.cancel();
        }
        return await transaction.response;
      } finally {
        linked.signal.removeEventListener("abort", onAbort);
      }
    } finally {
      linked.dispose();
    }
  };

  //
  // Lifecycle
  //

  private async startCore(signal?: AbortSignal): Promise<InitResponse> {
    this.currentState = ServerState.Starting;
    this.options.logger.debug("starting test server");

    const processing = this.processTransactions();
    const entryPointCompletion = this.entryPoint.run(this.interceptFetch);
    this.processing = processing;
    this.entryPointCompletion = entryPointCompletion;

    const aborted = whenAborted(signal);
    try {
      const { first, errors } = await whenAny([
        processing,
        entryPointCompletion,
        this.initCompletion.promise,
        aborted.promise,
      ]);

      if (this.state === ServerState.Disposed) {
        throw new InvalidServerStateError("Test server was disposed while starting.");
      }

      if (errors.length > 0) {
        this.transition(ServerState.Starting, ServerState.Stopped);
        throwIfFaulted(errors, "Exception(s) encountered while running start");
      }

      switch (first) {
        case 1:
          this.transition(ServerState.Starting, ServerState.Stopped);
          this.options.logger.debug("application exited before requesting an invocation");
          return { status: InitStatus.HostExited };
        case 2: {
          const init = await this.initCompletion.promise;
          this.transition(
            ServerState.Starting,
            init.status === InitStatus.InitCompleted ? ServerState.Running : ServerState.Stopped,
          );
          this.options.logger.debug(`initialization resolved: ${init.status}`);
          return init;
        }
        case 3:
          throw new CancelledError("Starting the test server was cancelled");
        default:
          this.transition(ServerState.Starting, ServerState.Stopped);
          throw new InvalidServerStateError("Test server initialization failed with neither an error nor completion.");
      }
    } finally {
      aborted.dispose();
    }
  }

  private async ensureStarted(): Promise<void> {
    if (this.currentState === ServerState.Created) {
      this.implicitStart = this.start();
    }

    // Concurrent callers wait on the same start and resume in call order.
    if (this.implicitStart) {
      const init = await this.implicitStart;
      if (init.status !== InitStatus.InitCompleted) {
        throw new InvalidServerStateError(`Test server failed to start: ${init.status}`);
      }
    }
  }

  private async invokeCore(event: unknown, options: InvokeCoreOptions): Promise<InvocationResponse<unknown>> {
    this.assertNotDisposed();
    if (options.signal?.aborted) {
      return { outcome: "cancelled", wasSuccess: false, reason: "aborted" };
    }

    await this.ensureStarted();
    if (this.currentState !== ServerState.Running) {
      throw new InvalidServerStateError("Test server is not Running and as such an event cannot be invoked.");
    }

    const { functionTimeoutMs, functionArn, json, additionalHeaders } = this.options;
    const requestId = this.nextRequestId();
    const deadline = Date.now() + functionTimeoutMs;
    const eventResponse = createEventResponse(
      json.stringify(event),
      {
        requestId,
        traceId: options.traceId ?? randomUUID(),
        deadlineMs: deadline,
        functionArn,
      },
      additionalHeaders,
      options.headers,
    );
    const pending = new PendingInvocation(requestId, eventResponse, deadline);
    this.pending.enqueue(pending);
    this.options.logger.debug(`queued invocation ${requestId}`);

    const deadlineController = new AbortController();
    const timeout = setTimeout(() => {
      this.options.logger.debug(`invocation ${requestId} exceeded its ${functionTimeoutMs}ms deadline`);
      deadlineController.abort();
    }, functionTimeoutMs);
    const linked = linkSignals(options.signal, this.shutdown.signal, deadlineController.signal);
    const aborted = whenAborted(linked.signal);

    try {
      const completion = await Promise.race([pending.completed, aborted.promise.then(() => undefined)]);
      if (!completion) {
        pending.cancel();
        const reason = this.cancellationReason(deadlineController.signal.aborted);
        return { outcome: "cancelled", wasSuccess: false, reason };
      }

      return await this.readCompletion(completion, options);
    } finally {
      clearTimeout(timeout);
      aborted.dispose();
      linked.dispose();
    }
  }

  private async readCompletion(
    completion: InvocationCompletion,
    options: InvokeCoreOptions,
  ): Promise<InvocationResponse<unknown>> {
    const body = await completion.request.text();
    if (completion.type === RequestType.PostError) {
      return {
        outcome: "error",
        wasSuccess: false,
        error: parseErrorResponse(body, completion.request.headers.get(ERROR_TYPE_HEADER)),
      };
    }

    if (options.noResponse) {
      return { outcome: "success", wasSuccess: true, response: undefined };
    }

    const raw = this.options.json.parse(body);
    return { outcome: "success", wasSuccess: true, response: options.schema ? options.schema.parse(raw) : raw };
  }

  private cancellationReason(deadlineExceeded: boolean): CancellationReason {
    if (this.shutdown.signal.aborted) {
      return "shutdown";
    }
    return deadlineExceeded ? "timeout" : "aborted";
  }

  //
  // Processing loop
  //

  private async processTransactions(): Promise<void> {
    const signal = this.shutdown.signal;
    try {
      for (;;) {
        const transaction = await this.transactions.read(signal);
        await this.dispatch(transaction);
      }
    } catch (error) {
      if (error instanceof ChannelClosedError || (error instanceof CancelledError && signal.aborted)) {
        this.options.logger.debug("processing loop stopped");
        return;
      }
      throw error;
    }
  }

  private async dispatch(transaction: LambdaHttpTransaction): Promise<void> {
    const { method, url } = transaction.request;
    const route = matchRoute(method, url);
    if (!route) {
      throw new UnexpectedRequestError(method, url);
    }

    this.options.logger.debug(`${route.type} ${method} ${url}`);

    switch (route.type) {
      case RequestType.GetNextInvocation:
        await this.handleGetNextInvocation(transaction);
        return;
      case RequestType.PostResponse:
      case RequestType.PostError:
        this.handleInvocationResult(transaction, route.type, route.params.requestId);
        return;
      case RequestType.PostInitError:
        await this.handlePostInitError(transaction);
        return;
    }
  }

  private async handleGetNextInvocation(transaction: LambdaHttpTransaction): Promise<void> {
    if (this.currentState === ServerState.Starting) {
      this.initCompletion.resolve({ status: InitStatus.InitCompleted });
    }

    const pending = await this.pending.nextLive(this.shutdown.signal);
    this.options.logger.debug(`dispatching invocation ${pending.requestId}`);
    transaction.respond(pending.eventResponse);
  }

  private handleInvocationResult(
    transaction: LambdaHttpTransaction,
    type: RequestType.PostResponse | RequestType.PostError,
    requestId: string | undefined,
  ): void {
    const pending = this.pending.takeRequired(requestId);

    // Acknowledge to the bootstrap first, then release the waiting caller.
    transaction.respond(createAcceptedResponse());
    pending.complete({ type, request: transaction.request.clone() });
  }

  private async handlePostInitError(transaction: LambdaHttpTransaction): Promise<void> {
    if (this.currentState !== ServerState.Starting) {
      throw new InitErrorAfterStartError();
    }

    const error = parseErrorResponse(
      await transaction.request.clone().text(),
      transaction.request.headers.get(ERROR_TYPE_HEADER),
    );
    transaction.respond(createAcceptedResponse());
    this.initCompletion.resolve({ status: InitStatus.InitError, error });
  }

  //
  // Helpers
  //

  /** Moves to `to` only from `from`; a dispose that landed meanwhile keeps the server `Disposed`. */
  private transition(from: ServerState, to: ServerState): boolean {
    if (this.currentState !== from) {
      return false;
    }

    this.currentState = to;
    return true;
  }

  private nextRequestId(): string {
    this.requestCounter += 1;
    return String(this.requestCounter).padStart(REQUEST_ID_WIDTH, "0");
  }

  private backgroundTasks(): Promise<unknown>[] {
    const tasks: Promise<unknown>[] = [];
    if (this.entryPointCompletion) {
      tasks.push(this.entryPointCompletion);
    }
    if (this.processing) {
      tasks.push(this.processing);
    }
    return tasks;
  }

  private stopEntryPoint(): void {
    if (!this.entryPointCompletion || this.entryPointStopped) {
      return;
    }

    this.entryPointStopped = true;
    this.entryPoint.stop();
  }

  private assertNotDisposed(): void {
    if (this.currentState === ServerState.Disposed) {
      throw new InvalidServerStateError("Test server has been disposed.");
    }
  }

  private linkExternalSignal(signal: AbortSignal | undefined): () => void {
    if (!signal) {
      return () => undefined;
    }

    const onAbort = (): void => {
      this.shutdown.abort();
    };
    if (signal.aborted) {
      this.shutdown.abort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    return () => signal.removeEventListener("abort", onAbort);
  }
}

export function createLambdaTestServer(entryPoint: LambdaEntryPoint, options?: LambdaServerOptions): LambdaTestServer {
  return new InMemoryLambdaTestServer(entryPoint, options);
}
