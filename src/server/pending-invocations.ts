import { LambdaTestServerError, UnknownRequestIdError } from "../errors.js";
import { AsyncQueue } from "./async-queue.js";
import { Deferred } from "./deferred.js";
import type { InvocationCompletion } from "./types.js";

type PendingStatus = "queued" | "dispatched" | "cancelled";

export class PendingInvocation {
  public readonly requestId: string;
  public readonly eventResponse: Response;
  public readonly deadline: number;
  private readonly completion = new Deferred<InvocationCompletion>();
  private status: PendingStatus = "queued";

  public constructor(requestId: string, eventResponse: Response, deadline: number) {
    this.requestId = requestId;
    this.eventResponse = eventResponse;
    this.deadline = deadline;
  }

  public get completed(): Promise<InvocationCompletion> {
    return this.completion.promise;
  }

  public get isCancelled(): boolean {
    return this.status === "cancelled";
  }

  public isExpired(now: number = Date.now()): boolean {
    return this.deadline <= now;
  }

  public markDispatched(): void {
    if (this.status === "queued") {
      this.status = "dispatched";
    }
  }

  /** Withdraws an invocation the bootstrap has not picked up yet. Dispatched ones stay answerable. */
  public cancel(): boolean {
    if (this.status !== "queued") {
      return false;
    }

    this.status = "cancelled";
    return true;
  }

  public complete(completion: InvocationCompletion): boolean {
    return this.completion.resolve(completion);
  }
}

/**
 * Lookup table of in-flight invocations plus the FIFO of ids waiting to be handed out. An entry is
 * always in the table before its id becomes readable from the queue.
 */
export class PendingInvocationTable {
  private readonly invocations = new Map<string, PendingInvocation>();
  private readonly ids = new AsyncQueue<string>();

  public get size(): number {
    return this.invocations.size;
  }

  public enqueue(pending: PendingInvocation): void {
    if (this.invocations.has(pending.requestId)) {
      throw new LambdaTestServerError("DuplicateRequestId", `Request id already pending: ${pending.requestId}`);
    }

    this.invocations.set(pending.requestId, pending);
    if (!this.ids.tryWrite(pending.requestId)) {
      this.invocations.delete(pending.requestId);
      throw new LambdaTestServerError("ChannelClosed", "Failed to enqueue pending invocation");
    }
  }

  public next(signal?: AbortSignal): Promise<string> {
    return this.ids.read(signal);
  }

  /**
   * Waits for the next invocation still worth serving and marks it dispatched. Cancelled and
   * expired entries are dropped from the table on the way; an id with no entry is fatal.
   */
  public async nextLive(signal?: AbortSignal): Promise<PendingInvocation> {
    for (;;) {
      const pending = this.getRequired(await this.next(signal));
      if (pending.isCancelled || pending.isExpired()) {
        pending.cancel();
        this.invocations.delete(pending.requestId);
        continue;
      }

      pending.markDispatched();
      return pending;
    }
  }

  public getRequired(requestId: string | undefined): PendingInvocation {
    const pending = requestId === undefined ? undefined : this.invocations.get(requestId);
    if (!pending) {
      throw new UnknownRequestIdError(requestId ?? "<missing>");
    }

    return pending;
  }

  /** Removes the entry as it is fulfilled, so a second fulfillment of the same id fails. */
  public takeRequired(requestId: string | undefined): PendingInvocation {
    const pending = this.getRequired(requestId);
    this.invocations.delete(pending.requestId);
    return pending;
  }

  public close(): void {
    this.ids.close();
  }
}
