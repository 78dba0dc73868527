import { CancelledError, ChannelClosedError } from "../errors.js";
import { Deferred } from "./deferred.js";

/**
 * Unbounded FIFO channel. Any number of writers, one reader. Writes never block; a read waits
 * until an item arrives, the channel closes or the read's signal aborts.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly readers: Deferred<T>[] = [];
  private closed = false;

  public get isClosed(): boolean {
    return this.closed;
  }

  public get size(): number {
    return this.items.length;
  }

  public tryWrite(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(item);
      return true;
    }

    this.items.push(item);
    return true;
  }

  public read(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      if (item !== undefined) {
        return Promise.resolve(item);
      }
    }

    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    const reader = new Deferred<T>();
    this.readers.push(reader);

    if (!signal) {
      return reader.promise;
    }

    const onAbort = (): void => {
      const index = this.readers.indexOf(reader);
      if (index !== -1) {
        this.readers.splice(index, 1);
      }
      reader.reject(new CancelledError());
    };
    signal.addEventListener("abort", onAbort, { once: true });

    return reader.promise.finally(() => signal.removeEventListener("abort", onAbort));
  }

  /** Stops accepting writes. Queued items stay readable; waiting readers are released. */
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const reader of this.readers.splice(0)) {
      reader.reject(new ChannelClosedError());
    }
  }
}
