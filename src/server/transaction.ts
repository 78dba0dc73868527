import { CancelledError } from "../errors.js";
import { Deferred } from "./deferred.js";

/** One intercepted exchange: the bootstrap's request and the slot its response is written to. */
export class LambdaHttpTransaction {
  public readonly request: Request;
  private readonly responseSlot = new Deferred<Response>();

  public constructor(request: Request) {
    this.request = request;
  }

  public get response(): Promise<Response> {
    return this.responseSlot.promise;
  }

  public respond(response: Response): boolean {
    return this.responseSlot.resolve(response);
  }

  public cancel(): boolean {
    return this.responseSlot.reject(new CancelledError("The runtime API request was cancelled"));
  }
}

/**
 * Reads the body to completion and rebuilds the request around the bytes, so the server loop never
 * waits on a stream and the body can be read more than once.
 */
export async function bufferRequest(request: Request): Promise<Request> {
  if (request.body === null) {
    return request;
  }

  const bytes = new Uint8Array(await request.arrayBuffer());
  return new Request(request.url, {
    method: request.method,
    headers: request.headers,
    body: bytes,
  });
}
