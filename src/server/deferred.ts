/** Single-assignment completion slot. Only the first `resolve` or `reject` takes effect. */
export class Deferred<T> {
  public readonly promise: Promise<T>;
  private resolvePromise: (value: T) => void = () => undefined;
  private rejectPromise: (reason: Error) => void = () => undefined;
  private settled = false;

  public constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolvePromise = resolve;
      this.rejectPromise = reject;
    });
  }

  public resolve(value: T): boolean {
    if (this.settled) {
      return false;
    }

    this.settled = true;
    this.resolvePromise(value);
    return true;
  }

  public reject(reason: Error): boolean {
    if (this.settled) {
      return false;
    }

    this.settled = true;
    this.rejectPromise(reason);
    return true;
  }
}
