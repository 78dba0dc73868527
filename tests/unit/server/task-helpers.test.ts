import { describe, expect, it } from "vitest";
import { throwIfFaulted, whenAll, whenAny } from "../../../src/server/task-helpers.js";

const never = new Promise<void>(() => undefined);

describe("task join helpers", () => {
  it("reports the first task to settle", async () => {
    const result = await whenAny([never, Promise.resolve("done"), never]);

    expect(result).toEqual({ first: 1, errors: [] });
  });

  it("collects rejections observed by the time the race settles", async () => {
    const failure = new Error("loop crashed");

    const result = await whenAny([Promise.reject(failure), never]);

    expect(result.first).toBe(0);
    expect(result.errors).toEqual([failure]);
  });

  it("treats a task resolving with an error as faulted", async () => {
    const exit = new Error("entry point failed");

    const result = await whenAny([Promise.resolve(exit)]);

    expect(result.errors).toEqual([exit]);
  });

  it("waits for every task and gathers all faults", async () => {
    const first = new Error("first");
    const second = new Error("second");

    const errors = await whenAll([Promise.reject(first), Promise.resolve(undefined), Promise.resolve(second)]);

    expect(errors).toEqual([first, second]);
  });

  it("wraps non-error rejections", async () => {
    const errors = await whenAll([Promise.reject("plain text")]);

    expect(errors.map((error) => error.message)).toEqual(["plain text"]);
  });

  it("throws an aggregate only when something faulted", () => {
    expect(() => throwIfFaulted([], "nothing")).not.toThrow();

    const cause = new Error("boom");
    let thrown: unknown;
    try {
      throwIfFaulted([cause], "Exception(s) encountered while running stop");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AggregateError);
    expect(thrown instanceof AggregateError ? thrown.message : undefined).toBe(
      "Exception(s) encountered while running stop",
    );
    expect(thrown instanceof AggregateError ? thrown.errors : undefined).toEqual([cause]);
  });
});
