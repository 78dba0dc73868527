import { toError } from "../errors.js";

type Outcome = { status: "pending" } | { status: "fulfilled"; value: unknown } | { status: "rejected"; reason: unknown };

export type WhenAnyResult = {
  /** Index of the first task to settle. */
  first: number;
  errors: Error[];
};

function observe(tasks: readonly Promise<unknown>[]): { outcomes: Outcome[]; settled: Promise<number>[] } {
  const outcomes: Outcome[] = tasks.map(() => ({ status: "pending" }));
  const settled = tasks.map((task, index) =>
    task.then(
      (value) => {
        outcomes[index] = { status: "fulfilled", value };
        return index;
      },
      (reason: unknown) => {
        outcomes[index] = { status: "rejected", reason };
        return index;
      },
    ),
  );

  return { outcomes, settled };
}

// A task faults by rejecting, or, for entry points, by resolving with the error that ended it.
function extractErrors(outcomes: readonly Outcome[]): Error[] {
  const errors: Error[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "rejected") {
      errors.push(toError(outcome.reason));
    } else if (outcome.status === "fulfilled" && outcome.value instanceof Error) {
      errors.push(outcome.value);
    }
  }
  return errors;
}

export async function whenAny(tasks: readonly Promise<unknown>[]): Promise<WhenAnyResult> {
  const { outcomes, settled } = observe(tasks);
  const first = await Promise.race(settled);
  return { first, errors: extractErrors(outcomes) };
}

export async function whenAll(tasks: readonly Promise<unknown>[]): Promise<Error[]> {
  const { outcomes, settled } = observe(tasks);
  await Promise.all(settled);
  return extractErrors(outcomes);
}

export function throwIfFaulted(errors: readonly Error[], message: string): void {
  if (errors.length > 0) {
    throw new AggregateError(errors, message);
  }
}
