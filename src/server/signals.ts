export type LinkedSignal = {
  signal: AbortSignal;
  dispose: () => void;
};

/** Combines several signals into one that aborts as soon as any of them does. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const sources = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  const onAbort = (): void => {
    controller.abort();
  };

  for (const source of sources) {
    if (source.aborted) {
      controller.abort();
      break;
    }
    source.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const source of sources) {
        source.removeEventListener("abort", onAbort);
      }
    },
  };
}

/**
 * Resolves once `signal` aborts. `dispose` detaches the listener; the promise then never settles.
 */
export function whenAborted(signal: AbortSignal | undefined): { promise: Promise<void>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<void>(() => undefined), dispose: () => undefined };
  }

  let onAbort: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });

  return {
    promise,
    dispose: () => signal.removeEventListener("abort", onAbort),
  };
}
