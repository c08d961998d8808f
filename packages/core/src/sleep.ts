export type MarqueeSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function createAbortError(): Error {
  const error = new Error("Marquee stopped");
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Resolve after `ms`, or reject with an AbortError as soon as `signal` aborts.
 */
export function waitWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal === undefined) {
    return new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    });
  }
  if (signal.aborted) return Promise.reject(createAbortError());

  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timeout);
      signal.removeEventListener("abort", onAbort);
      reject(createAbortError());
    };

    signal.addEventListener("abort", onAbort, { once: true });
  });
}
