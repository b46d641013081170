/**
 * Settles with `promise`, or rejects with `onTimeout()` after `ms`, or with
 * `onAbort()` when the signal fires, whichever happens first.
 */
export function withDeadline<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal,
  onAbort?: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abortError = (): Error => (onAbort ? onAbort() : new Error("aborted"));
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", handleAbort);
    };
    const handleAbort = (): void => {
      cleanup();
      reject(abortError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(onTimeout());
    }, ms);
    signal?.addEventListener("abort", handleAbort, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}
