export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
