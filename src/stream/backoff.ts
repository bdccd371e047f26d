export type BackoffPolicy = {
  baseMs: number;
  maxMs: number;
};

/** Delay before attempt `attempt + 1`, where `attempt` counts from 1. */
export const backoffDelay = (attempt: number, { baseMs, maxMs }: BackoffPolicy) =>
  Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));

/** Resolves after `ms`, or early with `false` when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
