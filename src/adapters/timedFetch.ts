export type TimedResponse =
  | { kind: "response"; status: number; ok: boolean; body: string }
  | { kind: "timeout" }
  | { kind: "cancelled" }
  | { kind: "unreachable"; error: unknown };

/**
 * fetch with a hard deadline covering both the headers and the body.
 * A caller-supplied signal cancels the call as well; the outcome tells the
 * two apart.
 */
export async function timedFetch(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<TimedResponse> {
  if (signal?.aborted) return { kind: "cancelled" };

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const body = await response.text();
    return { kind: "response", status: response.status, ok: response.ok, body };
  } catch (error) {
    if (timedOut) return { kind: "timeout" };
    if (signal?.aborted) return { kind: "cancelled" };
    return { kind: "unreachable", error };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const parseJson = (body: string): unknown => {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
};
