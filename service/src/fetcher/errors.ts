export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(sourceKey: string, timeoutMs: number) {
    super(`Fetch of ${sourceKey} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class FetchCancelledError extends Error {
  constructor(what: string) {
    super(`${what} cancelled`);
    this.name = "FetchCancelledError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Resolves after ms, or rejects with FetchCancelledError as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FetchCancelledError("Wait"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new FetchCancelledError("Wait"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
