/** A provider answered with a non-2xx status. */
export class ProviderApiError extends Error {
  readonly providerId: string;
  readonly status: number;
  /** From the Retry-After header, when the provider sent one. */
  readonly retryAfterMs: number | undefined;

  constructor(providerId: string, status: number, message: string, retryAfterMs?: number) {
    super(message);
    this.name = "ProviderApiError";
    this.providerId = providerId;
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Reads a Retry-After value given either as delta-seconds or as an HTTP date.
 * Returns undefined when the header is absent or unreadable.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === "") return undefined;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}
