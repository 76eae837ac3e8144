import { ProviderApiError } from "../providers/errors.js";
import { AllProvidersFailedError } from "../providers/fallback.js";

export const DEFAULT_RATE_LIMIT_BACKOFF_MS = 60_000;

const RATE_LIMIT_PATTERN = /429|rate limit|too many requests/i;

/**
 * How long to back off after `err`, or 0 when it is not a rate limit.
 * Checks, in order: a structured retry-after, a 429 status, a fallback chain
 * whose providers were all rate limited, and finally the message text.
 */
export function extractRetryAfterMs(err: unknown): number {
  if (err instanceof ProviderApiError) {
    if (err.retryAfterMs !== undefined && err.retryAfterMs > 0) return err.retryAfterMs;
    if (err.status === 429) return DEFAULT_RATE_LIMIT_BACKOFF_MS;
  }

  if (err instanceof AllProvidersFailedError && err.errors.length > 0) {
    const delays = err.errors.map((e) => extractRetryAfterMs(e.error));
    // One provider that failed for another reason means the chain is not rate limited.
    if (delays.every((d) => d > 0)) return Math.min(...delays);
    return 0;
  }

  if (err instanceof Error && RATE_LIMIT_PATTERN.test(err.message)) {
    return DEFAULT_RATE_LIMIT_BACKOFF_MS;
  }
  return 0;
}
