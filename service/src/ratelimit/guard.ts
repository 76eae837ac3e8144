import type { Tier } from "@coinwire/shared";
import type { RateLimiter } from "./limiter.js";

export type Identity = {
  /** Prefixed with its kind, e.g. `key:<api key>` or `ip:<address>`. */
  identifier: string;
  tier: Tier;
};

export type GuardResult = {
  allowed: boolean;
  identity: Identity;
  headers: Record<string, string>;
  /** Seconds until a rejected caller may retry; 0 when allowed. */
  retryAfterSeconds: number;
};

/**
 * Builds the per-request check that route handlers call before doing any
 * work. `resolveIdentity` may throw to refuse the request outright.
 */
export function rateLimitGuard<Req>(
  limiter: RateLimiter,
  resolveIdentity: (req: Req) => Identity,
): (req: Req) => GuardResult {
  return (req) => {
    const identity = resolveIdentity(req);
    const decision = limiter.allow(identity.identifier, identity.tier);
    if (decision.failOpen) {
      return { allowed: true, identity, headers: {}, retryAfterSeconds: 0 };
    }

    const now = Date.now();
    const headers: Record<string, string> = {
      "X-RateLimit-Limit": String(decision.limit),
      "X-RateLimit-Remaining": String(decision.remaining),
      "X-RateLimit-Reset": String(Math.ceil(decision.resetAt / 1000)),
    };
    if (decision.allowed) {
      return { allowed: true, identity, headers, retryAfterSeconds: 0 };
    }

    const retryAfterSeconds = Math.max(1, Math.ceil((decision.resetAt - now) / 1000));
    headers["Retry-After"] = String(retryAfterSeconds);
    return { allowed: false, identity, headers, retryAfterSeconds };
  };
}
