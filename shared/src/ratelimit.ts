import { z } from "zod";

export const TierSchema = z.enum(["anonymous", "free", "pro", "enterprise"]);

export type Tier = z.infer<typeof TierSchema>;

/** Sentinel for a window without a cap. */
export const UNLIMITED = -1;

export const TierLimitSchema = z.object({
  perMinute: z.number().int().positive(),
  perDay: z.number().int().refine((n) => n === UNLIMITED || n > 0, {
    message: "perDay must be positive or -1 for unlimited",
  }),
});

export type TierLimit = z.infer<typeof TierLimitSchema>;

export const DEFAULT_TIER_LIMITS: Readonly<Record<Tier, TierLimit>> = {
  anonymous: { perMinute: 5, perDay: 100 },
  free: { perMinute: 10, perDay: 500 },
  pro: { perMinute: 60, perDay: 10_000 },
  enterprise: { perMinute: 300, perDay: UNLIMITED },
};

export type RateLimitDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms at which the binding window has room again. */
  resetAt: number;
  /** True when the counter store failed and the request was let through unchecked. */
  failOpen: boolean;
};

export type UsageStats = {
  tier: Tier;
  requestsThisMinute: number;
  requestsToday: number;
  remainingThisMinute: number;
  /** -1 when the tier has no daily cap. */
  remainingToday: number;
  limitPerMinute: number;
  limitPerDay: number;
  resetMinute: number;
  resetDay: number;
};
