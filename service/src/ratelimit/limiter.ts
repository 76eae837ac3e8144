import {
  DEFAULT_TIER_LIMITS,
  TierSchema,
  UNLIMITED,
  type RateLimitDecision,
  type Tier,
  type TierLimit,
  type UsageStats,
} from "@coinwire/shared";
import { createLogger, errorMessage } from "../utils/logger.js";
import type { CounterStore, WindowCount, WindowSpec } from "./counter-store.js";

const log = createLogger("rate-limiter");

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

export type RateLimiterOptions = {
  store: CounterStore;
  limits?: Partial<Record<Tier, TierLimit>>;
};

function minuteKey(identifier: string): string {
  return `ratelimit:minute:${identifier}`;
}

function dayKey(identifier: string): string {
  return `ratelimit:day:${identifier}`;
}

/** When the window next has room: the oldest entry ageing out, or a full window from now. */
function windowReset(count: WindowCount, windowMs: number, now: number): number {
  if (count.oldestMicros === undefined) return now + windowMs;
  return Math.ceil(count.oldestMicros / 1000) + windowMs;
}

type WindowView = { limit: number; remaining: number; resetAt: number; full: boolean };

/**
 * Sliding-window limiter with a per-minute and a per-day window per
 * identifier. A request is admitted only when both windows have room, and a
 * rejected request is not recorded. When the counter store fails the
 * request is let through.
 */
export class RateLimiter {
  private readonly store: CounterStore;
  private readonly tierLimits: Readonly<Record<Tier, TierLimit>>;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.tierLimits = Object.freeze({ ...DEFAULT_TIER_LIMITS, ...options.limits });
  }

  get limits(): Readonly<Record<Tier, TierLimit>> {
    return this.tierLimits;
  }

  /** Unknown tiers get the anonymous limits. */
  getLimitForTier(tier: string): TierLimit {
    const parsed = TierSchema.safeParse(tier);
    return this.tierLimits[parsed.success ? parsed.data : "anonymous"];
  }

  allow(identifier: string, tier: string): RateLimitDecision {
    const limit = this.getLimitForTier(tier);
    const now = Date.now();
    const windows: Array<WindowSpec & { windowMs: number }> = [
      { key: minuteKey(identifier), windowMs: MINUTE_MS, windowMicros: MINUTE_MS * 1000, limit: limit.perMinute },
    ];
    if (limit.perDay !== UNLIMITED) {
      windows.push({ key: dayKey(identifier), windowMs: DAY_MS, windowMicros: DAY_MS * 1000, limit: limit.perDay });
    }

    let admitted: boolean;
    let counts: WindowCount[];
    try {
      ({ admitted, windows: counts } = this.store.admit(windows, now * 1000));
    } catch (err) {
      log.warn("rate_limit_store_unavailable", { identifier, tier, error: errorMessage(err) });
      return {
        allowed: true,
        limit: limit.perMinute,
        remaining: limit.perMinute,
        resetAt: now + MINUTE_MS,
        failOpen: true,
      };
    }

    const views: WindowView[] = windows.map((w, i) => {
      const c = counts[i] ?? { count: 0, oldestMicros: undefined };
      return {
        limit: w.limit,
        remaining: Math.max(0, w.limit - c.count),
        resetAt: windowReset(c, w.windowMs, now),
        full: c.count >= w.limit,
      };
    });

    const binding = admitted ? tightest(views) : latestFull(views);
    if (!admitted) {
      log.debug("Rate limited", { identifier, tier });
    }
    return {
      allowed: admitted,
      limit: binding?.limit ?? limit.perMinute,
      remaining: admitted ? (binding?.remaining ?? 0) : 0,
      resetAt: binding?.resetAt ?? now + MINUTE_MS,
      failOpen: false,
    };
  }

  /** Current usage without recording a request. Store failures propagate. */
  getUsageStats(identifier: string, tier: string): UsageStats {
    const parsedTier = TierSchema.safeParse(tier);
    const limit = this.getLimitForTier(tier);
    const now = Date.now();
    const nowMicros = now * 1000;

    const minute = this.store.count(minuteKey(identifier), nowMicros - MINUTE_MS * 1000);
    const day = this.store.count(dayKey(identifier), nowMicros - DAY_MS * 1000);
    const unlimitedDay = limit.perDay === UNLIMITED;

    return {
      tier: parsedTier.success ? parsedTier.data : "anonymous",
      requestsThisMinute: minute.count,
      requestsToday: day.count,
      remainingThisMinute: Math.max(0, limit.perMinute - minute.count),
      remainingToday: unlimitedDay ? UNLIMITED : Math.max(0, limit.perDay - day.count),
      limitPerMinute: limit.perMinute,
      limitPerDay: limit.perDay,
      resetMinute: windowReset(minute, MINUTE_MS, now),
      resetDay: windowReset(day, DAY_MS, now),
    };
  }

  resetLimit(identifier: string): void {
    this.store.reset([minuteKey(identifier), dayKey(identifier)]);
  }
}

function tightest(views: WindowView[]): WindowView | undefined {
  let best: WindowView | undefined;
  for (const v of views) {
    if (!best || v.remaining < best.remaining) best = v;
  }
  return best;
}

/** Every full window has to drain before the next request gets in. */
function latestFull(views: WindowView[]): WindowView | undefined {
  let latest: WindowView | undefined;
  for (const v of views) {
    if (v.full && (!latest || v.resetAt > latest.resetAt)) latest = v;
  }
  return latest;
}
