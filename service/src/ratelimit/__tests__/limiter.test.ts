import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { setLogHandler, type LogEntry } from "../../utils/logger.js";
import { CounterStoreError, SqliteCounterStore, type CounterStore } from "../counter-store.js";
import { DAY_MS, MINUTE_MS, RateLimiter } from "../limiter.js";

const NOW = Date.UTC(2025, 0, 15, 12, 0, 0);

class BrokenStore implements CounterStore {
  admit(): never {
    throw new CounterStoreError("database is locked");
  }
  count(): never {
    throw new CounterStoreError("database is locked");
  }
  reset(): void {}
  purgeExpired(): number {
    return 0;
  }
}

describe("RateLimiter", () => {
  let db: Database.Database;
  let limiter: RateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    db = new Database(":memory:");
    limiter = new RateLimiter({ store: new SqliteCounterStore(db) });
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  it("admits five in a burst, rejects the sixth, and admits again once the window slides", () => {
    const outcomes = Array.from({ length: 6 }, () => limiter.allow("ip:10.0.0.1", "anonymous").allowed);
    expect(outcomes).toEqual([true, true, true, true, true, false]);

    vi.setSystemTime(NOW + MINUTE_MS - 1);
    expect(limiter.allow("ip:10.0.0.1", "anonymous").allowed).toBe(false);

    vi.setSystemTime(NOW + MINUTE_MS + 1);
    expect(limiter.allow("ip:10.0.0.1", "anonymous").allowed).toBe(true);
  });

  it("reports the minute window while it is the tighter one", () => {
    expect(limiter.allow("ip:10.0.0.1", "anonymous")).toEqual({
      allowed: true,
      limit: 5,
      remaining: 4,
      resetAt: NOW + MINUTE_MS,
      failOpen: false,
    });
  });

  it("reports when a rejected caller gets room again", () => {
    for (let i = 0; i < 5; i++) {
      vi.setSystemTime(NOW + i * 1_000);
      limiter.allow("ip:10.0.0.1", "anonymous");
    }
    expect(limiter.allow("ip:10.0.0.1", "anonymous")).toEqual({
      allowed: false,
      limit: 5,
      remaining: 0,
      resetAt: NOW + MINUTE_MS,
      failOpen: false,
    });
  });

  it("does not record rejected requests", () => {
    for (let i = 0; i < 8; i++) limiter.allow("ip:10.0.0.1", "anonymous");

    const usage = limiter.getUsageStats("ip:10.0.0.1", "anonymous");
    expect(usage.requestsThisMinute).toBe(5);
    expect(usage.requestsToday).toBe(5);
  });

  it("enforces the day window independently of the minute window", () => {
    limiter = new RateLimiter({
      store: new SqliteCounterStore(db),
      limits: { free: { perMinute: 100, perDay: 3 } },
    });
    for (let i = 0; i < 3; i++) expect(limiter.allow("key:test-key", "free").allowed).toBe(true);

    expect(limiter.allow("key:test-key", "free")).toEqual({
      allowed: false,
      limit: 3,
      remaining: 0,
      resetAt: NOW + DAY_MS,
      failOpen: false,
    });

    vi.setSystemTime(NOW + 2 * MINUTE_MS);
    expect(limiter.allow("key:test-key", "free").allowed).toBe(false);
    expect(limiter.getUsageStats("key:test-key", "free").requestsThisMinute).toBe(0);
  });

  it("skips the day window for an unlimited tier", () => {
    limiter.allow("key:test-key", "enterprise");

    expect(limiter.getUsageStats("key:test-key", "enterprise")).toEqual({
      tier: "enterprise",
      requestsThisMinute: 1,
      requestsToday: 0,
      remainingThisMinute: 299,
      remainingToday: -1,
      limitPerMinute: 300,
      limitPerDay: -1,
      resetMinute: NOW + MINUTE_MS,
      resetDay: NOW + DAY_MS,
    });
  });

  it("reports usage across both windows", () => {
    limiter.allow("ip:10.0.0.2", "anonymous");
    limiter.allow("ip:10.0.0.2", "anonymous");
    vi.setSystemTime(NOW + 30_000);
    limiter.allow("ip:10.0.0.2", "anonymous");

    expect(limiter.getUsageStats("ip:10.0.0.2", "anonymous")).toEqual({
      tier: "anonymous",
      requestsThisMinute: 3,
      requestsToday: 3,
      remainingThisMinute: 2,
      remainingToday: 97,
      limitPerMinute: 5,
      limitPerDay: 100,
      resetMinute: NOW + MINUTE_MS,
      resetDay: NOW + DAY_MS,
    });
  });

  it("keeps identifiers apart", () => {
    for (let i = 0; i < 5; i++) limiter.allow("ip:10.0.0.1", "anonymous");
    expect(limiter.allow("ip:10.0.0.1", "anonymous").allowed).toBe(false);
    expect(limiter.allow("ip:10.0.0.3", "anonymous").allowed).toBe(true);
  });

  it("resetLimit clears both windows", () => {
    for (let i = 0; i < 5; i++) limiter.allow("ip:10.0.0.1", "anonymous");
    limiter.resetLimit("ip:10.0.0.1");

    expect(limiter.getUsageStats("ip:10.0.0.1", "anonymous").requestsToday).toBe(0);
    expect(limiter.allow("ip:10.0.0.1", "anonymous").allowed).toBe(true);
  });

  it("falls back to anonymous limits for an unknown tier", () => {
    expect(limiter.getLimitForTier("platinum")).toEqual({ perMinute: 5, perDay: 100 });
    expect(limiter.getLimitForTier("pro")).toEqual({ perMinute: 60, perDay: 10_000 });
    expect(limiter.getUsageStats("ip:10.0.0.1", "platinum").tier).toBe("anonymous");
  });

  it("merges configured limits over the defaults", () => {
    limiter = new RateLimiter({
      store: new SqliteCounterStore(db),
      limits: { pro: { perMinute: 120, perDay: 20_000 } },
    });
    expect(limiter.limits.pro).toEqual({ perMinute: 120, perDay: 20_000 });
    expect(limiter.limits.free).toEqual({ perMinute: 10, perDay: 500 });
  });

  it("fails open and logs when the store is unavailable", () => {
    const logs: LogEntry[] = [];
    setLogHandler((entry) => logs.push(entry));
    limiter = new RateLimiter({ store: new BrokenStore() });

    expect(limiter.allow("ip:10.0.0.1", "anonymous")).toEqual({
      allowed: true,
      limit: 5,
      remaining: 5,
      resetAt: NOW + MINUTE_MS,
      failOpen: true,
    });
    expect(logs).toContainEqual(
      expect.objectContaining({
        level: "warn",
        message: "rate_limit_store_unavailable",
        data: { identifier: "ip:10.0.0.1", tier: "anonymous", error: "database is locked" },
      }),
    );
  });
});
