import type Database from "better-sqlite3";
import { createLogger, errorMessage } from "../utils/logger.js";

const log = createLogger("counter-store");

/** Rows outlive their window by this much before the sweep may drop them. */
const EXPIRY_SLACK_MICROS = 1_000_000;

export type WindowSpec = {
  key: string;
  windowMicros: number;
  limit: number;
};

export type WindowCount = {
  count: number;
  /** Oldest timestamp still inside the window, if any. */
  oldestMicros: number | undefined;
};

export type AdmitResult = {
  admitted: boolean;
  /** Per window, in the order given; includes the new request when admitted. */
  windows: WindowCount[];
};

/**
 * Timestamp log behind the sliding-window limiter. `admit` must purge,
 * count and conditionally record across every window as one atomic step,
 * and records nothing when any window is full.
 */
export interface CounterStore {
  admit(windows: WindowSpec[], nowMicros: number): AdmitResult;
  count(key: string, windowStartMicros: number): WindowCount;
  reset(keys: string[]): void;
  purgeExpired(nowMicros: number): number;
}

export class CounterStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CounterStoreError";
  }
}

type CountRow = { count: number; oldest: number | null };

export class SqliteCounterStore implements CounterStore {
  private readonly db: Database.Database;
  private lastMicros = 0;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS rate_limit_events (
        key TEXT NOT NULL,
        ts_micros INTEGER NOT NULL,
        expires_at_micros INTEGER NOT NULL,
        PRIMARY KEY (key, ts_micros)
      ) WITHOUT ROWID;
      CREATE INDEX IF NOT EXISTS idx_rate_limit_expiry ON rate_limit_events(expires_at_micros);
    `);
  }

  admit(windows: WindowSpec[], nowMicros: number): AdmitResult {
    try {
      return this.admitInTransaction(windows, this.nextTimestamp(nowMicros));
    } catch (err) {
      throw new CounterStoreError(`Rate limit admit failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private admitInTransaction(windows: WindowSpec[], ts: number): AdmitResult {
    const purge = this.db.prepare("DELETE FROM rate_limit_events WHERE key = ? AND ts_micros <= ?");
    const countStmt = this.db.prepare<[string], CountRow>(
      "SELECT COUNT(*) AS count, MIN(ts_micros) AS oldest FROM rate_limit_events WHERE key = ?",
    );
    const insert = this.db.prepare(
      "INSERT INTO rate_limit_events (key, ts_micros, expires_at_micros) VALUES (?, ?, ?)",
    );

    const run = this.db.transaction((): AdmitResult => {
      const counts: WindowCount[] = windows.map((w) => {
        purge.run(w.key, ts - w.windowMicros);
        const row = countStmt.get(w.key);
        return { count: row?.count ?? 0, oldestMicros: row?.oldest ?? undefined };
      });

      const full = windows.some((w, i) => (counts[i]?.count ?? 0) >= w.limit);
      if (full) return { admitted: false, windows: counts };

      return {
        admitted: true,
        windows: windows.map((w, i) => {
          insert.run(w.key, ts, ts + w.windowMicros + EXPIRY_SLACK_MICROS);
          const c = counts[i] ?? { count: 0, oldestMicros: undefined };
          return { count: c.count + 1, oldestMicros: c.oldestMicros ?? ts };
        }),
      };
    });
    return run();
  }

  count(key: string, windowStartMicros: number): WindowCount {
    try {
      const row = this.db
        .prepare<[string, number], CountRow>(
          "SELECT COUNT(*) AS count, MIN(ts_micros) AS oldest FROM rate_limit_events WHERE key = ? AND ts_micros > ?",
        )
        .get(key, windowStartMicros);
      return { count: row?.count ?? 0, oldestMicros: row?.oldest ?? undefined };
    } catch (err) {
      throw new CounterStoreError(`Rate limit count failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  reset(keys: string[]): void {
    try {
      const del = this.db.prepare("DELETE FROM rate_limit_events WHERE key = ?");
      const run = this.db.transaction((all: string[]) => {
        for (const key of all) del.run(key);
      });
      run(keys);
    } catch (err) {
      throw new CounterStoreError(`Rate limit reset failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  purgeExpired(nowMicros: number): number {
    return this.db.prepare("DELETE FROM rate_limit_events WHERE expires_at_micros <= ?").run(nowMicros).changes;
  }

  /** Periodically drops expired rows so idle identifiers do not linger. */
  startSweep(intervalMs: number): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      try {
        const removed = this.purgeExpired(Date.now() * 1000);
        if (removed > 0) log.debug("Swept expired rate limit rows", { removed });
      } catch (err) {
        log.warn("Rate limit sweep failed", { error: errorMessage(err) });
      }
    }, intervalMs);
    if (typeof this.sweeper === "object" && "unref" in this.sweeper) {
      this.sweeper.unref();
    }
  }

  stopSweep(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  /** Strictly increasing, so a burst inside one millisecond still gets distinct timestamps. */
  private nextTimestamp(nowMicros: number): number {
    this.lastMicros = nowMicros > this.lastMicros ? nowMicros : this.lastMicros + 1;
    return this.lastMicros;
  }
}
