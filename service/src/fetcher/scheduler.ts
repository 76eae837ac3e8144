import { EventEmitter } from "node:events";
import type { FetchResult, SchedulerStats } from "@coinwire/shared";
import { createLogger } from "../utils/logger.js";
import { sleep, toError } from "./errors.js";
import type { FeedFetcher } from "./feed-fetcher.js";

const log = createLogger("scheduler");

export type FetchSchedulerOptions = {
  intervalMs?: number;
  stopGraceMs?: number;
};

const DEFAULT_INTERVAL_MS = 3 * 60_000;
const DEFAULT_STOP_GRACE_MS = 30_000;

/**
 * Drives FeedFetcher.fetchAll on a fixed interval, starting immediately.
 * Cycles never overlap: a cycle that overruns the interval makes the next
 * one start late. Emits "cycle" with each FetchResult and "error" when a
 * cycle fails outright (only if someone listens).
 */
export class FetchScheduler extends EventEmitter {
  private readonly fetcher: Pick<FeedFetcher, "fetchAll">;
  private intervalMs: number;
  private readonly stopGraceMs: number;
  private running = false;
  private stopController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private nextFetchAt: number | undefined;
  private lastFetchAt: number | undefined;
  private lastResult: FetchResult | null = null;
  private fetchCount = 0;
  private errorCount = 0;

  constructor(fetcher: Pick<FeedFetcher, "fetchAll">, options: FetchSchedulerOptions = {}) {
    super();
    this.fetcher = fetcher;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Resolves once the loop exits, after stop() or when the parent signal aborts. */
  start(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      log.warn("Already running");
      return Promise.resolve();
    }
    this.running = true;
    this.stopController = new AbortController();
    const wake = signal
      ? AbortSignal.any([signal, this.stopController.signal])
      : this.stopController.signal;

    log.info("Starting", { intervalMs: this.intervalMs });
    this.loop = this.run(wake, signal);
    return this.loop;
  }

  /** Signals the loop and waits for it to exit, giving up after the grace period. */
  async stop(): Promise<void> {
    if (!this.running || !this.stopController || !this.loop) return;
    log.info("Stopping");
    this.stopController.abort();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      this.loop.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), this.stopGraceMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      log.warn("Stop timed out", { graceMs: this.stopGraceMs });
    } else {
      log.info("Stopped");
    }
  }

  /** A manual cycle outside the loop. Not counted in stats. */
  runOnce(signal?: AbortSignal): Promise<FetchResult> {
    return this.fetcher.fetchAll(signal);
  }

  /** Takes effect from the next wait. */
  setInterval(intervalMs: number): void {
    this.intervalMs = intervalMs;
    log.info("Interval updated", { intervalMs });
  }

  nextFetchInMs(now: number = Date.now()): number {
    if (!this.running || this.nextFetchAt === undefined) return 0;
    return Math.max(0, this.nextFetchAt - now);
  }

  get stats(): SchedulerStats {
    return {
      running: this.running,
      intervalMs: this.intervalMs,
      lastFetchAt: this.lastFetchAt,
      fetchCount: this.fetchCount,
      errorCount: this.errorCount,
      lastSuccessfulFeeds: this.lastResult?.successfulFeeds ?? 0,
      lastFailedFeeds: this.lastResult?.failedFeeds ?? 0,
      lastNewArticles: this.lastResult?.newArticles ?? 0,
      lastDurationMs: this.lastResult?.durationMs ?? 0,
    };
  }

  private async run(wake: AbortSignal, parent?: AbortSignal): Promise<void> {
    try {
      while (!wake.aborted) {
        const startedAt = Date.now();
        await this.cycle(parent);
        if (wake.aborted) break;

        const wait = Math.max(0, this.intervalMs - (Date.now() - startedAt));
        this.nextFetchAt = Date.now() + wait;
        try {
          await sleep(wait, wake);
        } catch {
          break;
        }
      }
    } finally {
      this.running = false;
      this.nextFetchAt = undefined;
      log.info(parent?.aborted ? "Parent cancelled, loop exited" : "Loop exited");
    }
  }

  private async cycle(signal?: AbortSignal): Promise<void> {
    log.info("Starting fetch cycle");
    this.lastFetchAt = Date.now();
    this.fetchCount++;
    try {
      const result = await this.fetcher.fetchAll(signal);
      this.lastResult = result;
      log.info("Fetch completed", {
        newArticles: result.newArticles,
        successfulFeeds: result.successfulFeeds,
        durationMs: result.durationMs,
      });
      this.emit("cycle", result);
    } catch (err) {
      this.errorCount++;
      const error = toError(err);
      log.error("Fetch failed", { error: error.message });
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
    }
  }
}
