import type { Article, FetchableSource, FetchJobResult } from "@coinwire/shared";
import { createLogger } from "../utils/logger.js";
import { FetchCancelledError, FetchTimeoutError, sleep, toError } from "./errors.js";
import { Semaphore } from "./semaphore.js";

const log = createLogger("worker-pool");

export type FetchJob = {
  source: FetchableSource;
  /** Fetches the source's articles. Must stop work when the signal aborts. */
  run: (signal: AbortSignal) => Promise<Article[]>;
};

export type ProcessJobsOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  maxRetries?: number;
  backoffStepMs?: number;
};

export const DEFAULT_WORKERS = 50;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BACKOFF_STEP_MS = 500;
const PROGRESS_EVERY = 25;

export class WorkerPool {
  private readonly gate: Semaphore;

  constructor(workers: number = DEFAULT_WORKERS) {
    this.gate = new Semaphore(workers > 0 ? workers : DEFAULT_WORKERS);
  }

  get capacity(): number {
    return this.gate.capacity;
  }

  get activeCount(): number {
    return this.gate.activeCount;
  }

  get queuedCount(): number {
    return this.gate.queuedCount;
  }

  /** Runs every job under the admission gate. Results line up with `jobs` by index. */
  async processJobs(jobs: FetchJob[], options: ProcessJobsOptions): Promise<FetchJobResult[]> {
    const total = jobs.length;
    let completed = 0;

    return Promise.all(
      jobs.map(async (job) => {
        let release: () => void;
        try {
          release = await this.gate.acquire(options.signal);
        } catch (err) {
          return this.failure(job, toError(err), 0, 0);
        }

        try {
          return await this.executeJob(job, options);
        } finally {
          release();
          completed++;
          if (completed % PROGRESS_EVERY === 0 || completed === total) {
            log.info("Progress", { completed, total });
          }
        }
      }),
    );
  }

  private async executeJob(job: FetchJob, options: ProcessJobsOptions): Promise<FetchJobResult> {
    const start = Date.now();
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    const step = options.backoffStepMs ?? DEFAULT_BACKOFF_STEP_MS;
    let lastError: Error = new FetchCancelledError(`Fetch of ${job.source.key}`);
    let retryCount = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        try {
          await sleep(attempt * step, options.signal);
        } catch (err) {
          return this.failure(job, toError(err), Date.now() - start, retryCount);
        }
      }
      if (options.signal?.aborted) {
        lastError = new FetchCancelledError(`Fetch of ${job.source.key}`);
        break;
      }

      retryCount = attempt;
      try {
        const articles = await this.runAttempt(job, options.timeoutMs, options.signal);
        return {
          sourceId: job.source.id,
          sourceKey: job.source.key,
          articles,
          fetchTimeMs: Date.now() - start,
          retryCount: attempt,
        };
      } catch (err) {
        lastError = toError(err);
        log.debug("Attempt failed", { source: job.source.key, attempt, error: lastError.message });
        if (options.signal?.aborted) break;
      }
    }

    return this.failure(job, lastError, Date.now() - start, retryCount);
  }

  /** One attempt under its own deadline; settles on the first of result, timeout or cancel. */
  private runAttempt(job: FetchJob, timeoutMs: number, parent?: AbortSignal): Promise<Article[]> {
    return new Promise<Article[]>((resolve, reject) => {
      const controller = new AbortController();
      let settled = false;

      const cleanup = (): void => {
        settled = true;
        clearTimeout(timer);
        parent?.removeEventListener("abort", onParentAbort);
      };
      const fail = (err: Error): void => {
        if (settled) return;
        cleanup();
        controller.abort(err);
        reject(err);
      };
      const onParentAbort = (): void => fail(new FetchCancelledError(`Fetch of ${job.source.key}`));

      const timer = setTimeout(() => {
        fail(new FetchTimeoutError(job.source.key, timeoutMs));
      }, timeoutMs);
      if (typeof timer === "object" && "unref" in timer) {
        timer.unref();
      }
      parent?.addEventListener("abort", onParentAbort, { once: true });

      Promise.resolve()
        .then(() => job.run(controller.signal))
        .then(
          (articles) => {
            if (settled) return;
            cleanup();
            resolve(articles);
          },
          (err: unknown) => fail(toError(err)),
        );
    });
  }

  private failure(job: FetchJob, error: Error, fetchTimeMs: number, retryCount: number): FetchJobResult {
    return {
      sourceId: job.source.id,
      sourceKey: job.source.key,
      articles: [],
      fetchTimeMs,
      error,
      retryCount,
    };
  }
}
