import type { StoredArticle, TranslationWorkerStats } from "@coinwire/shared";
import { sleep } from "../fetcher/errors.js";
import type { ArticleRepository } from "../storage/article-repository.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { extractRetryAfterMs } from "./retry-after.js";
import type { TranslatorService } from "./translator.js";

const log = createLogger("translation-worker");

export type TranslationStore = Pick<ArticleRepository, "getPendingTranslations" | "updateTranslation">;

export type TranslationWorkerOptions = {
  translator: Pick<TranslatorService, "translateArticle">;
  articles: TranslationStore;
  intervalMs?: number;
  batchSize?: number;
  /** Pause after each article. */
  pacingMs?: number;
};

export type BatchReport = {
  translated: number;
  failed: number;
  /** Set when the batch was skipped because of an active rate-limit backoff. */
  skipped: boolean;
};

const DEFAULT_INTERVAL_MS = 30_000;
const DEFAULT_BATCH_SIZE = 5;
const DEFAULT_PACING_MS = 500;

/**
 * Translates queued articles in small paced batches. A rate-limit error puts
 * the worker into backoff until the provider's retry-after has passed; ticks
 * inside the backoff do nothing.
 */
export class TranslationWorker {
  private readonly translator: TranslationWorkerOptions["translator"];
  private readonly articles: TranslationStore;
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly pacingMs: number;

  private running = false;
  private stopController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private backoffUntil: number | undefined;
  private translated = 0;
  private failed = 0;
  private batches = 0;

  constructor(options: TranslationWorkerOptions) {
    this.translator = options.translator;
    this.articles = options.articles;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
  }

  get stats(): TranslationWorkerStats {
    return {
      running: this.running,
      translated: this.translated,
      failed: this.failed,
      batches: this.batches,
      backoffUntil: this.backoffUntil,
    };
  }

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

    log.info("Starting", { intervalMs: this.intervalMs, batchSize: this.batchSize });
    this.loop = this.run(wake);
    return this.loop;
  }

  /** Cancels any in-flight translation and waits for the loop to exit. */
  async stop(): Promise<void> {
    if (!this.running || !this.stopController || !this.loop) return;
    log.info("Stopping");
    this.stopController.abort();
    await this.loop;
    log.info("Stopped");
  }

  async processBatch(signal?: AbortSignal): Promise<BatchReport> {
    const report: BatchReport = { translated: 0, failed: 0, skipped: false };

    if (this.backoffUntil !== undefined) {
      const remainingMs = this.backoffUntil - Date.now();
      if (remainingMs > 0) {
        log.debug("Rate limited, skipping batch", { remainingMs });
        return { ...report, skipped: true };
      }
      log.info("Rate limit backoff ended, resuming translations");
      this.backoffUntil = undefined;
    }

    let pending: StoredArticle[];
    try {
      pending = this.articles.getPendingTranslations(this.batchSize);
    } catch (err) {
      log.error("Failed to load pending translations", { error: errorMessage(err) });
      return report;
    }
    if (pending.length === 0) return report;

    this.batches++;
    log.info("Processing translations", { count: pending.length });

    for (const [index, article] of pending.entries()) {
      if (signal?.aborted) break;

      try {
        const result = await this.translator.translateArticle(
          article.originalTitle ?? article.title,
          article.originalDescription ?? article.description,
          article.originalLanguage ?? "",
          signal,
        );
        this.articles.updateTranslation(article.id, result.title, result.description, "completed");
        report.translated++;
      } catch (err) {
        // Being stopped mid-request says nothing about the article.
        if (signal?.aborted) break;

        report.failed++;
        log.warn("Translation failed", { articleId: article.id, error: errorMessage(err) });
        this.markFailed(article);

        const delayMs = extractRetryAfterMs(err);
        if (delayMs > 0) {
          this.backoffUntil = Date.now() + delayMs;
          log.warn("Rate limit hit, backing off", { delayMs });
          break;
        }
      }

      if (index === pending.length - 1) break;
      try {
        await sleep(this.pacingMs, signal);
      } catch {
        break;
      }
    }

    this.translated += report.translated;
    this.failed += report.failed;
    if (report.translated > 0 || report.failed > 0) {
      log.info("Batch complete", { translated: report.translated, failed: report.failed });
    }
    return report;
  }

  private markFailed(article: StoredArticle): void {
    try {
      this.articles.updateTranslation(article.id, article.title, article.description, "failed");
    } catch (err) {
      log.error("Failed to mark translation failed", { articleId: article.id, error: errorMessage(err) });
    }
  }

  private async run(wake: AbortSignal): Promise<void> {
    try {
      while (!wake.aborted) {
        const startedAt = Date.now();
        await this.processBatch(wake);
        if (wake.aborted) break;

        try {
          await sleep(Math.max(0, this.intervalMs - (Date.now() - startedAt)), wake);
        } catch {
          break;
        }
      }
    } finally {
      this.running = false;
      log.info("Loop exited");
    }
  }
}
