import {
  emptyFetchResult,
  isHealthy,
  markForTranslation,
  needsTranslation,
  newArticle,
  type Article,
  type FetchableSource,
  type FetchError,
  type FetchJobResult,
  type FetchResult,
  type FetchStats,
} from "@coinwire/shared";
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_TITLE_LENGTH,
  sanitizeForDb,
} from "../enrichment/cleaner.js";
import type { Enricher } from "../enrichment/enricher.js";
import type { FeedReader } from "../feeds/feed-reader.js";
import type { ArticleRepository } from "../storage/article-repository.js";
import type { SourceRepository } from "../storage/source-repository.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { calculateStats, collectArticles, deduplicateArticles, DEFAULT_BATCH_SIZE, processInBatches } from "./batch.js";
import { FetchCancelledError } from "./errors.js";
import { WorkerPool } from "./worker-pool.js";

const log = createLogger("fetcher");

const LOGGED_ERRORS = 5;

export type SourceStore = Pick<
  SourceRepository,
  "listEnabled" | "incrementErrorCount" | "resetErrorCount" | "updateLastFetch"
>;

export type ArticleSink = Pick<ArticleRepository, "bulkInsert">;

export type FeedFetcherOptions = {
  sources: SourceStore;
  articles: ArticleSink;
  reader: FeedReader;
  enricher: Enricher;
  pool?: WorkerPool;
  workers?: number;
  timeoutMs: number;
  maxArticleAgeMs: number;
  /** Articles from sources in another language are queued for translation into this one. */
  targetLanguage?: string;
  insertBatchSize?: number;
  maxRetries?: number;
  backoffStepMs?: number;
};

export class FeedFetcher {
  private readonly options: FeedFetcherOptions;
  private readonly pool: WorkerPool;
  private _lastStats: FetchStats | null = null;

  constructor(options: FeedFetcherOptions) {
    this.options = options;
    this.pool = options.pool ?? new WorkerPool(options.workers);
  }

  get lastStats(): FetchStats | null {
    return this._lastStats;
  }

  /** One full cycle over every enabled, healthy source. Only failing to list sources rejects. */
  async fetchAll(signal?: AbortSignal): Promise<FetchResult> {
    const start = Date.now();
    const enabled = this.options.sources.listEnabled();
    if (enabled.length === 0) {
      log.info("No enabled sources");
      return { ...emptyFetchResult(), durationMs: Date.now() - start };
    }

    const healthy = enabled.filter((s) => isHealthy(s));
    const skipped = enabled.length - healthy.length;
    if (skipped > 0) {
      log.warn("Skipping unhealthy sources", {
        skipped,
        keys: enabled.filter((s) => !isHealthy(s)).map((s) => s.key),
      });
    }

    log.info("Fetch cycle started", { sources: healthy.length });
    const results = await this.pool.processJobs(
      healthy.map((source) => ({ source, run: (sig: AbortSignal) => this.fetchSource(source, sig) })),
      {
        timeoutMs: this.options.timeoutMs,
        signal,
        maxRetries: this.options.maxRetries,
        backoffStepMs: this.options.backoffStepMs,
      },
    );

    const { articles, failures } = collectArticles(results);
    const unique = deduplicateArticles(articles);
    const newArticles = await this.insert(unique);
    this.updateSourceHealth(results);

    const errors: FetchError[] = failures.map((f) => ({
      sourceId: f.sourceId,
      sourceKey: f.sourceKey,
      message: f.error?.message ?? "unknown error",
    }));

    const result: FetchResult = {
      totalSources: healthy.length,
      successfulFeeds: results.length - failures.length,
      failedFeeds: failures.length,
      totalArticles: articles.length,
      newArticles,
      durationMs: Date.now() - start,
      errors,
    };
    this._lastStats = calculateStats(results, newArticles);

    log.info("Fetch cycle complete", {
      successful: result.successfulFeeds,
      failed: result.failedFeeds,
      articles: result.totalArticles,
      duplicates: articles.length - unique.length,
      inserted: newArticles,
      durationMs: result.durationMs,
    });
    for (const e of errors.slice(0, LOGGED_ERRORS)) {
      log.warn("Source failed", { source: e.sourceKey, error: e.message });
    }
    if (errors.length > LOGGED_ERRORS) {
      log.warn(`... and ${errors.length - LOGGED_ERRORS} more failed sources`);
    }
    return result;
  }

  /** Fetches one feed and turns its fresh items into enriched articles. */
  async fetchSource(source: FetchableSource, signal?: AbortSignal): Promise<Article[]> {
    const items = await this.options.reader.fetchAndParse(source.url, { signal });
    const now = Date.now();
    const cutoff = now - this.options.maxArticleAgeMs;
    const translate = needsTranslation(source.language, this.options.targetLanguage);

    const articles: Article[] = [];
    for (const item of items) {
      if (item.pubDate < cutoff) continue;
      const article = newArticle(
        {
          sourceId: source.id,
          guid: item.guid,
          title: sanitizeForDb(item.title, MAX_TITLE_LENGTH),
          link: item.link,
          description: sanitizeForDb(item.description, MAX_DESCRIPTION_LENGTH),
          pubDate: item.pubDate,
          categories: item.categories.map((c) => c.toLowerCase()),
        },
        now,
      );
      if (translate) markForTranslation(article, source.language);
      this.options.enricher.enrichArticle(article, source.category, now);
      articles.push(article);
    }
    return articles;
  }

  private async insert(articles: Article[]): Promise<number> {
    const outcomes = await processInBatches(
      articles,
      this.options.insertBatchSize ?? DEFAULT_BATCH_SIZE,
      (batch) => this.options.articles.bulkInsert(batch),
    );
    let inserted = 0;
    for (const o of outcomes) {
      if (o.ok) {
        inserted += o.value;
      } else {
        log.error("Article batch insert failed", { start: o.start, size: o.size, error: o.error.message });
      }
    }
    return inserted;
  }

  private updateSourceHealth(results: FetchJobResult[]): void {
    const now = Date.now();
    for (const r of results) {
      // A cancelled cycle says nothing about the source.
      if (r.error instanceof FetchCancelledError) continue;
      if (r.error) {
        this.tryHealthUpdate(r.sourceKey, "incrementErrorCount", () =>
          this.options.sources.incrementErrorCount(r.sourceId),
        );
        continue;
      }
      this.tryHealthUpdate(r.sourceKey, "resetErrorCount", () => this.options.sources.resetErrorCount(r.sourceId));
      this.tryHealthUpdate(r.sourceKey, "updateLastFetch", () =>
        this.options.sources.updateLastFetch(r.sourceId, now),
      );
    }
  }

  private tryHealthUpdate(sourceKey: string, step: string, update: () => void): void {
    try {
      update();
    } catch (err) {
      log.warn("Source health update failed", { source: sourceKey, step, error: errorMessage(err) });
    }
  }
}
