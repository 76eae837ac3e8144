import "dotenv/config";
import type Database from "better-sqlite3";
import type { Config } from "@coinwire/shared";
import { startApiServer, type ApiServer } from "./api/server.js";
import { loadConfig } from "./config/env.js";
import { Enricher } from "./enrichment/enricher.js";
import { RssFeedReader } from "./feeds/feed-reader.js";
import { FeedFetcher } from "./fetcher/feed-fetcher.js";
import { FetchScheduler } from "./fetcher/scheduler.js";
import { createProviderChain } from "./providers/factory.js";
import { SqliteCounterStore } from "./ratelimit/counter-store.js";
import { RateLimiter } from "./ratelimit/limiter.js";
import { loadSourceCatalog, syncSources } from "./sources/catalog.js";
import { ArticleRepository } from "./storage/article-repository.js";
import { createNewsDb, createRateLimitDb } from "./storage/db.js";
import { SourceRepository } from "./storage/source-repository.js";
import { TranslationWorker } from "./translation/translation-worker.js";
import { TranslatorService } from "./translation/translator.js";
import { createLogger, errorMessage, setLogLevel } from "./utils/logger.js";

const log = createLogger("main");

export type RunningService = {
  api: ApiServer | null;
  scheduler: FetchScheduler | null;
  translation: TranslationWorker | null;
  stop: () => Promise<void>;
};

type Loops = { scheduler: FetchScheduler | null; translation: TranslationWorker | null };

function startLoops(config: Config, sources: SourceRepository, articles: ArticleRepository): Loops {
  const provider = config.translation.enabled ? createProviderChain(config.llm.providers) : null;
  if (config.translation.enabled && !provider) {
    log.warn("Translation enabled but no LLM provider configured");
  }

  const fetcher = new FeedFetcher({
    sources,
    articles,
    reader: new RssFeedReader(),
    enricher: new Enricher(),
    workers: config.fetcher.workers,
    timeoutMs: config.fetcher.timeoutMs,
    maxArticleAgeMs: config.fetcher.maxArticleAgeMs,
    insertBatchSize: config.fetcher.insertBatchSize,
    targetLanguage: provider ? config.translation.targetLanguage : undefined,
  });
  const scheduler = new FetchScheduler(fetcher, {
    intervalMs: config.scheduler.intervalMs,
    stopGraceMs: config.scheduler.stopGraceMs,
  });
  scheduler.start().catch((err: unknown) => log.error("Fetch loop crashed", { error: errorMessage(err) }));

  if (!provider) return { scheduler, translation: null };

  const translation = new TranslationWorker({
    translator: new TranslatorService({
      provider,
      model: config.translation.model,
      targetLanguage: config.translation.targetLanguage,
    }),
    articles,
    intervalMs: config.translation.intervalMs,
    batchSize: config.translation.batchSize,
    pacingMs: config.translation.pacingMs,
  });
  translation.start().catch((err: unknown) => log.error("Translation loop crashed", { error: errorMessage(err) }));
  return { scheduler, translation };
}

/**
 * Wires storage to the background loops and the HTTP API
 * according to `config.mode`. The returned stop() shuts them down in that order.
 */
export async function startService(config: Config): Promise<RunningService> {
  const newsDb = createNewsDb(config.database.path);
  const sources = new SourceRepository(newsDb);
  const articles = new ArticleRepository(newsDb);
  syncSources(loadSourceCatalog(config.fetcher.sourcesFile), sources);

  const { scheduler, translation }: Loops =
    config.mode === "api" ? { scheduler: null, translation: null } : startLoops(config, sources, articles);

  let api: ApiServer | null = null;
  let store: SqliteCounterStore | null = null;
  let limitDb: Database.Database | null = null;

  if (config.mode !== "fetcher") {
    let limiter: RateLimiter | null = null;
    if (config.rateLimit.enabled) {
      limitDb = config.database.rateLimitPath ? createRateLimitDb(config.database.rateLimitPath) : null;
      store = new SqliteCounterStore(limitDb ?? newsDb);
      store.startSweep(config.rateLimit.sweepIntervalMs);
      limiter = new RateLimiter({ store, limits: config.rateLimit.tiers });
    }

    api = await startApiServer({
      host: config.server.host,
      port: config.server.port,
      trustProxy: config.server.trustProxy,
      articles,
      sources,
      limiter,
      apiKeys: config.rateLimit.apiKeys,
      hideUntranslated: config.translation.enabled,
      getScheduler: scheduler ? () => scheduler.stats : undefined,
      getTranslation: translation ? () => translation.stats : undefined,
    });
  }

  log.info("Service started", {
    mode: config.mode,
    fetcher: scheduler !== null,
    translation: translation !== null,
    api: api?.port ?? null,
  });

  return {
    api,
    scheduler,
    translation,
    stop: async () => {
      await scheduler?.stop();
      await translation?.stop();
      await api?.close();
      store?.stopSweep();
      limitDb?.close();
      newsDb.close();
      log.info("Service stopped");
    },
  };
}

export async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logging.level);
  const service = await startService(config);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info("Shutting down", { signal });
    service.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// Start when run directly
const isMain =
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("index.js");
if (isMain) {
  main().catch((err: unknown) => {
    log.error("Startup failed", { error: errorMessage(err) });
    process.exitCode = 1;
  });
}
