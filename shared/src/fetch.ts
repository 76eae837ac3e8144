import type { Article } from "./news.js";

export type FetchJobResult = {
  sourceId: number;
  sourceKey: string;
  articles: Article[];
  fetchTimeMs: number;
  error?: Error;
  retryCount: number;
};

export type FetchError = {
  sourceId: number;
  sourceKey: string;
  message: string;
};

export type FetchResult = {
  totalSources: number;
  successfulFeeds: number;
  failedFeeds: number;
  totalArticles: number;
  newArticles: number;
  durationMs: number;
  errors: FetchError[];
};

export type FetchStats = {
  totalSources: number;
  successfulFetches: number;
  failedFetches: number;
  totalArticles: number;
  newArticles: number;
  totalFetchTimeMs: number;
  averageFetchTimeMs: number;
  fastestFetchMs: number;
  slowestFetchMs: number;
};

export type SchedulerStats = {
  running: boolean;
  intervalMs: number;
  lastFetchAt?: number;
  fetchCount: number;
  errorCount: number;
  lastSuccessfulFeeds: number;
  lastFailedFeeds: number;
  lastNewArticles: number;
  lastDurationMs: number;
};

export type TranslationWorkerStats = {
  running: boolean;
  translated: number;
  failed: number;
  batches: number;
  backoffUntil?: number;
};

export function emptyFetchResult(): FetchResult {
  return {
    totalSources: 0,
    successfulFeeds: 0,
    failedFeeds: 0,
    totalArticles: 0,
    newArticles: 0,
    durationMs: 0,
    errors: [],
  };
}
