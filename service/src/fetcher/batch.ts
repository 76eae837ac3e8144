import type { Article, FetchJobResult, FetchStats } from "@coinwire/shared";
import { toError } from "./errors.js";

export const DEFAULT_BATCH_SIZE = 100;

export type BatchOutcome<R> =
  | { ok: true; start: number; size: number; value: R }
  | { ok: false; start: number; size: number; error: Error };

/** Splits results into the articles of successful jobs and the failed jobs. */
export function collectArticles(results: FetchJobResult[]): {
  articles: Article[];
  failures: FetchJobResult[];
} {
  const articles: Article[] = [];
  const failures: FetchJobResult[] = [];
  for (const r of results) {
    if (r.error) {
      failures.push(r);
    } else {
      articles.push(...r.articles);
    }
  }
  return { articles, failures };
}

/** Keeps the first article seen for each GUID. */
export function deduplicateArticles(articles: Article[]): Article[] {
  const seen = new Set<string>();
  const unique: Article[] = [];
  for (const a of articles) {
    if (seen.has(a.guid)) continue;
    seen.add(a.guid);
    unique.push(a);
  }
  return unique;
}

/** Runs handler on consecutive slices; a failing slice does not stop the rest. */
export async function processInBatches<T, R>(
  items: T[],
  size: number,
  handler: (batch: T[]) => R | Promise<R>,
): Promise<BatchOutcome<R>[]> {
  const step = size > 0 ? size : DEFAULT_BATCH_SIZE;
  const outcomes: BatchOutcome<R>[] = [];
  for (let start = 0; start < items.length; start += step) {
    const batch = items.slice(start, start + step);
    try {
      outcomes.push({ ok: true, start, size: batch.length, value: await handler(batch) });
    } catch (err) {
      outcomes.push({ ok: false, start, size: batch.length, error: toError(err) });
    }
  }
  return outcomes;
}

export function calculateStats(results: FetchJobResult[], newArticles: number): FetchStats {
  const stats: FetchStats = {
    totalSources: results.length,
    successfulFetches: 0,
    failedFetches: 0,
    totalArticles: 0,
    newArticles,
    totalFetchTimeMs: 0,
    averageFetchTimeMs: 0,
    fastestFetchMs: 0,
    slowestFetchMs: 0,
  };

  let fastest = Number.POSITIVE_INFINITY;
  for (const r of results) {
    stats.totalFetchTimeMs += r.fetchTimeMs;
    if (r.error) {
      stats.failedFetches++;
      continue;
    }
    stats.successfulFetches++;
    stats.totalArticles += r.articles.length;
    fastest = Math.min(fastest, r.fetchTimeMs);
    stats.slowestFetchMs = Math.max(stats.slowestFetchMs, r.fetchTimeMs);
  }

  if (results.length > 0) {
    stats.averageFetchTimeMs = stats.totalFetchTimeMs / results.length;
  }
  if (stats.successfulFetches > 0) {
    stats.fastestFetchMs = fastest;
  }
  return stats;
}
