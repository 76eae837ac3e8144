import { z } from "zod";

export type TranslationStatus = "none" | "pending" | "completed" | "failed";

export const TranslationStatusSchema = z.enum(["none", "pending", "completed", "failed"]);

/** What the fetch pipeline needs to know about a feed. A persisted Source satisfies it. */
export type FetchableSource = {
  id: number;
  key: string;
  url: string;
  category: string;
  language: string;
  enabled: boolean;
};

export type Source = FetchableSource & {
  name: string;
  websiteUrl?: string;
  reliabilityScore: number;
  lastFetchAt?: number;
  errorCount: number;
  createdAt: number;
};

/** Catalog entry used to seed the sources table. */
export const SourceSeedSchema = z.object({
  key: z.string().min(1).regex(/^[a-z0-9_-]+$/),
  name: z.string().min(1),
  url: z.string().url(),
  websiteUrl: z.string().url().optional(),
  category: z.string().default("general"),
  language: z.string().min(2).default("en"),
  region: z.string().default("global"),
  enabled: z.boolean().default(true),
});

export type SourceSeed = z.infer<typeof SourceSeedSchema>;

export const SourceCatalogSchema = z.array(SourceSeedSchema).superRefine((seeds, ctx) => {
  const seen = new Set<string>();
  seeds.forEach((seed, i) => {
    if (seen.has(seed.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate source key "${seed.key}"`,
        path: [i, "key"],
      });
    }
    seen.add(seed.key);
  });
});

export type Article = {
  id?: number;
  sourceId: number;
  guid: string;
  title: string;
  link: string;
  description: string;
  pubDate: number;
  categories: string[];
  mentionedCoins: string[];
  isBreaking: boolean;
  createdAt: number;
  originalTitle?: string;
  originalDescription?: string;
  originalLanguage?: string;
  translationStatus: TranslationStatus;
};

export type StoredArticle = Article & {
  id: number;
  sourceKey: string;
  sourceName: string;
};

/** A normalized feed entry as produced by the feed reader. */
export type FeedItem = {
  guid: string;
  title: string;
  link: string;
  description: string;
  pubDate: number;
  categories: string[];
};

export const MAX_CONSECUTIVE_ERRORS = 5;
const BACKOFF_THRESHOLD = 3;
const BACKOFF_BASE_MS = 5 * 60_000;
const BACKOFF_CAP_MS = 120 * 60_000;

export function isHealthy(source: Pick<Source, "enabled" | "errorCount">): boolean {
  return source.enabled && source.errorCount < MAX_CONSECUTIVE_ERRORS;
}

export function needsBackoff(source: Pick<Source, "errorCount">): boolean {
  return source.errorCount >= BACKOFF_THRESHOLD;
}

export function backoffDurationMs(source: Pick<Source, "errorCount">): number {
  if (!needsBackoff(source)) return 0;
  const ms = BACKOFF_BASE_MS * Math.pow(2, source.errorCount - BACKOFF_THRESHOLD);
  return Math.min(ms, BACKOFF_CAP_MS);
}

export function newArticle(
  fields: Pick<Article, "sourceId" | "guid" | "title" | "link" | "description" | "pubDate"> &
    Partial<Pick<Article, "categories">>,
  now: number = Date.now(),
): Article {
  return {
    ...fields,
    categories: fields.categories ?? [],
    mentionedCoins: [],
    isBreaking: false,
    createdAt: now,
    translationStatus: "none",
  };
}

/** Keeps the untranslated text and queues the article for the translation worker. */
export function markForTranslation(article: Article, language: string): void {
  article.originalTitle = article.title;
  article.originalDescription = article.description;
  article.originalLanguage = language;
  article.translationStatus = "pending";
}

export function needsTranslation(sourceLanguage: string, targetLanguage: string | undefined): boolean {
  if (!targetLanguage || !sourceLanguage) return false;
  return sourceLanguage.toLowerCase() !== targetLanguage.toLowerCase();
}
