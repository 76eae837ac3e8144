export type {
  TranslationStatus,
  FetchableSource,
  Source,
  SourceSeed,
  Article,
  StoredArticle,
  FeedItem,
} from "./news.js";

export {
  TranslationStatusSchema,
  SourceSeedSchema,
  SourceCatalogSchema,
  MAX_CONSECUTIVE_ERRORS,
  isHealthy,
  needsBackoff,
  backoffDurationMs,
  newArticle,
  markForTranslation,
  needsTranslation,
} from "./news.js";

export type {
  FetchJobResult,
  FetchError,
  FetchResult,
  FetchStats,
  SchedulerStats,
  TranslationWorkerStats,
} from "./fetch.js";

export { emptyFetchResult } from "./fetch.js";

export type { Tier, TierLimit, RateLimitDecision, UsageStats } from "./ratelimit.js";

export { TierSchema, TierLimitSchema, UNLIMITED, DEFAULT_TIER_LIMITS } from "./ratelimit.js";

export type {
  LLMMessage,
  ResponseFormat,
  CompletionParams,
  CompletionUsage,
  Completion,
  LLMProvider,
} from "./provider.js";

export { type Config, type ServiceMode, ConfigSchema, ServiceModeSchema, parseConfig } from "./config.js";
