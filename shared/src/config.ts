import { z } from "zod";
import { DEFAULT_TIER_LIMITS, TierLimitSchema, TierSchema } from "./ratelimit.js";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

const ServerConfigSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8080),
  trustProxy: z.boolean().default(false),
});

const DatabaseConfigSchema = z.object({
  path: z.string().min(1).default("data/coinwire.db"),
  rateLimitPath: z.string().min(1).optional(),
});

const FetcherConfigSchema = z.object({
  workers: z.number().int().positive().default(50),
  timeoutMs: z.number().int().positive().default(10_000),
  maxArticleAgeMs: z.number().int().positive().default(7 * DAY_MS),
  insertBatchSize: z.number().int().positive().default(100),
  sourcesFile: z.string().min(1).optional(),
});

const SchedulerConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(3 * MINUTE_MS),
  stopGraceMs: z.number().int().positive().default(30_000),
});

const TranslationConfigSchema = z.object({
  enabled: z.boolean().default(false),
  targetLanguage: z.string().min(2).default("en"),
  intervalMs: z.number().int().positive().default(30_000),
  batchSize: z.number().int().positive().default(5),
  pacingMs: z.number().int().nonnegative().default(500),
  model: z.string().min(1).default("claude-haiku-4-5-20251001"),
});

const TierLimitsSchema = z.object({
  anonymous: TierLimitSchema.default(DEFAULT_TIER_LIMITS.anonymous),
  free: TierLimitSchema.default(DEFAULT_TIER_LIMITS.free),
  pro: TierLimitSchema.default(DEFAULT_TIER_LIMITS.pro),
  enterprise: TierLimitSchema.default(DEFAULT_TIER_LIMITS.enterprise),
});

const RateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  tiers: TierLimitsSchema.default({}),
  apiKeys: z.record(z.string().min(1), TierSchema).default({}),
  sweepIntervalMs: z.number().int().positive().default(5 * MINUTE_MS),
});

const ProviderConfigSchema = z.object({
  id: z.string().min(1),
  type: z.enum(["anthropic", "openrouter"]),
  apiKey: z.string().min(1),
});

const LLMConfigSchema = z.object({
  providers: z.array(ProviderConfigSchema).default([]),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ServiceModeSchema = z.enum(["all", "fetcher", "api"]);

export type ServiceMode = z.infer<typeof ServiceModeSchema>;

export const ConfigSchema = z.object({
  mode: ServiceModeSchema.default("all"),
  server: ServerConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  fetcher: FetcherConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  translation: TranslationConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}
