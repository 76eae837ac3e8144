import {
  ConfigSchema,
  DEFAULT_TIER_LIMITS,
  TierSchema,
  type Config,
  type Tier,
  type TierLimit,
} from "@coinwire/shared";

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function str(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function int(env: Env, name: string): number | undefined {
  const v = str(env, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${name} must be an integer, got "${v}"`);
  }
  return n;
}

function bool(env: Env, name: string): boolean | undefined {
  const v = str(env, name)?.toLowerCase();
  if (v === undefined) return undefined;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${v}"`);
}

/** Parses `key:tier` pairs separated by commas. */
export function parseApiKeys(raw: string | undefined): Record<string, Tier> {
  const keys: Record<string, Tier> = {};
  if (!raw) return keys;
  for (const pair of raw.split(",")) {
    const trimmed = pair.trim();
    if (!trimmed) continue;
    const sep = trimmed.lastIndexOf(":");
    if (sep <= 0) {
      throw new ConfigError(`API_KEYS entry "${trimmed}" must look like key:tier`);
    }
    const tier = TierSchema.safeParse(trimmed.slice(sep + 1));
    if (!tier.success) {
      throw new ConfigError(`API_KEYS entry "${trimmed}" names an unknown tier`);
    }
    keys[trimmed.slice(0, sep)] = tier.data;
  }
  return keys;
}

function tierLimit(env: Env, tier: Tier): TierLimit | undefined {
  const prefix = `RATE_LIMIT_${tier.toUpperCase()}`;
  const perMinute = int(env, `${prefix}_PER_MINUTE`);
  const perDay = int(env, `${prefix}_PER_DAY`);
  if (perMinute === undefined && perDay === undefined) return undefined;
  const defaults = DEFAULT_TIER_LIMITS[tier];
  return { perMinute: perMinute ?? defaults.perMinute, perDay: perDay ?? defaults.perDay };
}

function providers(env: Env): Array<{ id: string; type: "anthropic" | "openrouter"; apiKey: string }> {
  const list: Array<{ id: string; type: "anthropic" | "openrouter"; apiKey: string }> = [];
  const anthropic = str(env, "ANTHROPIC_API_KEY");
  if (anthropic) list.push({ id: "anthropic", type: "anthropic", apiKey: anthropic });
  const openrouter = str(env, "OPENROUTER_API_KEY");
  if (openrouter) list.push({ id: "openrouter", type: "openrouter", apiKey: openrouter });
  return list;
}

/**
 * Maps environment variables onto the config schema. Unset variables fall
 * through to schema defaults. Translation defaults to on when any LLM
 * provider key is present.
 */
export function loadConfig(env: Env = process.env): Config {
  const llmProviders = providers(env);
  const tiers: Partial<Record<Tier, TierLimit>> = {};
  for (const tier of TierSchema.options) {
    const limit = tierLimit(env, tier);
    if (limit) tiers[tier] = limit;
  }

  const raw = {
    mode: str(env, "SERVICE_MODE"),
    server: {
      host: str(env, "HOST"),
      port: int(env, "PORT"),
      trustProxy: bool(env, "TRUST_PROXY"),
    },
    database: {
      path: str(env, "DATABASE_PATH"),
      rateLimitPath: str(env, "RATE_LIMIT_DB_PATH"),
    },
    fetcher: {
      workers: int(env, "FETCHER_WORKERS"),
      timeoutMs: int(env, "FETCHER_TIMEOUT_MS"),
      maxArticleAgeMs: int(env, "FETCHER_MAX_AGE_MS"),
      sourcesFile: str(env, "SOURCES_FILE"),
    },
    scheduler: {
      intervalMs: int(env, "FETCH_INTERVAL_MS"),
    },
    translation: {
      enabled: bool(env, "TRANSLATION_ENABLED") ?? llmProviders.length > 0,
      targetLanguage: str(env, "TRANSLATION_TARGET_LANGUAGE"),
      intervalMs: int(env, "TRANSLATION_INTERVAL_MS"),
      batchSize: int(env, "TRANSLATION_BATCH_SIZE"),
      model: str(env, "MODEL_TRANSLATION"),
    },
    rateLimit: {
      enabled: bool(env, "RATE_LIMIT_ENABLED"),
      tiers,
      apiKeys: parseApiKeys(str(env, "API_KEYS")),
    },
    llm: { providers: llmProviders },
    logging: { level: str(env, "LOG_LEVEL") },
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  if (result.data.translation.enabled && result.data.llm.providers.length === 0) {
    throw new ConfigError("TRANSLATION_ENABLED requires ANTHROPIC_API_KEY or OPENROUTER_API_KEY");
  }
  return Object.freeze(result.data);
}
