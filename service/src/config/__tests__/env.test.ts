import { describe, it, expect } from "vitest";
import { DEFAULT_TIER_LIMITS } from "@coinwire/shared";
import { ConfigError, loadConfig, parseApiKeys } from "../env.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.mode).toBe("all");
    expect(config.server).toEqual({ host: "0.0.0.0", port: 8080, trustProxy: false });
    expect(config.fetcher.workers).toBe(50);
    expect(config.scheduler.intervalMs).toBe(180_000);
    expect(config.translation.enabled).toBe(false);
    expect(config.rateLimit.enabled).toBe(true);
    expect(config.rateLimit.tiers).toEqual(DEFAULT_TIER_LIMITS);
    expect(config.llm.providers).toEqual([]);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads server and fetcher settings", () => {
    const config = loadConfig({
      SERVICE_MODE: "api",
      HOST: "127.0.0.1",
      PORT: "9090",
      TRUST_PROXY: "yes",
      FETCHER_WORKERS: "8",
      FETCH_INTERVAL_MS: "60000",
      LOG_LEVEL: "debug",
    });

    expect(config.mode).toBe("api");
    expect(config.server).toEqual({ host: "127.0.0.1", port: 9090, trustProxy: true });
    expect(config.fetcher.workers).toBe(8);
    expect(config.scheduler.intervalMs).toBe(60_000);
    expect(config.logging.level).toBe("debug");
  });

  it("turns translation on when a provider key is present", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "test-secret", OPENROUTER_API_KEY: "test-secret-2" });

    expect(config.translation.enabled).toBe(true);
    expect(config.llm.providers).toEqual([
      { id: "anthropic", type: "anthropic", apiKey: "test-secret" },
      { id: "openrouter", type: "openrouter", apiKey: "test-secret-2" },
    ]);
  });

  it("lets translation be switched off explicitly", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "test-secret", TRANSLATION_ENABLED: "false" }).translation.enabled).toBe(false);
  });

  it("refuses translation without a provider", () => {
    expect(() => loadConfig({ TRANSLATION_ENABLED: "true" })).toThrow(
      "TRANSLATION_ENABLED requires ANTHROPIC_API_KEY or OPENROUTER_API_KEY",
    );
  });

  it("overrides one tier window and keeps the other default", () => {
    const config = loadConfig({ RATE_LIMIT_PRO_PER_MINUTE: "120" });

    expect(config.rateLimit.tiers.pro).toEqual({ perMinute: 120, perDay: 10_000 });
    expect(config.rateLimit.tiers.free).toEqual(DEFAULT_TIER_LIMITS.free);
  });

  it("accepts -1 as an unlimited day window and rejects zero", () => {
    expect(loadConfig({ RATE_LIMIT_FREE_PER_DAY: "-1" }).rateLimit.tiers.free.perDay).toBe(-1);
    expect(() => loadConfig({ RATE_LIMIT_FREE_PER_DAY: "0" })).toThrow(ConfigError);
  });

  it("reports malformed values by variable name", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow('PORT must be an integer, got "http"');
    expect(() => loadConfig({ TRUST_PROXY: "maybe" })).toThrow('TRUST_PROXY must be a boolean, got "maybe"');
    expect(() => loadConfig({ SERVICE_MODE: "worker" })).toThrow(/^Invalid configuration: mode:/);
  });
});

describe("parseApiKeys", () => {
  it("maps keys to tiers", () => {
    expect(parseApiKeys("test-key:pro, other-key:free,")).toEqual({ "test-key": "pro", "other-key": "free" });
  });

  it("splits on the last colon", () => {
    expect(parseApiKeys("a:b:enterprise")).toEqual({ "a:b": "enterprise" });
  });

  it("returns nothing for an unset value", () => {
    expect(parseApiKeys(undefined)).toEqual({});
  });

  it("rejects malformed entries and unknown tiers", () => {
    expect(() => parseApiKeys("test-key")).toThrow('API_KEYS entry "test-key" must look like key:tier');
    expect(() => parseApiKeys("test-key:gold")).toThrow('API_KEYS entry "test-key:gold" names an unknown tier');
  });
});
