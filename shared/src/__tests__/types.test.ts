import { describe, it, expectTypeOf } from "vitest";
import type {
  Article,
  FetchableSource,
  FetchJobResult,
  FetchResult,
  Source,
  Tier,
  TierLimit,
  TranslationStatus,
  UsageStats,
  LLMProvider,
  Completion,
} from "../index.js";

describe("shared types", () => {
  it("Source satisfies FetchableSource", () => {
    expectTypeOf<Source>().toMatchTypeOf<FetchableSource>();
  });

  it("TranslationStatus is the four-state union", () => {
    expectTypeOf<TranslationStatus>().toEqualTypeOf<"none" | "pending" | "completed" | "failed">();
  });

  it("Article carries translation sub-state", () => {
    expectTypeOf<Article>().toHaveProperty("originalTitle");
    expectTypeOf<Article>().toHaveProperty("originalLanguage");
    expectTypeOf<Article["translationStatus"]>().toEqualTypeOf<TranslationStatus>();
    expectTypeOf<Article["mentionedCoins"]>().toEqualTypeOf<string[]>();
  });

  it("FetchJobResult error is optional", () => {
    expectTypeOf<FetchJobResult["error"]>().toEqualTypeOf<Error | undefined>();
  });

  it("FetchResult has aggregate counters", () => {
    expectTypeOf<FetchResult>().toHaveProperty("successfulFeeds");
    expectTypeOf<FetchResult>().toHaveProperty("newArticles");
    expectTypeOf<FetchResult["errors"]>().toBeArray();
  });

  it("Tier is the subscription union", () => {
    expectTypeOf<Tier>().toEqualTypeOf<"anonymous" | "free" | "pro" | "enterprise">();
  });

  it("TierLimit holds numeric windows", () => {
    expectTypeOf<TierLimit>().toEqualTypeOf<{ perMinute: number; perDay: number }>();
  });

  it("UsageStats reports the tier", () => {
    expectTypeOf<UsageStats["tier"]>().toEqualTypeOf<Tier>();
  });

  it("LLMProvider.complete resolves to a Completion", () => {
    expectTypeOf<ReturnType<LLMProvider["complete"]>>().toEqualTypeOf<Promise<Completion>>();
  });
});
