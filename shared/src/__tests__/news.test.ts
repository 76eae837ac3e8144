import { describe, it, expect } from "vitest";
import {
  SourceCatalogSchema,
  backoffDurationMs,
  isHealthy,
  markForTranslation,
  needsBackoff,
  needsTranslation,
  newArticle,
} from "../news.js";

describe("source health", () => {
  it("is healthy when enabled with fewer than 5 errors", () => {
    expect(isHealthy({ enabled: true, errorCount: 0 })).toBe(true);
    expect(isHealthy({ enabled: true, errorCount: 4 })).toBe(true);
  });

  it("is unhealthy at 5 errors or when disabled", () => {
    expect(isHealthy({ enabled: true, errorCount: 5 })).toBe(false);
    expect(isHealthy({ enabled: false, errorCount: 0 })).toBe(false);
  });

  it("needs backoff from 3 consecutive errors", () => {
    expect(needsBackoff({ errorCount: 2 })).toBe(false);
    expect(needsBackoff({ errorCount: 3 })).toBe(true);
  });

  it("doubles the backoff from 5 minutes and caps it at 120", () => {
    expect(backoffDurationMs({ errorCount: 2 })).toBe(0);
    expect(backoffDurationMs({ errorCount: 3 })).toBe(5 * 60_000);
    expect(backoffDurationMs({ errorCount: 4 })).toBe(10 * 60_000);
    expect(backoffDurationMs({ errorCount: 7 })).toBe(80 * 60_000);
    expect(backoffDurationMs({ errorCount: 8 })).toBe(120 * 60_000);
    expect(backoffDurationMs({ errorCount: 20 })).toBe(120 * 60_000);
  });
});

describe("articles", () => {
  it("creates an article with no translation and empty lists", () => {
    const a = newArticle(
      { sourceId: 1, guid: "g", title: "T", link: "https://x.test/a", description: "D", pubDate: 10 },
      99,
    );
    expect(a.translationStatus).toBe("none");
    expect(a.categories).toEqual([]);
    expect(a.mentionedCoins).toEqual([]);
    expect(a.isBreaking).toBe(false);
    expect(a.createdAt).toBe(99);
  });

  it("copies the original text when queued for translation", () => {
    const a = newArticle({ sourceId: 1, guid: "g", title: "Titel", link: "", description: "Text", pubDate: 0 });
    markForTranslation(a, "de");
    expect(a.originalTitle).toBe("Titel");
    expect(a.originalDescription).toBe("Text");
    expect(a.originalLanguage).toBe("de");
    expect(a.translationStatus).toBe("pending");
  });

  it("needs translation only when both languages are set and differ", () => {
    expect(needsTranslation("ko", "en")).toBe(true);
    expect(needsTranslation("EN", "en")).toBe(false);
    expect(needsTranslation("", "en")).toBe(false);
    expect(needsTranslation("ko", undefined)).toBe(false);
  });
});

describe("SourceCatalogSchema", () => {
  it("applies defaults to seed entries", () => {
    const [seed] = SourceCatalogSchema.parse([
      { key: "example", name: "Example", url: "https://example.test/rss" },
    ]);
    expect(seed).toEqual({
      key: "example",
      name: "Example",
      url: "https://example.test/rss",
      category: "general",
      language: "en",
      region: "global",
      enabled: true,
    });
  });

  it("rejects duplicate keys", () => {
    const result = SourceCatalogSchema.safeParse([
      { key: "dup", name: "A", url: "https://a.test/rss" },
      { key: "dup", name: "B", url: "https://b.test/rss" },
    ]);
    expect(result.success).toBe(false);
  });
});
