import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Article } from "@coinwire/shared";

const CoinTableSchema = z.array(
  z.object({
    symbol: z.string().min(1),
    names: z.array(z.string().min(1)).min(1),
  }),
);

const CategoryTableSchema = z.array(
  z.object({
    slug: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  }),
);

export type CoinTable = z.infer<typeof CoinTableSchema>;
export type CategoryTable = z.infer<typeof CategoryTableSchema>;

const BREAKING_KEYWORDS = ["breaking", "just in", "urgent", "alert", "flash", "developing"];
const BREAKING_WINDOW_MS = 2 * 60 * 60 * 1000;
const GENERATED_GUID_PREFIX = "gen-";

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(new URL(relative, import.meta.url), "utf8"));
}

export function loadCoinTable(): CoinTable {
  return CoinTableSchema.parse(readJson("../../data/coins.json"));
}

export function loadCategoryTable(): CategoryTable {
  return CategoryTableSchema.parse(readJson("../../data/categories.json"));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** One case-insensitive pattern matching any of the variants as whole words. */
function wholeWordPattern(variants: string[]): RegExp {
  return new RegExp(`\\b(?:${variants.map(escapeRegExp).join("|")})\\b`, "i");
}

type CompiledEntry = { key: string; pattern: RegExp };

export type EnricherOptions = {
  coins?: CoinTable;
  categories?: CategoryTable;
};

/** Derives coin mentions, the breaking flag, a fallback GUID and a category from article text. */
export class Enricher {
  private readonly coins: CompiledEntry[];
  private readonly categories: CompiledEntry[];

  constructor(options: EnricherOptions = {}) {
    this.coins = (options.coins ?? loadCoinTable()).map((c) => ({
      key: c.symbol,
      pattern: wholeWordPattern(c.names),
    }));
    this.categories = (options.categories ?? loadCategoryTable()).map((c) => ({
      key: c.slug,
      pattern: wholeWordPattern(c.keywords),
    }));
  }

  /** Symbols in table order; never returns duplicates. */
  extractMentionedCoins(text: string): string[] {
    if (!text) return [];
    const found: string[] = [];
    for (const coin of this.coins) {
      if (coin.pattern.test(text) && !found.includes(coin.key)) {
        found.push(coin.key);
      }
    }
    return found;
  }

  isBreaking(article: Pick<Article, "title" | "pubDate">, now: number = Date.now()): boolean {
    if (article.pubDate > now - BREAKING_WINDOW_MS) return true;
    const title = article.title.toLowerCase();
    return BREAKING_KEYWORDS.some((k) => title.includes(k));
  }

  generateGuid(article: Pick<Article, "sourceId" | "link" | "title">): string {
    const digest = createHash("sha256")
      .update(`${article.sourceId}|${article.link}|${article.title}`)
      .digest("hex");
    return GENERATED_GUID_PREFIX + digest.slice(0, 32);
  }

  /** The source's own category wins; otherwise the first keyword bucket that matches. */
  detectCategory(text: string, sourceCategory?: string): string {
    if (sourceCategory) return sourceCategory;
    for (const category of this.categories) {
      if (category.pattern.test(text)) return category.key;
    }
    return "general";
  }

  enrichArticle(article: Article, sourceCategory?: string, now: number = Date.now()): void {
    const text = `${article.title} ${article.description}`;
    article.mentionedCoins = this.extractMentionedCoins(text);
    article.isBreaking = this.isBreaking(article, now);
    if (!article.guid) {
      article.guid = this.generateGuid(article);
    }
    if (article.categories.length === 0) {
      article.categories = [this.detectCategory(text, sourceCategory)];
    }
  }
}
