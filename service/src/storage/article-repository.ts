import type Database from "better-sqlite3";
import { z } from "zod";
import {
  TranslationStatusSchema,
  type Article,
  type StoredArticle,
  type TranslationStatus,
} from "@coinwire/shared";

type ArticleRow = {
  id: number;
  source_id: number;
  guid: string;
  title: string;
  link: string;
  description: string;
  pub_date: number;
  categories: string;
  mentioned_coins: string;
  is_breaking: number;
  created_at: number;
  original_title: string | null;
  original_description: string | null;
  original_language: string | null;
  translation_status: string;
  source_key: string;
  source_name: string;
};

export type ArticleQuery = {
  limit?: number;
  offset?: number;
  sourceKey?: string;
  coin?: string;
  category?: string;
  breakingOnly?: boolean;
  /** Hide articles whose translation has not completed yet. */
  hideUntranslated?: boolean;
};

const MAX_SEARCH_TERMS = 10;

const StringListSchema = z.array(z.string());

function parseList(json: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return [];
  }
  const parsed = StringListSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
}

function toArticle(r: ArticleRow): StoredArticle {
  const status = TranslationStatusSchema.safeParse(r.translation_status);
  return {
    id: r.id,
    sourceId: r.source_id,
    sourceKey: r.source_key,
    sourceName: r.source_name,
    guid: r.guid,
    title: r.title,
    link: r.link,
    description: r.description,
    pubDate: r.pub_date,
    categories: parseList(r.categories),
    mentionedCoins: parseList(r.mentioned_coins),
    isBreaking: r.is_breaking === 1,
    createdAt: r.created_at,
    originalTitle: r.original_title ?? undefined,
    originalDescription: r.original_description ?? undefined,
    originalLanguage: r.original_language ?? undefined,
    translationStatus: status.success ? status.data : "none",
  };
}

const SELECT_JOINED = `
  SELECT a.*, s.key AS source_key, s.name AS source_name
  FROM articles a
  JOIN sources s ON s.id = a.source_id`;

export class ArticleRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Inserts articles in one transaction; rows whose guid already exists are
   * skipped. Returns the number of rows actually written.
   */
  bulkInsert(articles: Article[]): number {
    const stmt = this.db.prepare(
      `INSERT OR IGNORE INTO articles
         (source_id, guid, title, link, description, pub_date, categories, mentioned_coins,
          is_breaking, created_at, original_title, original_description, original_language,
          translation_status)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const tx = this.db.transaction((batch: Article[]) => {
      let inserted = 0;
      for (const a of batch) {
        const info = stmt.run(
          a.sourceId,
          a.guid,
          a.title,
          a.link,
          a.description,
          a.pubDate,
          JSON.stringify(a.categories),
          JSON.stringify(a.mentionedCoins),
          a.isBreaking ? 1 : 0,
          a.createdAt,
          a.originalTitle ?? null,
          a.originalDescription ?? null,
          a.originalLanguage ?? null,
          a.translationStatus,
        );
        inserted += info.changes;
      }
      return inserted;
    });
    return tx(articles);
  }

  getById(id: number): StoredArticle | undefined {
    const row = this.db.prepare<[number], ArticleRow>(`${SELECT_JOINED} WHERE a.id = ?`).get(id);
    return row ? toArticle(row) : undefined;
  }

  list(query: ArticleQuery = {}): StoredArticle[] {
    const where: string[] = [];
    const params: Array<string | number> = [];

    if (query.sourceKey) {
      where.push("s.key = ?");
      params.push(query.sourceKey);
    }
    if (query.coin) {
      where.push("EXISTS (SELECT 1 FROM json_each(a.mentioned_coins) WHERE upper(value) = ?)");
      params.push(query.coin.toUpperCase());
    }
    if (query.category) {
      where.push("EXISTS (SELECT 1 FROM json_each(a.categories) WHERE lower(value) = ?)");
      params.push(query.category.toLowerCase());
    }
    if (query.breakingOnly) {
      where.push("a.is_breaking = 1");
    }
    if (query.hideUntranslated) {
      where.push("a.translation_status IN ('none', 'completed')");
    }

    const sql = `${SELECT_JOINED}
      ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY a.pub_date DESC, a.id DESC
      LIMIT ? OFFSET ?`;
    params.push(query.limit ?? 20, query.offset ?? 0);

    return this.db.prepare<Array<string | number>, ArticleRow>(sql).all(...params).map(toArticle);
  }

  /**
   * Case-insensitive substring search over title and description. Every
   * whitespace-separated term must match; articles with more terms in the
   * title rank first, then newest first.
   */
  search(text: string, options: { limit?: number; hideUntranslated?: boolean } = {}): StoredArticle[] {
    const terms = text
      .toLowerCase()
      .split(/\s+/)
      .filter((t) => t.length > 0)
      .slice(0, MAX_SEARCH_TERMS);
    if (terms.length === 0) return [];

    const where = terms.map(() => "instr(lower(a.title || ' ' || a.description), ?) > 0");
    if (options.hideUntranslated) {
      where.push("a.translation_status IN ('none', 'completed')");
    }
    const titleHits = terms.map(() => "(instr(lower(a.title), ?) > 0)").join(" + ");
    const sql = `${SELECT_JOINED}
      WHERE ${where.join(" AND ")}
      ORDER BY ${titleHits} DESC, a.pub_date DESC, a.id DESC
      LIMIT ?`;

    return this.db
      .prepare<Array<string | number>, ArticleRow>(sql)
      .all(...terms, ...terms, options.limit ?? 20)
      .map(toArticle);
  }

  /** Category names with the number of articles carrying each, most used first. */
  countByCategory(): Array<{ name: string; count: number }> {
    return this.db
      .prepare<[], { name: string; count: number }>(
        `SELECT c.value AS name, COUNT(*) AS count
         FROM articles a, json_each(a.categories) c
         GROUP BY c.value
         ORDER BY count DESC, name ASC`,
      )
      .all();
  }

  /** Pending articles first, then failed ones, oldest first within each. */
  getPendingTranslations(limit: number): StoredArticle[] {
    const rows = this.db
      .prepare<[number], ArticleRow>(
        `${SELECT_JOINED}
         WHERE a.translation_status IN ('pending', 'failed')
         ORDER BY CASE WHEN a.translation_status = 'pending' THEN 0 ELSE 1 END, a.id ASC
         LIMIT ?`,
      )
      .all(limit > 0 ? limit : 10);
    return rows.map(toArticle);
  }

  updateTranslation(id: number, title: string, description: string, status: TranslationStatus): void {
    this.db
      .prepare("UPDATE articles SET title = ?, description = ?, translation_status = ? WHERE id = ?")
      .run(title, description, status, id);
  }

  countPendingTranslations(): number {
    const row = this.db
      .prepare<[], { count: number }>(
        "SELECT COUNT(*) AS count FROM articles WHERE translation_status = 'pending'",
      )
      .get();
    return row?.count ?? 0;
  }

  countBySource(): Map<number, number> {
    const rows = this.db
      .prepare<[], { source_id: number; count: number }>(
        "SELECT source_id, COUNT(*) AS count FROM articles GROUP BY source_id",
      )
      .all();
    return new Map(rows.map((r) => [r.source_id, r.count]));
  }
}
