import type Database from "better-sqlite3";
import type { Source, SourceSeed } from "@coinwire/shared";

type SourceRow = {
  id: number;
  key: string;
  name: string;
  rss_url: string;
  website_url: string | null;
  category: string;
  language: string;
  is_enabled: number;
  reliability_score: number;
  last_fetch_at: number | null;
  error_count: number;
  created_at: number;
};

const DEFAULT_RELIABILITY = 0.8;

function toSource(r: SourceRow): Source {
  return {
    id: r.id,
    key: r.key,
    name: r.name,
    url: r.rss_url,
    websiteUrl: r.website_url ?? undefined,
    category: r.category,
    language: r.language,
    enabled: r.is_enabled === 1,
    reliabilityScore: r.reliability_score,
    lastFetchAt: r.last_fetch_at ?? undefined,
    errorCount: r.error_count,
    createdAt: r.created_at,
  };
}

export class SourceRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  listEnabled(): Source[] {
    return this.db
      .prepare<[], SourceRow>("SELECT * FROM sources WHERE is_enabled = 1 ORDER BY id")
      .all()
      .map(toSource);
  }

  listAll(): Source[] {
    return this.db.prepare<[], SourceRow>("SELECT * FROM sources ORDER BY id").all().map(toSource);
  }

  getById(id: number): Source | undefined {
    const row = this.db.prepare<[number], SourceRow>("SELECT * FROM sources WHERE id = ?").get(id);
    return row ? toSource(row) : undefined;
  }

  getByKey(key: string): Source | undefined {
    const row = this.db.prepare<[string], SourceRow>("SELECT * FROM sources WHERE key = ?").get(key);
    return row ? toSource(row) : undefined;
  }

  /** Inserts a catalog entry unless its key already exists. Returns true when a row was added. */
  insertIfMissing(seed: SourceSeed, now: number = Date.now()): boolean {
    const info = this.db
      .prepare(
        `INSERT OR IGNORE INTO sources
           (key, name, rss_url, website_url, category, language, is_enabled, reliability_score, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        seed.key,
        seed.name,
        seed.url,
        seed.websiteUrl ?? null,
        seed.category,
        seed.language,
        seed.enabled ? 1 : 0,
        DEFAULT_RELIABILITY,
        now,
      );
    return info.changes > 0;
  }

  incrementErrorCount(id: number): void {
    this.db.prepare("UPDATE sources SET error_count = error_count + 1 WHERE id = ?").run(id);
  }

  resetErrorCount(id: number): void {
    this.db.prepare("UPDATE sources SET error_count = 0 WHERE id = ?").run(id);
  }

  updateLastFetch(id: number, at: number): void {
    this.db.prepare("UPDATE sources SET last_fetch_at = ? WHERE id = ?").run(at, id);
  }
}
