import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

function open(path: string): Database.Database {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  if (path !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  return db;
}

export function createNewsDb(path: string): Database.Database {
  const db = open(path);
  db.exec(`
    CREATE TABLE IF NOT EXISTS sources (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      key TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      rss_url TEXT NOT NULL,
      website_url TEXT,
      category TEXT NOT NULL DEFAULT 'general',
      language TEXT NOT NULL DEFAULT 'en',
      is_enabled INTEGER NOT NULL DEFAULT 1,
      reliability_score REAL NOT NULL DEFAULT 0.8,
      last_fetch_at INTEGER,
      error_count INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS articles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id INTEGER NOT NULL REFERENCES sources(id),
      guid TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      link TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      pub_date INTEGER NOT NULL,
      categories TEXT NOT NULL DEFAULT '[]',
      mentioned_coins TEXT NOT NULL DEFAULT '[]',
      is_breaking INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      original_title TEXT,
      original_description TEXT,
      original_language TEXT,
      translation_status TEXT NOT NULL DEFAULT 'none'
        CHECK(translation_status IN ('none','pending','completed','failed'))
    );
    CREATE INDEX IF NOT EXISTS idx_articles_pub_date ON articles(pub_date DESC);
    CREATE INDEX IF NOT EXISTS idx_articles_source ON articles(source_id);
    CREATE INDEX IF NOT EXISTS idx_articles_translation ON articles(translation_status);
  `);
  return db;
}

/** Separate handle for the rate-limit counter store; its table is created by the store. */
export function createRateLimitDb(path: string): Database.Database {
  return open(path);
}
