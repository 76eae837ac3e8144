import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { SourceCatalogSchema, type SourceSeed } from "@coinwire/shared";
import type { SourceRepository } from "../storage/source-repository.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("sources");

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../data/sources.json", import.meta.url));

export type SourceCatalog = readonly Readonly<SourceSeed>[];

/** Reads and validates the feed catalog. Built once at startup and passed to whoever needs it. */
export function loadSourceCatalog(path: string = DEFAULT_CATALOG_PATH): SourceCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const seeds = SourceCatalogSchema.parse(raw);
  return Object.freeze(seeds.map((s) => Object.freeze(s)));
}

/** Adds catalog entries missing from storage. Existing rows keep their health state. */
export function syncSources(
  catalog: SourceCatalog,
  repo: SourceRepository,
  now: number = Date.now(),
): { added: number; total: number } {
  let added = 0;
  for (const seed of catalog) {
    if (repo.insertIfMissing(seed, now)) added++;
  }
  log.info("Source catalog synced", { added, total: catalog.length });
  return { added, total: catalog.length };
}
