import http from "node:http";
import { URL } from "node:url";
import { z } from "zod";
import {
  backoffDurationMs,
  isHealthy,
  type SchedulerStats,
  type Source,
  type StoredArticle,
  type Tier,
  type TranslationWorkerStats,
} from "@coinwire/shared";
import { rateLimitGuard, type GuardResult, type Identity } from "../ratelimit/guard.js";
import type { RateLimiter } from "../ratelimit/limiter.js";
import type { ArticleRepository } from "../storage/article-repository.js";
import type { SourceRepository } from "../storage/source-repository.js";
import { createLogger, errorMessage } from "../utils/logger.js";

const log = createLogger("api");

export type ApiServerOptions = {
  host: string;
  port: number;
  /** Believe X-Forwarded-For / X-Real-IP for the client address. */
  trustProxy: boolean;
  articles: Pick<
    ArticleRepository,
    "list" | "getById" | "search" | "countByCategory" | "countBySource" | "countPendingTranslations"
  >;
  sources: Pick<SourceRepository, "listAll">;
  /** Null when rate limiting is switched off. */
  limiter: RateLimiter | null;
  apiKeys: Readonly<Record<string, Tier>>;
  /** Keep articles out of the news routes until their translation completes. */
  hideUntranslated: boolean;
  getScheduler?: () => SchedulerStats;
  getTranslation?: () => TranslationWorkerStats;
};

export type ApiServer = {
  port: number;
  close: () => Promise<void>;
};

class UnauthorizedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

const NewsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  source: z.string().min(1).optional(),
  coin: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  breaking: z.enum(["true", "false", "1", "0"]).optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().trim().min(1).max(200),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const LIMITED_PATHS = new Set(["/api/v1/news", "/api/v1/news/search", "/api/v1/sources", "/api/v1/categories"]);

const ARTICLE_PATH = /^\/api\/v1\/news\/(\d+)$/;

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.statusCode = statusCode;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(json);
}

function sendInvalidQuery(res: http.ServerResponse, error: z.ZodError): void {
  const issue = error.issues[0];
  sendJson(res, 400, {
    error: "invalid_query",
    message: issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid query",
  });
}

function header(req: http.IncomingMessage, name: string): string | undefined {
  const v = req.headers[name];
  const first = Array.isArray(v) ? v[0] : v;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

export function clientIp(req: http.IncomingMessage, trustProxy: boolean): string {
  if (trustProxy) {
    const forwarded = header(req, "x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;
    const real = header(req, "x-real-ip");
    if (real) return real;
  }
  return req.socket.remoteAddress ?? "unknown";
}

function toIso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

function articleDto(a: StoredArticle) {
  return {
    id: a.id,
    guid: a.guid,
    title: a.title,
    link: a.link,
    description: a.description,
    pubDate: toIso(a.pubDate),
    source: { key: a.sourceKey, name: a.sourceName },
    categories: a.categories,
    coins: a.mentionedCoins,
    isBreaking: a.isBreaking,
    originalLanguage: a.originalLanguage ?? null,
    translationStatus: a.translationStatus,
  };
}

function sourceDto(s: Source, articleCount: number) {
  return {
    id: s.id,
    key: s.key,
    name: s.name,
    url: s.url,
    websiteUrl: s.websiteUrl ?? null,
    category: s.category,
    language: s.language,
    enabled: s.enabled,
    healthy: isHealthy(s),
    errorCount: s.errorCount,
    backoffMs: backoffDurationMs(s),
    reliabilityScore: s.reliabilityScore,
    lastFetchAt: toIso(s.lastFetchAt),
    articleCount,
  };
}

/** Public read API over the stored news. Resolves once the socket is listening. */
export function startApiServer(opts: ApiServerOptions): Promise<ApiServer> {
  const startedAt = Date.now();

  const resolveIdentity = (req: http.IncomingMessage): Identity => {
    const apiKey = header(req, "x-api-key");
    if (apiKey !== undefined) {
      const tier = Object.hasOwn(opts.apiKeys, apiKey) ? opts.apiKeys[apiKey] : undefined;
      if (!tier) throw new UnauthorizedError("Unknown API key");
      return { identifier: `key:${apiKey}`, tier };
    }
    return { identifier: `ip:${clientIp(req, opts.trustProxy)}`, tier: "anonymous" };
  };

  const guard = opts.limiter ? rateLimitGuard(opts.limiter, resolveIdentity) : null;

  /** Applies the limiter; answers 429 itself and returns false when over quota. */
  const admit = (req: http.IncomingMessage, res: http.ServerResponse): boolean => {
    if (!guard) {
      resolveIdentity(req);
      return true;
    }
    const result: GuardResult = guard(req);
    for (const [name, value] of Object.entries(result.headers)) {
      res.setHeader(name, value);
    }
    if (result.allowed) return true;

    log.debug("Rejected over quota", { identifier: result.identity.identifier });
    sendJson(res, 429, {
      error: "rate_limit_exceeded",
      message: "You have exceeded your rate limit. Please try again later.",
      retry_after: result.retryAfterSeconds,
    });
    return false;
  };

  const handleNews = (u: URL, res: http.ServerResponse): void => {
    const parsed = NewsQuerySchema.safeParse(Object.fromEntries(u.searchParams));
    if (!parsed.success) {
      sendInvalidQuery(res, parsed.error);
      return;
    }
    const q = parsed.data;
    const articles = opts.articles.list({
      limit: q.limit,
      offset: q.offset,
      sourceKey: q.source,
      coin: q.coin,
      category: q.category,
      breakingOnly: q.breaking === "true" || q.breaking === "1",
      hideUntranslated: opts.hideUntranslated,
    });
    sendJson(res, 200, {
      data: articles.map(articleDto),
      meta: { limit: q.limit, offset: q.offset, count: articles.length },
    });
  };

  const handleSearch = (u: URL, res: http.ServerResponse): void => {
    const parsed = SearchQuerySchema.safeParse(Object.fromEntries(u.searchParams));
    if (!parsed.success) {
      sendInvalidQuery(res, parsed.error);
      return;
    }
    const { q, limit } = parsed.data;
    const articles = opts.articles.search(q, { limit, hideUntranslated: opts.hideUntranslated });
    sendJson(res, 200, {
      data: articles.map(articleDto),
      meta: { query: q, limit, count: articles.length },
    });
  };

  const handleArticle = (id: number, res: http.ServerResponse): void => {
    const article = opts.articles.getById(id);
    const hidden =
      article !== undefined &&
      opts.hideUntranslated &&
      (article.translationStatus === "pending" || article.translationStatus === "failed");
    if (!article || hidden) {
      sendJson(res, 404, { error: "not_found" });
      return;
    }
    sendJson(res, 200, { data: articleDto(article) });
  };

  const handleSources = (res: http.ServerResponse): void => {
    const counts = opts.articles.countBySource();
    const sources = opts.sources.listAll();
    sendJson(res, 200, { data: sources.map((s) => sourceDto(s, counts.get(s.id) ?? 0)) });
  };

  const handleCategories = (res: http.ServerResponse): void => {
    sendJson(res, 200, { data: opts.articles.countByCategory() });
  };

  const handleStatus = (res: http.ServerResponse): void => {
    const sources = opts.sources.listAll();
    const enabled = sources.filter((s) => s.enabled);
    const healthy = enabled.filter((s) => isHealthy(s)).length;
    const translation = opts.getTranslation?.();
    sendJson(res, 200, {
      data: {
        uptimeMs: Date.now() - startedAt,
        scheduler: opts.getScheduler?.() ?? null,
        translation: translation
          ? { ...translation, pending: opts.articles.countPendingTranslations() }
          : null,
        sources: {
          total: sources.length,
          enabled: enabled.length,
          healthy,
          unhealthy: enabled.length - healthy,
        },
      },
    });
  };

  const handleUsage = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    const identity = resolveIdentity(req);
    if (!opts.limiter) {
      sendJson(res, 404, { error: "rate_limiting_disabled" });
      return;
    }
    sendJson(res, 200, { data: opts.limiter.getUsageStats(identity.identifier, identity.tier) });
  };

  const server = http.createServer((req, res) => {
    try {
      const u = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      res.setHeader("Access-Control-Allow-Origin", "*");
      res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-API-Key");
      if (req.method === "OPTIONS") {
        res.statusCode = 204;
        res.end();
        return;
      }
      if (req.method !== "GET") {
        sendJson(res, 405, { error: "method_not_allowed" });
        return;
      }

      if (u.pathname === "/health") {
        sendJson(res, 200, { status: "ok", uptimeMs: Date.now() - startedAt });
        return;
      }
      if (u.pathname === "/api/v1/status") {
        handleStatus(res);
        return;
      }
      if (u.pathname === "/api/v1/usage") {
        handleUsage(req, res);
        return;
      }

      const articleMatch = ARTICLE_PATH.exec(u.pathname);
      const limited = LIMITED_PATHS.has(u.pathname) || articleMatch !== null;
      if (!limited) {
        sendJson(res, 404, { error: "not_found" });
        return;
      }
      if (!admit(req, res)) return;

      if (u.pathname === "/api/v1/news") {
        handleNews(u, res);
      } else if (u.pathname === "/api/v1/news/search") {
        handleSearch(u, res);
      } else if (u.pathname === "/api/v1/sources") {
        handleSources(res);
      } else if (u.pathname === "/api/v1/categories") {
        handleCategories(res);
      } else if (articleMatch?.[1]) {
        handleArticle(Number(articleMatch[1]), res);
      }
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        sendJson(res, 401, { error: "invalid_api_key", message: err.message });
        return;
      }
      log.error("Request failed", { path: req.url, error: errorMessage(err) });
      sendJson(res, 500, { error: "internal_error" });
    }
  });

  return new Promise<ApiServer>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : opts.port;
      log.info("API listening", { host: opts.host, port });
      resolve({
        port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
