import Parser from "rss-parser";
import type { FeedItem } from "@coinwire/shared";

export type FetchFeedOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export interface FeedReader {
  fetchAndParse(url: string, options?: FetchFeedOptions): Promise<FeedItem[]>;
}

export class FeedHttpError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Feed ${url} responded with HTTP ${status}`);
    this.name = "FeedHttpError";
    this.status = status;
  }
}

type RawItem = {
  id?: string;
  summary?: string;
};

const USER_AGENT = "coinwire-fetcher/0.1";
export const MAX_BODY_BYTES = 10 * 1024 * 1024;

export class FeedTooLargeError extends Error {
  constructor(url: string, limit: number) {
    super(`Feed ${url} body exceeds ${limit} bytes`);
    this.name = "FeedTooLargeError";
  }
}

function parseDate(...candidates: Array<string | undefined>): number | undefined {
  for (const c of candidates) {
    if (!c) continue;
    const t = Date.parse(c);
    if (!Number.isNaN(t)) return t;
  }
  return undefined;
}

export class RssFeedReader implements FeedReader {
  private readonly parser: Parser<Record<string, unknown>, RawItem>;
  private readonly fetchImpl: typeof fetch;
  private readonly maxBodyBytes: number;

  constructor(options: { fetchImpl?: typeof fetch; maxBodyBytes?: number } = {}) {
    this.parser = new Parser<Record<string, unknown>, RawItem>({
      customFields: { item: ["id", "summary"] },
    });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxBodyBytes = options.maxBodyBytes ?? MAX_BODY_BYTES;
  }

  async fetchAndParse(url: string, options: FetchFeedOptions = {}): Promise<FeedItem[]> {
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));

    const response = await this.fetchImpl(url, {
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
      },
      signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
      redirect: "follow",
    });

    if (!response.ok) {
      throw new FeedHttpError(url, response.status);
    }
    const declared = Number(response.headers.get("content-length") ?? "0");
    if (declared > this.maxBodyBytes) {
      await response.body?.cancel();
      throw new FeedTooLargeError(url, this.maxBodyBytes);
    }

    return this.parse(await this.readBody(url, response));
  }

  /** Reads the body as UTF-8, cancelling the stream once it passes the byte cap. */
  private async readBody(url: string, response: Response): Promise<string> {
    if (!response.body) return "";
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let received = 0;
    let text = "";
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > this.maxBodyBytes) {
        await reader.cancel();
        throw new FeedTooLargeError(url, this.maxBodyBytes);
      }
      text += decoder.decode(value, { stream: true });
    }
    return text + decoder.decode();
  }

  async parse(xml: string, now: number = Date.now()): Promise<FeedItem[]> {
    const feed = await this.parser.parseString(xml);
    return feed.items.map((item) => {
      const link = item.link?.trim() ?? "";
      return {
        guid: (item.guid ?? item.id ?? link).trim(),
        title: item.title ?? "",
        link,
        description: item.content ?? item.summary ?? item.contentSnippet ?? "",
        pubDate: parseDate(item.isoDate, item.pubDate) ?? now,
        categories: (item.categories ?? []).filter((c) => typeof c === "string"),
      };
    });
  }
}
