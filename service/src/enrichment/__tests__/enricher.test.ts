import { describe, it, expect } from "vitest";
import { newArticle } from "@coinwire/shared";
import { Enricher } from "../enricher.js";

const NOW = Date.UTC(2025, 0, 15, 12, 0, 0);
const HOUR = 60 * 60 * 1000;

function article(title: string, description = "", pubDate = NOW - 24 * HOUR) {
  return newArticle({ sourceId: 7, guid: "", title, link: "https://news.test/a", description, pubDate }, NOW);
}

describe("Enricher", () => {
  const enricher = new Enricher();

  describe("extractMentionedCoins", () => {
    it("finds exactly BTC and ETH", () => {
      expect(enricher.extractMentionedCoins("Bitcoin and ETH rally")).toEqual(["BTC", "ETH"]);
    });

    it("returns an empty array when no coin is named", () => {
      expect(enricher.extractMentionedCoins("Central banks keep rates unchanged")).toEqual([]);
      expect(enricher.extractMentionedCoins("")).toEqual([]);
    });

    it("matches whole words only", () => {
      expect(enricher.extractMentionedCoins("Solar panels and linked lists")).toEqual([]);
    });

    it("reports each symbol once in table order", () => {
      expect(enricher.extractMentionedCoins("ETH, ether and Bitcoin; more bitcoin")).toEqual(["BTC", "ETH"]);
    });

    it("matches multi-word names", () => {
      expect(enricher.extractMentionedCoins("Shiba Inu burns tokens")).toEqual(["SHIB"]);
    });

    it("uses an injected table", () => {
      const custom = new Enricher({ coins: [{ symbol: "XYZ", names: ["xyzcoin"] }], categories: [] });
      expect(custom.extractMentionedCoins("XYZCoin lists")).toEqual(["XYZ"]);
    });
  });

  describe("isBreaking", () => {
    it("flags articles published within the last 2 hours", () => {
      expect(enricher.isBreaking(article("Quiet update", "", NOW - HOUR), NOW)).toBe(true);
    });

    it("does not flag an article exactly 2 hours old without keywords", () => {
      expect(enricher.isBreaking(article("Quiet update", "", NOW - 2 * HOUR), NOW)).toBe(false);
    });

    it("flags titles with breaking keywords regardless of age", () => {
      expect(enricher.isBreaking(article("JUST IN: exchange halts withdrawals"), NOW)).toBe(true);
      expect(enricher.isBreaking(article("Developing story on ETF"), NOW)).toBe(true);
    });

    it("gives the same answer for the same article and time", () => {
      const a = article("Weekly recap");
      expect(enricher.isBreaking(a, NOW)).toBe(enricher.isBreaking(a, NOW));
    });
  });

  describe("generateGuid", () => {
    it("is deterministic and prefixed", () => {
      const a = article("Same title");
      const first = enricher.generateGuid(a);
      expect(first).toMatch(/^gen-[0-9a-f]{32}$/);
      expect(enricher.generateGuid(article("Same title"))).toBe(first);
    });

    it("changes with the title", () => {
      expect(enricher.generateGuid(article("One"))).not.toBe(enricher.generateGuid(article("Two")));
    });
  });

  describe("detectCategory", () => {
    it("prefers the source category", () => {
      expect(enricher.detectCategory("DeFi yields rise", "bitcoin")).toBe("bitcoin");
    });

    it("picks the first matching bucket", () => {
      expect(enricher.detectCategory("New lending market opens")).toBe("defi");
      expect(enricher.detectCategory("Miners sell as hashrate climbs")).toBe("mining");
    });

    it("falls back to general", () => {
      expect(enricher.detectCategory("Conference schedule announced")).toBe("general");
    });
  });

  describe("enrichArticle", () => {
    it("fills coins, breaking flag, guid and category", () => {
      const a = article("Breaking: Solana outage", "Validators restart the network");
      enricher.enrichArticle(a, "", NOW);
      expect(a.mentionedCoins).toEqual(["SOL"]);
      expect(a.isBreaking).toBe(true);
      expect(a.guid).toBe(enricher.generateGuid(a));
      expect(a.categories).toEqual(["staking"]);
    });

    it("keeps a feed-supplied guid and categories", () => {
      const a = article("Plain news");
      a.guid = "feed-guid";
      a.categories = ["markets"];
      enricher.enrichArticle(a, "general", NOW);
      expect(a.guid).toBe("feed-guid");
      expect(a.categories).toEqual(["markets"]);
    });
  });
});
