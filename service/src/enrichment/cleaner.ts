import * as cheerio from "cheerio";

const BLOCK_ELEMENTS = "p, div, br, li, ul, ol, h1, h2, h3, h4, h5, h6, blockquote, tr, td, th, figure, figcaption";
const CDATA_MARKERS = /<!\[CDATA\[|\]\]>/g;
const WHITESPACE = /\s+/g;
const ENTITY = /&(?:[a-z]+|#\d+|#x[0-9a-f]+);/i;
// Lone surrogate halves left by byte-level truncation upstream.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

function decodeOnce(text: string): string {
  return cheerio.load(text, null, false).root().text();
}

/** Strips markup and entities from feed text and collapses whitespace. */
export function clean(text: string): string {
  if (!text) return "";

  const $ = cheerio.load(text.replace(CDATA_MARKERS, ""), null, false);
  $("script, style").remove();
  $(BLOCK_ELEMENTS).after(" ");
  let out = $.root().text();

  // Some feeds double-escape their HTML.
  for (let i = 0; i < 2 && ENTITY.test(out); i++) {
    const decoded = decodeOnce(out);
    if (decoded === out) break;
    out = decoded;
  }

  return out.replace(WHITESPACE, " ").trim();
}

/** Cuts to at most maxLen code points, preferring a word boundary in the second half. */
export function truncate(text: string, maxLen: number): string {
  const chars = Array.from(text);
  if (maxLen <= 0 || chars.length <= maxLen) return text;

  let cut = chars.slice(0, Math.max(maxLen - 3, 0));
  for (let i = cut.length - 1; i >= Math.floor(maxLen / 2); i--) {
    if (/\s/.test(cut[i] ?? "")) {
      cut = cut.slice(0, i);
      break;
    }
  }
  return `${cut.join("").trim()}...`;
}

export function sanitizeForDb(text: string, maxLen: number): string {
  const cleaned = clean(text).replace(/\u0000/g, "").replace(LONE_SURROGATE, "");
  return maxLen > 0 ? truncate(cleaned, maxLen) : cleaned;
}

export const MAX_TITLE_LENGTH = 1000;
export const MAX_DESCRIPTION_LENGTH = 5000;
