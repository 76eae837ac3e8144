import { describe, it, expect } from "vitest";
import { parseRetryAfter } from "../errors.js";

const NOW = Date.UTC(2025, 0, 15, 12, 0, 0);

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("30")).toBe(30_000);
    expect(parseRetryAfter(" 1.5 ")).toBe(1_500);
  });

  it("reads an HTTP date relative to now", () => {
    expect(parseRetryAfter("Wed, 15 Jan 2025 12:00:45 GMT", NOW)).toBe(45_000);
  });

  it("clamps a date in the past to zero", () => {
    expect(parseRetryAfter("Wed, 15 Jan 2025 11:59:00 GMT", NOW)).toBe(0);
  });

  it("returns undefined for missing or unreadable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter("")).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});
