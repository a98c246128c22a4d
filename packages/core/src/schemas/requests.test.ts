import { describe, it, expect } from "vitest";
import {
  DocumentKeySchema,
  ProcessRequestSchema,
  SearchQuerySchema,
} from "./requests.js";

describe("SearchQuerySchema", () => {
  it("applies size and from defaults", () => {
    expect(SearchQuerySchema.parse({ q: "report" })).toEqual({
      q: "report",
      size: 10,
      from: 0,
    });
  });

  it("coerces query-string numbers and trims the query", () => {
    expect(SearchQuerySchema.parse({ q: "  report ", size: "25", from: "50" })).toEqual({
      q: "report",
      size: 25,
      from: 50,
    });
  });

  it("rejects a blank or missing query", () => {
    for (const input of [{ q: "   " }, {}]) {
      const result = SearchQuerySchema.safeParse(input);
      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe("Search query cannot be empty");
    }
  });

  it("rejects size outside 1-100 and a negative offset", () => {
    expect(SearchQuerySchema.safeParse({ q: "a", size: "0" }).success).toBe(false);
    expect(SearchQuerySchema.safeParse({ q: "a", size: "101" }).success).toBe(false);
    expect(SearchQuerySchema.safeParse({ q: "a", from: "-1" }).success).toBe(false);
  });
});

describe("ProcessRequestSchema", () => {
  it("accepts an empty body", () => {
    expect(ProcessRequestSchema.parse({})).toEqual({});
  });

  it("accepts concurrency within 1-20", () => {
    expect(ProcessRequestSchema.parse({ concurrency: 20 })).toEqual({ concurrency: 20 });
  });

  it("rejects concurrency outside 1-20 or non-integers", () => {
    expect(ProcessRequestSchema.safeParse({ concurrency: 0 }).success).toBe(false);
    expect(ProcessRequestSchema.safeParse({ concurrency: 21 }).success).toBe(false);
    expect(ProcessRequestSchema.safeParse({ concurrency: 2.5 }).success).toBe(false);
  });
});

describe("DocumentKeySchema", () => {
  it("accepts nested relative keys", () => {
    expect(DocumentKeySchema.parse("reports/2026/q1.txt")).toBe("reports/2026/q1.txt");
  });

  it("rejects absolute keys and parent segments", () => {
    expect(DocumentKeySchema.safeParse("/etc/passwd").success).toBe(false);
    expect(DocumentKeySchema.safeParse("a/../b.txt").success).toBe(false);
  });
});
