import { describe, it, expect } from "vitest";
import { extractedText } from "../test-helpers.js";
import { DocumentChunker, PageChunker, effectiveOverlap, getChunkingStrategy, splitWithOverlap } from "./index.js";

describe("splitWithOverlap", () => {
  it("should break on spaces and share a whole word between chunks", () => {
    const text = "alpha beta gamma delta";
    const spans = splitWithOverlap(text, 12, 4);

    expect(spans).toEqual([
      { start: 0, end: 10 },
      { start: 6, end: 16 },
      { start: 17, end: 22 },
    ]);
    expect(spans.map((s) => text.slice(s.start, s.end))).toEqual(["alpha beta", "beta gamma", "delta"]);
  });

  it("should trim surrounding whitespace from a short text", () => {
    expect(splitWithOverlap("  hello  ", 20, 5)).toEqual([{ start: 2, end: 7 }]);
  });

  it("should hard-cut text without separators", () => {
    expect(splitWithOverlap("abcdefghij", 4, 0)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 8 },
      { start: 8, end: 10 },
    ]);
  });

  it("should return nothing for blank text", () => {
    expect(splitWithOverlap(" \n\n ", 10, 2)).toEqual([]);
  });

  it("should reject a non-positive chunk size", () => {
    expect(() => splitWithOverlap("text", 0, 0)).toThrow(RangeError);
  });

  it("should keep every chunk within the size limit", () => {
    const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(" ");
    const spans = splitWithOverlap(text, 50, 10);

    for (const span of spans) expect(span.end - span.start).toBeLessThanOrEqual(50);
    for (let i = 1; i < spans.length; i++) {
      expect(spans[i]?.start ?? 0).toBeGreaterThan(spans[i - 1]?.start ?? 0);
    }
    expect(text.slice(spans.at(-1)?.start ?? 0)).toContain("word199");
  });
});

describe("effectiveOverlap", () => {
  it("should cap overlap at half the chunk size", () => {
    expect(effectiveOverlap(10, 50)).toBe(5);
    expect(effectiveOverlap(10, 3)).toBe(3);
    expect(effectiveOverlap(10, -1)).toBe(0);
  });
});

describe("PageChunker", () => {
  const text = extractedText("lib:policy.pdf", ["Policy A applies to teams", "", "Second page"], "a".repeat(64));

  it("should chunk each page and skip blank ones", () => {
    const chunks = new PageChunker().chunk(text, 2000, 100);

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toMatchObject({
      id: "lib:policy.pdf@aaaaaaaaaaaa#0",
      index: 0,
      pageStart: 1,
      pageEnd: 1,
      start: 0,
      end: 25,
      text: "Policy A applies to teams",
      source: "policy.pdf",
    });
    expect(chunks[1]).toMatchObject({ index: 1, pageStart: 3, pageEnd: 3, start: 29, end: 40, text: "Second page" });
  });

  it("should be deterministic", () => {
    const chunker = new PageChunker();
    expect(chunker.chunk(text, 10, 3)).toEqual(chunker.chunk(text, 10, 3));
  });

  it("should return no chunks when every page is empty", () => {
    expect(new PageChunker().chunk(extractedText("lib:blank.png", ["", "  "]), 100, 10)).toEqual([]);
  });
});

describe("DocumentChunker", () => {
  it("should record the pages a chunk spans", () => {
    const text = extractedText("lib:two.pdf", ["alpha beta", "gamma delta"]);
    const [only, ...rest] = new DocumentChunker().chunk(text, 100, 10);

    expect(rest).toEqual([]);
    expect(only).toMatchObject({ pageStart: 1, pageEnd: 2, start: 0, end: 23, text: "alpha beta\n\ngamma delta" });
  });

  it("should prefer page breaks as split points", () => {
    const text = extractedText("lib:two.pdf", ["alpha beta", "gamma delta"]);
    const chunks = new DocumentChunker().chunk(text, 12, 0);

    expect(chunks.map((c) => [c.text, c.pageStart, c.pageEnd])).toEqual([
      ["alpha beta", 1, 1],
      ["gamma delta", 2, 2],
    ]);
  });
});

describe("getChunkingStrategy", () => {
  it("should look up registered strategies by name", () => {
    expect(getChunkingStrategy("page-chunker")).toBeInstanceOf(PageChunker);
    expect(getChunkingStrategy("document-chunker")).toBeInstanceOf(DocumentChunker);
    expect(() => getChunkingStrategy("nope")).toThrow("Unknown chunking strategy: nope");
  });
});
