import { describe, it, expect } from "vitest";
import { assembleContext, collectSources, formatEntry, formatSources } from "./context-builder.js";
import type { SearchResult } from "./types.js";

function result(content: string, filename: string | undefined, chunkIndex?: number): SearchResult {
  const metadata: SearchResult["metadata"] = {};
  if (filename !== undefined) metadata.filename = filename;
  if (chunkIndex !== undefined) metadata.chunkIndex = chunkIndex;
  return { content, metadata, similarityScore: 0.9, recordId: `${filename ?? "none"}-${chunkIndex ?? 0}` };
}

const budget = { maxContextLength: 200, minPartialContext: 100 };

describe("formatEntry", () => {
  it("should label the trimmed content with its source", () => {
    expect(formatEntry(result("  alpha \n", "a.txt"))).toBe("[Source: a.txt]\nalpha\n");
    expect(formatEntry(result("x", undefined))).toBe("[Source: Unknown source]\nx\n");
  });
});

describe("assembleContext", () => {
  it("should join entries with the separator", () => {
    const context = assembleContext([result("alpha", "a.txt"), result("beta", "b.txt")], budget);
    expect(context).toBe("[Source: a.txt]\nalpha\n\n---\n[Source: b.txt]\nbeta\n");
  });

  it("should truncate the entry that overflows when enough room remains", () => {
    const context = assembleContext([result("alpha", "a.txt"), result("b".repeat(300), "b.txt")], budget);

    expect(context).toHaveLength(200);
    expect(context.startsWith("[Source: a.txt]\nalpha\n\n---\n[Source: b.txt]\nbbb")).toBe(true);
    expect(context.endsWith("b...")).toBe(true);
  });

  it("should stop without a partial entry when too little room remains", () => {
    expect(assembleContext([result("b".repeat(300), "b.txt")], { ...budget, maxContextLength: 50 })).toBe("");

    const context = assembleContext(
      [result("a".repeat(150), "a.txt"), result("c".repeat(100), "c.txt")],
      budget,
    );
    expect(context).toBe(formatEntry(result("a".repeat(150), "a.txt")));
  });

  it("should not split a surrogate pair when truncating", () => {
    const content = "a".repeat(100) + "\u{1F600}".repeat(10);

    const context = assembleContext([result(content, "e.txt")], { maxContextLength: 120, minPartialContext: 100 });

    expect(context).toBe("[Source: e.txt]\n" + "a".repeat(100) + "...");
  });

  it("should return an empty string for no results", () => {
    expect(assembleContext([], budget)).toBe("");
  });
});

describe("collectSources / formatSources", () => {
  it("should group chunk indexes by file in first-seen order", () => {
    const sources = collectSources([
      result("x", "b.txt", 2),
      result("y", "a.txt", 1),
      result("z", "b.txt", 0),
      result("w", undefined),
    ]);

    expect(sources).toEqual([
      { source: "b.txt", chunks: [0, 2] },
      { source: "a.txt", chunks: [1] },
      { source: "Unknown source", chunks: [] },
    ]);
    expect(formatSources(sources)).toBe("b.txt #0, #2 | a.txt #1 | Unknown source");
  });
});
