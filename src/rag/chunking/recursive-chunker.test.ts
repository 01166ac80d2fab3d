import { describe, it, expect } from "vitest";
import { chunkStats, countSentences, countWords, RecursiveChunker } from "./recursive-chunker.js";

describe("RecursiveChunker", () => {
  it("should return no chunks for blank text", () => {
    const chunker = new RecursiveChunker();
    expect(chunker.split("")).toEqual([]);
    expect(chunker.split("  \n\n \t ")).toEqual([]);
  });

  it("should keep short text as one trimmed chunk", () => {
    const chunker = new RecursiveChunker({ chunkSize: 100, chunkOverlap: 10 });
    const chunks = chunker.split("  Hello world.  ", { filename: "greeting.txt" });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      content: "Hello world.",
      index: 0,
      startOffset: 2,
      endOffset: 14,
    });
    expect(chunks[0]?.metadata).toMatchObject({
      filename: "greeting.txt",
      chunkSize: 12,
      wordCount: 2,
      sentenceCount: 1,
      originalDocument: "greeting.txt",
    });
  });

  it("should carry trailing words over as overlap", () => {
    const chunker = new RecursiveChunker({ chunkSize: 20, chunkOverlap: 10 });
    const chunks = chunker.split("aaaa bbbb cccc dddd eeee ffff");

    expect(chunks.map((c) => c.content)).toEqual(["aaaa bbbb cccc dddd", "cccc dddd eeee ffff"]);
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 19],
      [10, 29],
    ]);
    expect(chunks[0]?.metadata.wordCount).toBe(4);
    expect(chunks[1]?.metadata.originalDocument).toBe("unknown");
  });

  it("should cut text without separators at the character level", () => {
    const chunker = new RecursiveChunker({ chunkSize: 10, chunkOverlap: 0 });
    const chunks = chunker.split("abcdefghijklmnopqrstuvwxy");

    expect(chunks.map((c) => c.content)).toEqual(["abcdefghij", "klmnopqrst", "uvwxy"]);
    expect(chunks.map((c) => c.startOffset)).toEqual([0, 10, 20]);
  });

  it("should prefer paragraph boundaries", () => {
    const chunker = new RecursiveChunker({ chunkSize: 30, chunkOverlap: 0 });
    const chunks = chunker.split("First paragraph here.\n\nSecond paragraph here.");

    expect(chunks.map((c) => c.content)).toEqual(["First paragraph here.", "Second paragraph here."]);
    expect(chunks[1]?.startOffset).toBe(23);
    expect(chunks[1]?.index).toBe(1);
  });

  it("should fall back to sentence and word boundaries", () => {
    const chunker = new RecursiveChunker({ chunkSize: 12, chunkOverlap: 0 });
    const chunks = chunker.split("One two. Three four. Five six.");

    expect(chunks.map((c) => c.content)).toEqual(["One two.", "Three four.", "Five six."]);
    expect(chunks.map((c) => c.startOffset)).toEqual([0, 9, 21]);
  });

  it("should never produce chunks longer than the target for separable text", () => {
    const chunker = new RecursiveChunker({ chunkSize: 50, chunkOverlap: 10 });
    const text = Array.from({ length: 40 }, (_, i) => `word${i}`).join(" ");
    const chunks = chunker.split(text);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(50);
      expect(text.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.content);
    }
  });

  it("should reject invalid sizes", () => {
    expect(() => new RecursiveChunker({ chunkSize: 0 })).toThrow(RangeError);
    expect(() => new RecursiveChunker({ chunkSize: 100, chunkOverlap: 100 })).toThrow(RangeError);
    expect(() => new RecursiveChunker({ chunkSize: 100, chunkOverlap: -1 })).toThrow(RangeError);
  });
});

describe("countSentences / countWords", () => {
  it("should count terminal punctuation with a floor of one", () => {
    expect(countSentences("No punctuation")).toBe(1);
    expect(countSentences("One. Two! Three?")).toBe(3);
  });

  it("should split words on any whitespace", () => {
    expect(countWords("  a\tb\n\nc ")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});

describe("chunkStats", () => {
  it("should summarise chunk sizes", () => {
    const chunker = new RecursiveChunker({ chunkSize: 10, chunkOverlap: 0 });
    const stats = chunkStats(chunker.split("abcdefghijklmnopqrstuvwxy"));

    expect(stats).toEqual({
      totalChunks: 3,
      minChunkSize: 5,
      maxChunkSize: 10,
      avgChunkSize: 25 / 3,
      avgWordCount: 1,
      totalCharacters: 25,
    });
  });

  it("should be all zeros for no chunks", () => {
    expect(chunkStats([]).totalChunks).toBe(0);
  });
});
