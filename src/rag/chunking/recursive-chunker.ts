import type { ChunkStats, Logger, Metadata, TextChunk } from "../types.js";
import { silentLogger } from "../types.js";
import type { ChunkingStrategy } from "./types.js";

/** Highest priority first; "" means a hard character cut. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", "; ", ": ", ", ", " ", ""] as const;

export interface RecursiveChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: readonly string[];
  log?: Logger;
}

/** Splits on `separator`, keeping it at the end of the piece it closes. */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") return Array.from(text);

  const pieces: string[] = [];
  let start = 0;
  let idx = text.indexOf(separator);
  while (idx !== -1) {
    const end = idx + separator.length;
    pieces.push(text.slice(start, end));
    start = end;
    idx = text.indexOf(separator, end);
  }
  if (start < text.length) pieces.push(text.slice(start));
  return pieces;
}

export function countSentences(text: string): number {
  const matches = text.match(/[.!?]/g);
  return Math.max(1, matches?.length ?? 0);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== "").length;
}

/**
 * Recursive boundary-seeking splitter. Pieces shorter than the target size
 * are merged greedily; consecutive chunks share up to `chunkOverlap`
 * characters of trailing pieces.
 */
export class RecursiveChunker implements ChunkingStrategy {
  readonly name = "recursive";
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: readonly string[];
  private readonly log: Logger;

  constructor(options: RecursiveChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 200;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
    this.log = options.log ?? silentLogger;

    if (this.chunkSize <= 0) throw new RangeError(`chunkSize must be positive, got ${this.chunkSize}`);
    if (this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new RangeError(
        `chunkOverlap must be between 0 and chunkSize (${this.chunkSize}), got ${this.chunkOverlap}`,
      );
    }
  }

  split(text: string, metadata: Metadata = {}): TextChunk[] {
    if (!text.trim()) return [];

    const pieces = this.splitRecursive(text, this.separators);
    const source = typeof metadata.filename === "string" ? metadata.filename : "unknown";

    const chunks: TextChunk[] = [];
    let previousStart = -1;
    let previousEnd = 0;
    for (const content of pieces) {
      // Overlapping chunks begin inside the previous one, so search from just past its start
      let startOffset = text.indexOf(content, previousStart + 1);
      if (startOffset === -1) startOffset = previousEnd;
      const endOffset = startOffset + content.length;

      chunks.push({
        content,
        index: chunks.length,
        startOffset,
        endOffset,
        metadata: {
          ...metadata,
          chunkSize: content.length,
          wordCount: countWords(content),
          sentenceCount: countSentences(content),
          originalDocument: source,
        },
      });
      previousStart = startOffset;
      previousEnd = endOffset;
    }
    return chunks;
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i] ?? "";
      if (candidate === "" || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const chunks: string[] = [];
    let fitting: string[] = [];
    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length < this.chunkSize) {
        fitting.push(piece);
        continue;
      }
      if (fitting.length > 0) {
        chunks.push(...this.merge(fitting));
        fitting = [];
      }
      if (remaining.length === 0) {
        const trimmed = piece.trim();
        if (trimmed) chunks.push(trimmed);
      } else {
        chunks.push(...this.splitRecursive(piece, remaining));
      }
    }
    if (fitting.length > 0) chunks.push(...this.merge(fitting));
    return chunks;
  }

  private merge(pieces: string[]): string[] {
    const chunks: string[] = [];
    const current: string[] = [];
    let total = 0;

    const flush = () => {
      const chunk = current.join("").trim();
      if (chunk) chunks.push(chunk);
    };

    for (const piece of pieces) {
      if (total + piece.length > this.chunkSize && current.length > 0) {
        if (total > this.chunkSize) {
          this.log(`RAG: created a chunk of ${total} characters, above the ${this.chunkSize} target`);
        }
        flush();
        // Drop leading pieces until what is carried over fits the overlap and leaves room
        while (total > this.chunkOverlap || (total + piece.length > this.chunkSize && total > 0)) {
          const dropped = current.shift();
          if (dropped === undefined) break;
          total -= dropped.length;
        }
      }
      current.push(piece);
      total += piece.length;
    }
    flush();
    return chunks;
  }
}

export function chunkStats(chunks: TextChunk[]): ChunkStats {
  if (chunks.length === 0) {
    return { totalChunks: 0, minChunkSize: 0, maxChunkSize: 0, avgChunkSize: 0, avgWordCount: 0, totalCharacters: 0 };
  }
  const sizes = chunks.map((c) => c.content.length);
  const words = chunks.map((c) => countWords(c.content));
  const totalCharacters = sizes.reduce((a, b) => a + b, 0);
  return {
    totalChunks: chunks.length,
    minChunkSize: Math.min(...sizes),
    maxChunkSize: Math.max(...sizes),
    avgChunkSize: totalCharacters / chunks.length,
    avgWordCount: words.reduce((a, b) => a + b, 0) / chunks.length,
    totalCharacters,
  };
}
