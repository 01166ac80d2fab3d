import type { SearchResult } from "./types.js";

export const CONTEXT_SEPARATOR = "\n---\n";

export interface ContextBudget {
  maxContextLength: number;
  /** Below this many remaining characters no truncated entry is added. */
  minPartialContext: number;
}

export interface SourceRef {
  source: string;
  chunks: number[];
}

function sourceName(result: SearchResult): string {
  const filename = result.metadata.filename;
  return filename === undefined || filename === "" ? "Unknown source" : String(filename);
}

export function formatEntry(result: SearchResult): string {
  return `[Source: ${sourceName(result)}]\n${result.content.trim()}\n`;
}

// Never leaves half of a surrogate pair at the cut
function truncate(text: string, length: number): string {
  const code = text.charCodeAt(length - 1);
  const end = code >= 0xd800 && code <= 0xdbff ? length - 1 : length;
  return text.slice(0, end);
}

/**
 * Packs results, best first, into at most `maxContextLength` characters
 * (separators included). When the next entry does not fit, a truncated copy
 * ending in "..." is added if more than `minPartialContext` characters remain.
 */
export function assembleContext(results: SearchResult[], budget: ContextBudget): string {
  const parts: string[] = [];
  let length = 0;

  for (const result of results) {
    const entry = formatEntry(result);
    const separatorLength = parts.length > 0 ? CONTEXT_SEPARATOR.length : 0;

    if (length + separatorLength + entry.length > budget.maxContextLength) {
      const remaining = budget.maxContextLength - length - separatorLength;
      if (remaining > budget.minPartialContext) {
        parts.push(truncate(entry, remaining - 3) + "...");
      }
      break;
    }

    parts.push(entry);
    length += separatorLength + entry.length;
  }

  return parts.join(CONTEXT_SEPARATOR);
}

/** Groups results by source file, listing the chunk indexes each contributed. */
export function collectSources(results: SearchResult[]): SourceRef[] {
  const sourceMap = new Map<string, Set<number>>();
  for (const result of results) {
    const key = sourceName(result);
    const chunks = sourceMap.get(key) ?? new Set<number>();
    const chunkIndex = result.metadata.chunkIndex;
    if (typeof chunkIndex === "number") chunks.add(chunkIndex);
    sourceMap.set(key, chunks);
  }

  const sources: SourceRef[] = [];
  for (const [source, chunks] of sourceMap) {
    sources.push({ source, chunks: [...chunks].sort((a, b) => a - b) });
  }
  return sources;
}

export function formatSources(sources: SourceRef[]): string {
  return sources
    .map((s) => {
      if (s.chunks.length === 0) return s.source;
      const chunkRefs = s.chunks.map((c) => `#${c}`).join(", ");
      return `${s.source} ${chunkRefs}`;
    })
    .join(" | ");
}
