export { RecursiveChunker, chunkStats, countSentences, countWords, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export type { RecursiveChunkerOptions } from "./recursive-chunker.js";
export type { ChunkingStrategy } from "./types.js";
