import type { Metadata, TextChunk } from "../types.js";

export interface ChunkingStrategy {
  readonly name: string;
  split(text: string, metadata?: Metadata): TextChunk[];
}
