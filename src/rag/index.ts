export { RagPipeline, createRagPipeline } from "./pipeline.js";
export type { RagPipelineComponents, CreateRagPipelineOptions, IngestOptions, QueryOptions, ContextOptions } from "./pipeline.js";
export { DEFAULT_RAG_CONFIG, loadRagConfig, type RagConfig } from "./config.js";
export * from "./errors.js";
export * from "./types.js";
export { DocumentExtractor, type DocumentExtractorOptions } from "./extraction/index.js";
export { detectMimeType, unpdfEngine, pdfjsEngine, type PdfEngine, type PdfDocumentHandle } from "./extraction/index.js";
export { RecursiveChunker, chunkStats, type ChunkingStrategy } from "./chunking/index.js";
export { EmbeddingEngine, type EmbeddingBackend, type BatchEmbeddingResult } from "./embedding-service.js";
export { OpenRouterEmbeddings } from "./openrouter-embeddings.js";
export { cosineSimilarity, mostSimilar, cosineToScore, type SimilarityMatch } from "./similarity.js";
export { VectorIndex, normalizeMetadata, type VectorIndexOptions } from "./vector-store.js";
export { assembleContext, collectSources, formatSources, CONTEXT_SEPARATOR } from "./context-builder.js";
