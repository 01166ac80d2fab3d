import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface RagConfig {
  collectionName: string;
  storagePath: string;

  chunkSize: number;
  chunkOverlap: number;

  embeddingModel: string;
  embeddingDimensions: number;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  embeddingApiUrl: string;

  queryPrefix: string;

  topK: number;
  similarityThreshold: number;

  maxContextLength: number;
  minPartialContext: number;
}

export const DEFAULT_RAG_CONFIG: RagConfig = {
  collectionName: "rag_documents",
  storagePath: path.resolve("data/vectra"),

  chunkSize: 1000,
  chunkOverlap: 200,

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingDimensions: 4096,
  embeddingBatchSize: 32,
  embeddingConcurrency: 4,
  embeddingApiUrl: "https://openrouter.ai/api/v1/embeddings",

  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",

  topK: 5,
  similarityThreshold: 0,

  maxContextLength: 2000,
  minPartialContext: 100,
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  RAG_COLLECTION_NAME: z.string().regex(/^[\w.-]+$/, "letters, digits, '_', '.' and '-' only").optional(),
  RAG_STORAGE_PATH: z.string().min(1).optional(),
  RAG_CHUNK_SIZE: positiveInt.optional(),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).optional(),
  RAG_EMBEDDING_DIMENSIONS: positiveInt.optional(),
  RAG_EMBEDDING_BATCH_SIZE: positiveInt.optional(),
  RAG_EMBEDDING_CONCURRENCY: positiveInt.optional(),
  RAG_EMBEDDING_API_URL: z.string().url().optional(),
  RAG_QUERY_PREFIX: z.string().optional(),
  RAG_TOP_K: positiveInt.optional(),
  RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  RAG_MAX_CONTEXT_LENGTH: positiveInt.optional(),
});

/**
 * Defaults overlaid with `RAG_*` environment variables, then with explicit
 * overrides. Throws ConfigError on invalid values.
 */
export function loadRagConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<RagConfig> = {},
): RagConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid RAG configuration: ${issues}`);
  }
  const e = parsed.data;

  const config: RagConfig = {
    ...DEFAULT_RAG_CONFIG,
    collectionName: e.RAG_COLLECTION_NAME ?? DEFAULT_RAG_CONFIG.collectionName,
    storagePath: e.RAG_STORAGE_PATH ? path.resolve(e.RAG_STORAGE_PATH) : DEFAULT_RAG_CONFIG.storagePath,
    chunkSize: e.RAG_CHUNK_SIZE ?? DEFAULT_RAG_CONFIG.chunkSize,
    chunkOverlap: e.RAG_CHUNK_OVERLAP ?? DEFAULT_RAG_CONFIG.chunkOverlap,
    embeddingModel: e.RAG_EMBEDDING_MODEL ?? DEFAULT_RAG_CONFIG.embeddingModel,
    embeddingDimensions: e.RAG_EMBEDDING_DIMENSIONS ?? DEFAULT_RAG_CONFIG.embeddingDimensions,
    embeddingBatchSize: e.RAG_EMBEDDING_BATCH_SIZE ?? DEFAULT_RAG_CONFIG.embeddingBatchSize,
    embeddingConcurrency: e.RAG_EMBEDDING_CONCURRENCY ?? DEFAULT_RAG_CONFIG.embeddingConcurrency,
    embeddingApiUrl: e.RAG_EMBEDDING_API_URL ?? DEFAULT_RAG_CONFIG.embeddingApiUrl,
    queryPrefix: e.RAG_QUERY_PREFIX ?? DEFAULT_RAG_CONFIG.queryPrefix,
    topK: e.RAG_TOP_K ?? DEFAULT_RAG_CONFIG.topK,
    similarityThreshold: e.RAG_SIMILARITY_THRESHOLD ?? DEFAULT_RAG_CONFIG.similarityThreshold,
    maxContextLength: e.RAG_MAX_CONTEXT_LENGTH ?? DEFAULT_RAG_CONFIG.maxContextLength,
    ...overrides,
  };

  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError(
      `Chunk overlap (${config.chunkOverlap}) must be smaller than chunk size (${config.chunkSize})`,
    );
  }
  return config;
}
