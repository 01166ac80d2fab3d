import path from "node:path";
import type { RagConfig } from "./config.js";
import { chunkStats, RecursiveChunker, type ChunkingStrategy } from "./chunking/index.js";
import { assembleContext } from "./context-builder.js";
import { EmbeddingEngine, type EmbeddingBackend } from "./embedding-service.js";
import { ExtractionFailedError, errorCode, errorMessage } from "./errors.js";
import { DocumentExtractor, type PdfEngine } from "./extraction/index.js";
import { OpenRouterEmbeddings } from "./openrouter-embeddings.js";
import { retrieve } from "./retriever.js";
import {
  silentLogger,
  type BatchIngestSummary,
  type ExtractedContent,
  type ExtractionAttempt,
  type IngestFailure,
  type IngestOutcome,
  type Logger,
  type MetadataFilter,
  type PipelineStats,
  type ResetOutcome,
  type SearchResult,
} from "./types.js";
import { VectorIndex } from "./vector-store.js";

export interface RagPipelineComponents {
  config: RagConfig;
  extractor: DocumentExtractor;
  chunker: ChunkingStrategy;
  engine: EmbeddingEngine;
  index: VectorIndex;
  log?: Logger;
}

export interface IngestOptions {
  /** Replace chunks already indexed for the same filename once the new ones are stored. */
  replaceExisting?: boolean;
}

export interface QueryOptions {
  topK?: number;
  filter?: MetadataFilter;
  similarityThreshold?: number;
}

export interface ContextOptions {
  maxContextLength?: number;
  topK?: number;
}

function failure(error: string, code: string, attempts: ExtractionAttempt[] = []): IngestFailure {
  return {
    success: false,
    error,
    errorCode: code,
    chunksAdded: 0,
    totalCharacters: 0,
    fileType: "unknown",
    extractionAttempts: attempts,
  };
}

/**
 * Composes extraction, chunking, embedding and the vector index. Every call
 * initializes the pipeline on first use; ingestion and queries report
 * failures in their results instead of throwing.
 */
export class RagPipeline {
  readonly config: RagConfig;
  readonly extractor: DocumentExtractor;
  readonly chunker: ChunkingStrategy;
  readonly engine: EmbeddingEngine;
  readonly index: VectorIndex;
  private readonly log: Logger;
  private initializing: Promise<void> | null = null;
  private initialized = false;

  constructor(components: RagPipelineComponents) {
    this.config = components.config;
    this.extractor = components.extractor;
    this.chunker = components.chunker;
    this.engine = components.engine;
    this.index = components.index;
    this.log = components.log ?? silentLogger;
  }

  /** Opens the index and loads the embedding model; later calls are no-ops. */
  initialize(): Promise<void> {
    if (!this.initializing) {
      this.initializing = (async () => {
        this.log("RAG: initializing pipeline...");
        await this.index.open();
        await this.engine.load();
        this.initialized = true;
        const stats = await this.index.stats();
        this.log(`RAG ready: ${stats.distinctDocumentCount} document(s), ${stats.recordCount} chunks`);
      })().catch((err: unknown) => {
        this.initializing = null;
        this.log(`RAG: initialization failed: ${errorMessage(err)}`);
        throw err;
      });
    }
    return this.initializing;
  }

  async ingest(filePath: string, options: IngestOptions = {}): Promise<IngestOutcome> {
    const fileName = path.basename(filePath);

    try {
      await this.initialize();
    } catch (err) {
      return failure(errorMessage(err), errorCode(err));
    }

    let content: ExtractedContent;
    try {
      content = await this.extractor.extract(filePath);
    } catch (err) {
      this.log(`RAG: failed to extract ${fileName}: ${errorMessage(err)}`);
      const attempts = err instanceof ExtractionFailedError ? err.attempts : [];
      return failure(errorMessage(err), errorCode(err), attempts);
    }

    this.log(`RAG: chunking ${fileName} (${content.text.length} characters)...`);
    const chunks = this.chunker.split(content.text, content.metadata);
    if (chunks.length === 0) {
      this.log(`RAG: ${fileName} produced no chunks, skipping`);
      return failure("No chunks generated from document", "NoChunks", content.attempts);
    }

    try {
      this.log(`RAG: embedding ${fileName} (${chunks.length} chunks)...`);
      const texts = chunks.map((c) => c.content);
      const { vectors, degraded } = await this.engine.embedBatchDetailed(texts);
      const degradedChunks = degraded.filter(Boolean).length;
      if (degradedChunks > 0) {
        this.log(`RAG: ${degradedChunks} chunk(s) of ${fileName} were stored with zero vectors`);
      }

      const metadatas = chunks.map((chunk) => ({
        ...chunk.metadata,
        chunkIndex: chunk.index,
        startChar: chunk.startOffset,
        endChar: chunk.endOffset,
        embeddingModel: this.engine.model,
      }));

      const documentId = String(content.metadata.filename ?? fileName);
      // New chunks go in before the old ones leave, so a failed insert keeps the previous version
      const previousIds = options.replaceExisting ? await this.index.findIds({ filename: documentId }) : [];

      await this.index.insert(texts, vectors, metadatas);
      if (previousIds.length > 0) {
        const removed = await this.index.deleteByIds(previousIds);
        this.log(
          removed
            ? `RAG: replaced ${previousIds.length} previous chunk(s) of ${documentId}`
            : `RAG: could not remove ${previousIds.length} previous chunk(s) of ${documentId}, both versions are indexed`,
        );
      }
      this.log(`RAG: ${fileName} done (${chunks.length} chunks)`);

      return {
        success: true,
        documentId,
        chunksAdded: chunks.length,
        totalCharacters: content.text.length,
        fileType: content.detectedType,
        mimeType: content.mimeType,
        chunkStats: chunkStats(chunks),
        embeddingDimension: this.engine.dimensions,
        degradedChunks,
        extractionAttempts: content.attempts,
      };
    } catch (err) {
      this.log(`RAG: failed to index ${fileName}: ${errorMessage(err)}`);
      return failure(errorMessage(err), errorCode(err), content.attempts);
    }
  }

  async ingestMany(filePaths: string[], options: IngestOptions = {}): Promise<BatchIngestSummary> {
    const summary: BatchIngestSummary = {
      totalDocuments: filePaths.length,
      successful: 0,
      failed: 0,
      totalChunks: 0,
      processedFiles: [],
      errors: [],
    };

    for (const filePath of filePaths) {
      const outcome = await this.ingest(filePath, options);
      if (outcome.success) {
        summary.successful++;
        summary.totalChunks += outcome.chunksAdded;
        summary.processedFiles.push({ file: filePath, chunks: outcome.chunksAdded, fileType: outcome.fileType });
      } else {
        summary.failed++;
        summary.errors.push({ file: filePath, error: outcome.error, errorCode: outcome.errorCode });
      }
    }

    this.log(`RAG: batch complete: ${summary.successful}/${summary.totalDocuments} successful`);
    return summary;
  }

  /** Ranked matches above the threshold; blank queries and failures give []. */
  async query(text: string, options: QueryOptions = {}): Promise<SearchResult[]> {
    if (!text.trim()) return [];

    const similarityThreshold = options.similarityThreshold ?? this.config.similarityThreshold;
    try {
      await this.initialize();
      const results = await retrieve(text, this.engine, this.index, {
        topK: options.topK ?? this.config.topK,
        filter: options.filter,
        similarityThreshold,
      });
      this.log(`RAG: query returned ${results.length} result(s) at threshold ${similarityThreshold}`);
      return results;
    } catch (err) {
      this.log(`RAG: query failed: ${errorMessage(err)}`);
      return [];
    }
  }

  async buildContext(text: string, options: ContextOptions = {}): Promise<string> {
    const results = await this.query(text, { topK: options.topK ?? this.config.topK });
    return assembleContext(results, {
      maxContextLength: options.maxContextLength ?? this.config.maxContextLength,
      minPartialContext: this.config.minPartialContext,
    });
  }

  async deleteDocument(filename: string): Promise<boolean> {
    await this.initialize();
    const deleted = await this.index.deleteByMetadata({ filename });
    this.log(deleted ? `RAG: deleted document ${filename}` : `RAG: failed to delete document ${filename}`);
    return deleted;
  }

  async stats(): Promise<PipelineStats> {
    await this.initialize();
    const indexStats = await this.index.stats();
    return {
      initialized: this.initialized,
      collectionName: indexStats.collectionName,
      storagePath: indexStats.storagePath,
      documentCount: indexStats.distinctDocumentCount,
      totalChunks: indexStats.recordCount,
      embeddingModel: this.engine.model,
      embeddingDimensions: this.engine.dimensions,
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap,
      supportedTypes: this.extractor.supportedTypes,
    };
  }

  async reset(): Promise<ResetOutcome> {
    const before = await this.stats();
    let success = true;
    try {
      await this.index.reset();
    } catch (err) {
      success = false;
      this.log(`RAG: reset failed: ${errorMessage(err)}`);
    }
    const after = await this.stats();
    this.log(`RAG: reset ${before.totalChunks} -> ${after.totalChunks} chunks`);
    return { success, before, after };
  }
}

export interface CreateRagPipelineOptions {
  apiKey?: string;
  /** Embedding backend; defaults to the OpenRouter embeddings API. */
  backend?: EmbeddingBackend;
  pdfEngines?: readonly PdfEngine[];
  log?: Logger;
  onEmbeddingProgress?: (done: number, total: number) => void;
}

export function createRagPipeline(config: RagConfig, options: CreateRagPipelineOptions = {}): RagPipeline {
  const log = options.log ?? silentLogger;
  const backend =
    options.backend ??
    new OpenRouterEmbeddings({
      apiKey: options.apiKey,
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
      url: config.embeddingApiUrl,
    });

  return new RagPipeline({
    config,
    log,
    extractor: new DocumentExtractor({ log, pdfEngines: options.pdfEngines }),
    chunker: new RecursiveChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap, log }),
    engine: new EmbeddingEngine(backend, {
      batchSize: config.embeddingBatchSize,
      concurrency: config.embeddingConcurrency,
      queryPrefix: config.queryPrefix,
      log,
      onProgress: options.onEmbeddingProgress,
    }),
    index: new VectorIndex({
      collectionName: config.collectionName,
      storagePath: config.storagePath,
      dimensions: backend.dimensions,
      log,
    }),
  });
}
