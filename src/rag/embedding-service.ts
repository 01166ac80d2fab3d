import { ModelLoadFailedError, errorMessage } from "./errors.js";
import { cosineSimilarity, mostSimilar, zeroVector, type SimilarityMatch } from "./similarity.js";
import { silentLogger, type EmbeddingVector, type Logger } from "./types.js";

/** A source of fixed-dimension text embeddings. */
export interface EmbeddingBackend {
  readonly model: string;
  readonly dimensions: number;
  /** Called once before the first embedding; a rejection is fatal. */
  load(): Promise<void>;
  embed(batch: string[]): Promise<number[][]>;
}

export interface EmbeddingEngineOptions {
  batchSize?: number;
  /** Batches in flight at once. */
  concurrency?: number;
  /** Prepended to query text by `embedQuery`. */
  queryPrefix?: string;
  log?: Logger;
  onProgress?: (done: number, total: number) => void;
}

export interface FailedBatch {
  /** Positions in the input of the texts the batch carried. */
  inputs: number[];
  error: string;
}

export interface BatchEmbeddingResult {
  vectors: EmbeddingVector[];
  /** True where the input was non-empty but its batch failed and got a zero vector. */
  degraded: boolean[];
  failedBatches: FailedBatch[];
}

export interface EmbeddingEngineInfo {
  model: string;
  dimensions: number;
  batchSize: number;
  loaded: boolean;
}

export class EmbeddingEngine {
  readonly batchSize: number;
  private readonly backend: EmbeddingBackend;
  private readonly concurrency: number;
  private readonly queryPrefix: string;
  private readonly log: Logger;
  private readonly onProgress: ((done: number, total: number) => void) | undefined;
  private loading: Promise<void> | null = null;
  private loaded = false;

  constructor(backend: EmbeddingBackend, options: EmbeddingEngineOptions = {}) {
    this.backend = backend;
    this.batchSize = Math.max(1, options.batchSize ?? 32);
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.queryPrefix = options.queryPrefix ?? "";
    this.log = options.log ?? silentLogger;
    this.onProgress = options.onProgress;
  }

  get model(): string {
    return this.backend.model;
  }

  get dimensions(): number {
    return this.backend.dimensions;
  }

  /**
   * Loads the backend once. Concurrent callers share the attempt, and a
   * failure sticks: later calls reject with the same ModelLoadFailedError.
   */
  load(): Promise<void> {
    if (!this.loading) {
      this.log(`RAG: loading embedding model ${this.model}`);
      this.loading = this.backend.load().then(
        () => {
          this.loaded = true;
          this.log(`RAG: embedding model ${this.model} ready (${this.dimensions} dimensions)`);
        },
        (err: unknown) => {
          this.log(`RAG: failed to load embedding model ${this.model}: ${errorMessage(err)}`);
          throw new ModelLoadFailedError(this.model, { cause: err });
        },
      );
    }
    return this.loading;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    if (!text.trim()) return zeroVector(this.dimensions);
    const { vectors } = await this.embedBatchDetailed([text]);
    return vectors[0] ?? zeroVector(this.dimensions);
  }

  async embedQuery(query: string): Promise<EmbeddingVector> {
    if (!query.trim()) return zeroVector(this.dimensions);
    return this.embed(this.queryPrefix + query);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const { vectors } = await this.embedBatchDetailed(texts);
    return vectors;
  }

  /**
   * Embeds `texts` preserving order and count. Empty inputs map to zero
   * vectors; a batch that fails degrades its inputs to zero vectors instead
   * of rejecting. Only a model load failure rejects.
   */
  async embedBatchDetailed(texts: string[]): Promise<BatchEmbeddingResult> {
    const vectors = texts.map(() => zeroVector(this.dimensions));
    const degraded = texts.map(() => false);
    const failedBatches: FailedBatch[] = [];

    const positions: number[] = [];
    texts.forEach((text, i) => {
      if (text.trim()) positions.push(i);
    });
    if (positions.length === 0) return { vectors, degraded, failedBatches };

    await this.load();

    const batches: number[][] = [];
    for (let i = 0; i < positions.length; i += this.batchSize) {
      batches.push(positions.slice(i, i + this.batchSize));
    }

    let completed = 0;
    const runBatch = async (inputs: number[]) => {
      try {
        const embeddings = await this.backend.embed(inputs.map((i) => (texts[i] ?? "").trim()));
        if (embeddings.length !== inputs.length) {
          throw new Error(`expected ${inputs.length} embeddings, got ${embeddings.length}`);
        }
        const wrongSize = embeddings.find((e) => e.length !== this.dimensions);
        if (wrongSize) {
          throw new Error(`expected ${this.dimensions} dimensions, got ${wrongSize.length}`);
        }
        inputs.forEach((inputIdx, j) => {
          const embedding = embeddings[j];
          if (embedding) vectors[inputIdx] = embedding;
        });
      } catch (err) {
        for (const inputIdx of inputs) degraded[inputIdx] = true;
        failedBatches.push({ inputs, error: errorMessage(err) });
        this.log(`RAG: embedding batch of ${inputs.length} failed, using zero vectors: ${errorMessage(err)}`);
      }
      completed += inputs.length;
      this.onProgress?.(completed, positions.length);
    };

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from({ length: Math.min(this.concurrency, queue.length) }, async () => {
      for (let batch = queue.shift(); batch; batch = queue.shift()) {
        await runBatch(batch);
      }
    });
    await Promise.all(workers);

    return { vectors, degraded, failedBatches };
  }

  similarity(a: readonly number[], b: readonly number[]): number {
    return cosineSimilarity(a, b);
  }

  mostSimilar(query: readonly number[], candidates: readonly EmbeddingVector[], topK = 5): SimilarityMatch[] {
    return mostSimilar(query, candidates, topK);
  }

  info(): EmbeddingEngineInfo {
    return {
      model: this.model,
      dimensions: this.dimensions,
      batchSize: this.batchSize,
      loaded: this.loaded,
    };
  }
}
