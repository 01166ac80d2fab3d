import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { RecursiveChunker } from "./chunking/index.js";
import { loadRagConfig } from "./config.js";
import { EmbeddingEngine } from "./embedding-service.js";
import { IndexWriteError } from "./errors.js";
import { DocumentExtractor } from "./extraction/index.js";
import { createRagPipeline, RagPipeline } from "./pipeline.js";
import { HashEmbeddingBackend, makeTempDir, removeTempDir } from "./test-helpers.js";
import type { EmbeddingVector } from "./types.js";
import { VectorIndex } from "./vector-store.js";

/** `length` characters of words unique to `tag`, ending in a full stop. */
function paragraph(tag: string, length: number): string {
  let raw = "";
  for (let n = 0; raw.length < length; n++) raw += `${tag}word${n} `;
  return raw.slice(0, length - 1) + ".";
}

const P1 = paragraph("alpha", 866);
const P2 = paragraph("beta", 866);
const P3 = paragraph("gamma", 864);
const HANDBOOK = [P1, P2, P3].join("\n\n");

class FailingBackend extends HashEmbeddingBackend {
  constructor(private readonly failOn: string) {
    super(512);
  }

  override async embed(batch: string[]): Promise<number[][]> {
    if (batch.some((text) => text.includes(this.failOn))) throw new Error("embedding service unavailable");
    return super.embed(batch);
  }
}

class UnloadableBackend extends HashEmbeddingBackend {
  override async load(): Promise<void> {
    throw new Error("missing credentials");
  }
}

class UnwritableIndex extends VectorIndex {
  failInserts = false;

  override async insert(
    texts: string[],
    vectors: EmbeddingVector[],
    metadatas: Array<Record<string, unknown>>,
    ids?: string[],
  ): Promise<string[]> {
    if (this.failInserts) throw new IndexWriteError("disk full");
    return super.insert(texts, vectors, metadatas, ids);
  }
}

describe("RagPipeline", () => {
  let dir: string;
  let handbook: string;
  let backend: HashEmbeddingBackend;
  let pipeline: RagPipeline;

  function build(embeddings: HashEmbeddingBackend, batchSize = 32): RagPipeline {
    const config = loadRagConfig({}, {
      storagePath: path.join(dir, "store"),
      collectionName: "test_docs",
      queryPrefix: "",
      embeddingBatchSize: batchSize,
    });
    return createRagPipeline(config, { backend: embeddings });
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    handbook = path.join(dir, "handbook.txt");
    await writeFile(handbook, HANDBOOK);
    backend = new HashEmbeddingBackend(512);
    pipeline = build(backend);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("should ingest a document into paragraph-sized chunks", async () => {
    expect(HANDBOOK).toHaveLength(2600);

    const outcome = await pipeline.ingest(handbook);

    expect(outcome).toMatchObject({
      success: true,
      documentId: "handbook.txt",
      chunksAdded: 3,
      totalCharacters: 2600,
      fileType: "text",
      mimeType: "text/plain",
      embeddingDimension: 512,
      degradedChunks: 0,
    });
    expect(await pipeline.stats()).toMatchObject({
      initialized: true,
      documentCount: 1,
      totalChunks: 3,
      embeddingModel: "test-hash",
      chunkSize: 1000,
      chunkOverlap: 200,
      supportedTypes: ["pdf", "docx", "text"],
    });
  });

  it("should return the matching chunk first with its position metadata", async () => {
    await pipeline.ingest(handbook);

    const results = await pipeline.query(P2);

    expect(results).toHaveLength(3);
    expect(results[0]?.content).toBe(P2);
    expect(results[0]?.similarityScore).toBeGreaterThan(0.9);
    expect(results[0]?.metadata).toMatchObject({
      filename: "handbook.txt",
      chunkIndex: 1,
      startChar: 868,
      endChar: 1734,
      embeddingModel: "test-hash",
    });
  });

  it("should apply topK, filters and the similarity threshold", async () => {
    await pipeline.ingest(handbook);

    expect(await pipeline.query(P1, { topK: 1 })).toHaveLength(1);
    expect(await pipeline.query(P1, { filter: { filename: "other.txt" } })).toEqual([]);
    expect(await pipeline.query("unrelated", { similarityThreshold: 0.99 })).toEqual([]);
  });

  it("should answer blank queries with no results", async () => {
    await pipeline.ingest(handbook);
    expect(await pipeline.query("   ")).toEqual([]);
  });

  it("should build a context within the length budget", async () => {
    await pipeline.ingest(handbook);

    const context = await pipeline.buildContext(P1, { maxContextLength: 1000 });

    expect(context).toHaveLength(1000);
    expect(context.startsWith(`[Source: handbook.txt]\n${P1}\n\n---\n[Source: handbook.txt]\n`)).toBe(true);
    expect(context.endsWith("...")).toBe(true);
    expect(await pipeline.buildContext(P1, { maxContextLength: 50 })).toBe("");
  });

  it("should report a missing file without touching the index", async () => {
    await pipeline.ingest(handbook);

    const outcome = await pipeline.ingest(path.join(dir, "absent.txt"));

    expect(outcome).toMatchObject({ success: false, errorCode: "NotFound", chunksAdded: 0, fileType: "unknown" });
    expect((await pipeline.stats()).totalChunks).toBe(3);
  });

  it("should refuse documents that yield no chunks", async () => {
    const blank = path.join(dir, "blank.txt");
    await writeFile(blank, "   \n\n  ");

    const outcome = await pipeline.ingest(blank);

    expect(outcome).toMatchObject({
      success: false,
      error: "No chunks generated from document",
      errorCode: "NoChunks",
    });
  });

  it("should summarise batch ingestion", async () => {
    const missing = path.join(dir, "absent.txt");

    const summary = await pipeline.ingestMany([handbook, missing]);

    expect(summary).toMatchObject({ totalDocuments: 2, successful: 1, failed: 1, totalChunks: 3 });
    expect(summary.processedFiles).toEqual([{ file: handbook, chunks: 3, fileType: "text" }]);
    expect(summary.errors).toEqual([{ file: missing, error: `File not found: ${missing}`, errorCode: "NotFound" }]);
  });

  it("should replace earlier chunks of the same file on request", async () => {
    await pipeline.ingest(handbook);
    await pipeline.ingest(handbook);
    expect((await pipeline.stats()).totalChunks).toBe(6);

    await pipeline.ingest(handbook, { replaceExisting: true });
    expect((await pipeline.stats()).totalChunks).toBe(3);
  });

  it("should keep the previous chunks when a replacing insert fails", async () => {
    const config = loadRagConfig({}, { storagePath: path.join(dir, "store"), queryPrefix: "" });
    const index = new UnwritableIndex({ collectionName: config.collectionName, storagePath: config.storagePath });
    const replacing = new RagPipeline({
      config,
      extractor: new DocumentExtractor(),
      chunker: new RecursiveChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap }),
      engine: new EmbeddingEngine(backend),
      index,
    });
    await replacing.ingest(handbook);

    index.failInserts = true;
    const outcome = await replacing.ingest(handbook, { replaceExisting: true });

    expect(outcome).toMatchObject({ success: false, error: "disk full", errorCode: "IndexWrite" });
    expect((await replacing.stats()).totalChunks).toBe(3);
    expect((await replacing.query(P3, { topK: 1 }))[0]?.content).toBe(P3);
  });

  it("should delete a document by filename", async () => {
    await pipeline.ingest(handbook);

    expect(await pipeline.deleteDocument("handbook.txt")).toBe(true);
    expect(await pipeline.stats()).toMatchObject({ documentCount: 0, totalChunks: 0 });
  });

  it("should reset the collection", async () => {
    await pipeline.ingest(handbook);

    const outcome = await pipeline.reset();

    expect(outcome.success).toBe(true);
    expect(outcome.before.totalChunks).toBe(3);
    expect(outcome.after.totalChunks).toBe(0);
  });

  it("should initialize once", async () => {
    await pipeline.initialize();
    await pipeline.initialize();
    await pipeline.ingest(handbook);

    expect(backend.loadCalls).toBe(1);
  });

  it("should store chunks of failed batches as degraded", async () => {
    const degrading = build(new FailingBackend("betaword"), 1);

    const outcome = await degrading.ingest(handbook);

    expect(outcome).toMatchObject({ success: true, chunksAdded: 3, degradedChunks: 1 });
  });

  it("should report a model load failure", async () => {
    const broken = build(new UnloadableBackend(512));

    const outcome = await broken.ingest(handbook);

    expect(outcome).toMatchObject({ success: false, errorCode: "ModelLoadFailed", chunksAdded: 0 });
    expect(await broken.query(P1)).toEqual([]);
  });
});
