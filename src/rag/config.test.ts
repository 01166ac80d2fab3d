import path from "node:path";
import { describe, it, expect } from "vitest";
import { DEFAULT_RAG_CONFIG, loadRagConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadRagConfig", () => {
  it("should return the defaults for an empty environment", () => {
    expect(loadRagConfig({})).toEqual(DEFAULT_RAG_CONFIG);
  });

  it("should read RAG_* variables", () => {
    const config = loadRagConfig({
      RAG_COLLECTION_NAME: "handbooks",
      RAG_STORAGE_PATH: "tmp/store",
      RAG_CHUNK_SIZE: "500",
      RAG_CHUNK_OVERLAP: "50",
      RAG_SIMILARITY_THRESHOLD: "0.25",
    });

    expect(config).toMatchObject({
      collectionName: "handbooks",
      storagePath: path.resolve("tmp/store"),
      chunkSize: 500,
      chunkOverlap: 50,
      similarityThreshold: 0.25,
    });
  });

  it("should let explicit overrides win over the environment", () => {
    expect(loadRagConfig({ RAG_TOP_K: "9" }, { topK: 2 }).topK).toBe(2);
  });

  it("should reject invalid values", () => {
    expect(() => loadRagConfig({ RAG_CHUNK_SIZE: "lots" })).toThrow(ConfigError);
    expect(() => loadRagConfig({ RAG_SIMILARITY_THRESHOLD: "1.5" })).toThrow(/RAG_SIMILARITY_THRESHOLD/);
    expect(() => loadRagConfig({ RAG_COLLECTION_NAME: "bad name" })).toThrow(ConfigError);
  });

  it("should require the overlap to be smaller than the chunk size", () => {
    expect(() => loadRagConfig({ RAG_CHUNK_SIZE: "100", RAG_CHUNK_OVERLAP: "100" })).toThrow(
      "Chunk overlap (100) must be smaller than chunk size (100)",
    );
  });
});
