import { mkdir } from "node:fs/promises";
import path from "node:path";
import { LocalIndex, type MetadataFilter as VectraFilter } from "vectra";
import {
  DimensionMismatchError,
  IndexInitError,
  IndexWriteError,
  LengthMismatchError,
  errorMessage,
} from "./errors.js";
import { cosineToScore } from "./similarity.js";
import {
  silentLogger,
  type EmbeddingVector,
  type IndexStats,
  type Logger,
  type Metadata,
  type MetadataFilter,
  type MetadataValue,
  type SearchResult,
} from "./types.js";

/** Metadata key the record text is stored under. */
const TEXT_KEY = "_text";

interface StoredItem {
  id: string;
  vector: number[];
  metadata: Record<string, MetadataValue>;
}

export interface VectorIndexOptions {
  collectionName: string;
  storagePath: string;
  /** Expected vector dimension; taken from the stored records when omitted. */
  dimensions?: number;
  log?: Logger;
}

function normalizeValue(value: unknown): MetadataValue {
  if (value === null || value === undefined) return "";
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/** Coerces arbitrary metadata to string / number / boolean values. */
export function normalizeMetadata(metadata: Record<string, unknown>): Metadata {
  const normalized: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    normalized[key] = normalizeValue(value);
  }
  return normalized;
}

// Plain values are equality conditions in vectra's filter language
function toVectraFilter(filter: MetadataFilter | undefined): VectraFilter | undefined {
  if (!filter || Object.keys(filter).length === 0) return undefined;
  const where: VectraFilter = {};
  for (const [key, value] of Object.entries(filter)) {
    where[key] = value;
  }
  return where;
}

function toResult(item: StoredItem, similarityScore: number): SearchResult {
  const { [TEXT_KEY]: text, ...metadata } = item.metadata;
  return {
    content: text === undefined ? "" : String(text),
    metadata,
    similarityScore,
    recordId: item.id,
  };
}

/**
 * A named, persistent collection of (text, vector, metadata) records stored
 * in a vectra LocalIndex under `<storagePath>/<collectionName>`.
 */
export class VectorIndex {
  readonly collectionName: string;
  readonly storagePath: string;
  readonly location: string;
  private readonly index: LocalIndex;
  private readonly log: Logger;
  private readonly configuredDimensions: number | undefined;
  private dimensions: number | undefined;
  private opening: Promise<void> | null = null;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(options: VectorIndexOptions) {
    this.collectionName = options.collectionName;
    this.storagePath = path.resolve(options.storagePath);
    this.location = path.join(this.storagePath, this.collectionName);
    this.configuredDimensions = options.dimensions;
    this.dimensions = options.dimensions;
    this.log = options.log ?? silentLogger;
    this.index = new LocalIndex(this.location);
  }

  /** Creates the collection if absent, otherwise loads it. Idempotent. */
  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.openIndex().catch((err: unknown) => {
        this.opening = null;
        throw new IndexInitError(this.location, { cause: err });
      });
    }
    return this.opening;
  }

  private async openIndex(): Promise<void> {
    await mkdir(this.storagePath, { recursive: true });
    if (await this.index.isIndexCreated()) {
      const items = await this.index.listItems();
      const stored = items[0]?.vector.length;
      if (stored !== undefined) {
        if (this.configuredDimensions !== undefined && stored !== this.configuredDimensions) {
          throw new DimensionMismatchError(this.configuredDimensions, stored);
        }
        this.dimensions = stored;
      }
      this.log(`RAG: opened collection ${this.collectionName} (${items.length} records)`);
    } else {
      await this.index.createIndex({ version: 1 });
      this.log(`RAG: created collection ${this.collectionName} at ${this.location}`);
    }
  }

  // Writes run one at a time so each batch lands as a single vectra update
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task, task);
    // The chain only orders tasks; each caller still sees its own rejection through `run`
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async readWithRetry<T>(label: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (err) {
      this.log(`RAG: ${label} failed, retrying: ${errorMessage(err)}`);
      return read();
    }
  }

  private async items(filter?: MetadataFilter): Promise<StoredItem[]> {
    await this.open();
    const where = toVectraFilter(filter);
    return where ? this.index.listItemsByMetadata(where) : this.index.listItems();
  }

  /** Ids of the records whose metadata equals `filter` on every key. */
  async findIds(filter: MetadataFilter): Promise<string[]> {
    const items = await this.readWithRetry("lookup", () => this.items(filter));
    return items.map((item) => item.id);
  }

  async insert(
    texts: string[],
    vectors: EmbeddingVector[],
    metadatas: Array<Record<string, unknown>>,
    ids?: string[],
  ): Promise<string[]> {
    if (texts.length !== vectors.length || texts.length !== metadatas.length) {
      throw new LengthMismatchError(
        `texts (${texts.length}), vectors (${vectors.length}) and metadatas (${metadatas.length}) must have the same length`,
      );
    }
    if (ids && ids.length !== texts.length) {
      throw new LengthMismatchError(`ids (${ids.length}) must match texts (${texts.length})`);
    }
    if (texts.length === 0) return [];

    await this.open();
    return this.serialize(async () => {
      const stored = (await this.index.listItems())[0]?.vector.length;
      const expected = stored ?? this.dimensions ?? vectors[0]?.length ?? 0;
      const mismatched = vectors.find((v) => v.length !== expected);
      if (mismatched) throw new DimensionMismatchError(expected, mismatched.length);

      const assigned: string[] = [];
      await this.index.beginUpdate();
      try {
        for (let i = 0; i < texts.length; i++) {
          const item = await this.index.insertItem({
            id: ids?.[i],
            vector: vectors[i],
            metadata: { ...normalizeMetadata(metadatas[i] ?? {}), [TEXT_KEY]: texts[i] ?? "" },
          });
          assigned.push(item.id);
        }
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        this.log(`RAG: insert of ${texts.length} records failed: ${errorMessage(err)}`);
        throw new IndexWriteError(`Could not add records to ${this.collectionName}: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      this.dimensions = expected;
      this.log(`RAG: added ${assigned.length} records to ${this.collectionName}`);
      return assigned;
    });
  }

  /** Results scored (1 + cosine) / 2, best first. Failed reads are retried once, then answered with []. */
  async search(queryVector: EmbeddingVector, topK: number, filter?: MetadataFilter): Promise<SearchResult[]> {
    if (queryVector.length === 0 || topK <= 0) return [];
    await this.open();
    if (this.dimensions !== undefined && queryVector.length !== this.dimensions) {
      this.log(`RAG: query vector has ${queryVector.length} dimensions, collection has ${this.dimensions}`);
      return [];
    }

    const where = toVectraFilter(filter);
    try {
      const matches = await this.readWithRetry("search", () => this.index.queryItems(queryVector, topK, where));
      // vectra scores zero vectors NaN; they rank as orthogonal
      return matches
        .map(({ item, score }) => ({ item, score: cosineToScore(Number.isFinite(score) ? score : 0) }))
        .sort((a, b) => b.score - a.score)
        .map(({ item, score }) => toResult(item, score));
    } catch (err) {
      this.log(`RAG: search failed: ${errorMessage(err)}`);
      return [];
    }
  }

  async getById(id: string): Promise<SearchResult | null> {
    await this.open();
    try {
      const item = await this.readWithRetry("lookup", () => this.index.getItem(id));
      return item ? toResult(item, 1.0) : null;
    } catch (err) {
      this.log(`RAG: lookup of ${id} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async deleteByIds(ids: string[]): Promise<boolean> {
    await this.open();
    return this.serialize(() => this.deleteItems(ids));
  }

  async deleteByMetadata(filter: MetadataFilter): Promise<boolean> {
    if (Object.keys(filter).length === 0) {
      this.log("RAG: refusing to delete with an empty metadata filter");
      return false;
    }
    await this.open();
    return this.serialize(async () => {
      let ids: string[];
      try {
        ids = (await this.items(filter)).map((item) => item.id);
      } catch (err) {
        this.log(`RAG: delete by ${JSON.stringify(filter)} failed: ${errorMessage(err)}`);
        return false;
      }
      return this.deleteItems(ids);
    });
  }

  private async deleteItems(ids: string[]): Promise<boolean> {
    if (ids.length === 0) return true;
    try {
      await this.index.beginUpdate();
    } catch (err) {
      this.log(`RAG: delete of ${ids.length} records failed: ${errorMessage(err)}`);
      return false;
    }
    try {
      for (const id of ids) {
        await this.index.deleteItem(id);
      }
      await this.index.endUpdate();
      this.log(`RAG: deleted ${ids.length} records from ${this.collectionName}`);
      return true;
    } catch (err) {
      this.index.cancelUpdate();
      this.log(`RAG: delete of ${ids.length} records failed: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Full scan on every call: distinct documents are counted by `filename`. */
  async stats(): Promise<IndexStats> {
    const items = await this.readWithRetry("stats", () => this.items());
    const filenames = new Set<string>();
    for (const item of items) {
      const filename = item.metadata.filename;
      filenames.add(filename === undefined ? "unknown" : String(filename));
    }
    return {
      collectionName: this.collectionName,
      storagePath: this.location,
      recordCount: items.length,
      distinctDocumentCount: filenames.size,
    };
  }

  /** Drops every record and recreates the empty collection under the same name. */
  async reset(): Promise<void> {
    await this.open();
    await this.serialize(async () => {
      await this.index.createIndex({ version: 1, deleteIfExists: true });
      this.dimensions = this.configuredDimensions;
      this.log(`RAG: reset collection ${this.collectionName}`);
    });
  }
}
