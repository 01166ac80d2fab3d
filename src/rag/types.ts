export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/** Equality filter: every key must match the record's value exactly. */
export type MetadataFilter = Record<string, MetadataValue>;

export type Logger = (msg: string) => void;

export const silentLogger: Logger = () => {};

export type DocumentType = "pdf" | "docx" | "text";

export interface ExtractionAttempt {
  strategy: string;
  ok: boolean;
  error?: string;
}

export interface ExtractedContent {
  text: string;
  metadata: Metadata;
  detectedType: DocumentType;
  mimeType: string;
  attempts: ExtractionAttempt[];
}

export interface TextChunk {
  content: string;
  metadata: Metadata;
  index: number;
  startOffset: number;
  endOffset: number;
}

export interface ChunkStats {
  totalChunks: number;
  minChunkSize: number;
  maxChunkSize: number;
  avgChunkSize: number;
  avgWordCount: number;
  totalCharacters: number;
}

export type EmbeddingVector = number[];

export interface SearchResult {
  content: string;
  metadata: Metadata;
  similarityScore: number;
  recordId: string;
}

export interface IndexStats {
  collectionName: string;
  storagePath: string;
  recordCount: number;
  distinctDocumentCount: number;
}

export interface PipelineStats {
  initialized: boolean;
  collectionName: string;
  storagePath: string;
  documentCount: number;
  totalChunks: number;
  embeddingModel: string;
  embeddingDimensions: number;
  chunkSize: number;
  chunkOverlap: number;
  supportedTypes: DocumentType[];
}

export type IngestOutcome = IngestSuccess | IngestFailure;

export interface IngestSuccess {
  success: true;
  documentId: string;
  chunksAdded: number;
  totalCharacters: number;
  fileType: DocumentType;
  mimeType: string;
  chunkStats: ChunkStats;
  embeddingDimension: number;
  degradedChunks: number;
  extractionAttempts: ExtractionAttempt[];
}

export interface IngestFailure {
  success: false;
  error: string;
  errorCode: string;
  chunksAdded: 0;
  totalCharacters: 0;
  fileType: "unknown";
  extractionAttempts: ExtractionAttempt[];
}

export interface BatchIngestSummary {
  totalDocuments: number;
  successful: number;
  failed: number;
  totalChunks: number;
  processedFiles: Array<{ file: string; chunks: number; fileType: DocumentType }>;
  errors: Array<{ file: string; error: string; errorCode: string }>;
}

export interface ResetOutcome {
  success: boolean;
  before: PipelineStats;
  after: PipelineStats;
}
