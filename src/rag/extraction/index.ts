import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { NotFoundError, RagError, ExtractionFailedError, UnsupportedTypeError, errorMessage } from "../errors.js";
import { silentLogger, type DocumentType, type ExtractedContent, type Logger, type Metadata } from "../types.js";
import { extractDocx } from "./docx-extractor.js";
import { detectMimeType, documentTypeFor } from "./file-types.js";
import { createPdfExtractor, type PdfEngine } from "./pdf-extractor.js";
import { extractPlainText } from "./text-extractor.js";
import type { DocumentHandler, HandlerResult } from "./types.js";

export interface DocumentExtractorOptions {
  log?: Logger;
  /** PDF engines in the order they are tried. */
  pdfEngines?: readonly PdfEngine[];
}

export class DocumentExtractor {
  private readonly handlers: Record<DocumentType, DocumentHandler>;
  private readonly log: Logger;

  constructor(options: DocumentExtractorOptions = {}) {
    this.log = options.log ?? silentLogger;
    this.handlers = {
      pdf: createPdfExtractor(options.pdfEngines),
      docx: extractDocx,
      text: extractPlainText,
    };
  }

  get supportedTypes(): DocumentType[] {
    return ["pdf", "docx", "text"];
  }

  async extract(filePath: string): Promise<ExtractedContent> {
    const resolved = path.resolve(filePath);

    let fileStat: Stats;
    try {
      fileStat = await stat(resolved);
    } catch (err) {
      throw new NotFoundError(filePath, { cause: err });
    }
    if (!fileStat.isFile()) throw new NotFoundError(filePath);

    const mimeType = detectMimeType(resolved);
    const detectedType = documentTypeFor(mimeType);
    if (!detectedType) throw new UnsupportedTypeError(mimeType, filePath);

    let data: Buffer;
    try {
      data = await readFile(resolved);
    } catch (err) {
      throw new NotFoundError(filePath, { cause: err });
    }

    this.log(`RAG: extracting ${path.basename(resolved)} as ${mimeType}`);
    let result: HandlerResult;
    try {
      result = await this.handlers[detectedType](data, resolved, this.log);
    } catch (err) {
      if (err instanceof RagError) throw err;
      throw new ExtractionFailedError(`Failed to extract ${filePath}: ${errorMessage(err)}`, [], { cause: err });
    }

    const baseMetadata: Metadata = {
      filename: path.basename(resolved),
      fileSize: fileStat.size,
      createdAt: fileStat.birthtimeMs,
      modifiedAt: fileStat.mtimeMs,
      fileExtension: path.extname(resolved).toLowerCase(),
    };

    return {
      text: result.text,
      metadata: { ...result.metadata, ...baseMetadata },
      detectedType,
      mimeType,
      attempts: result.attempts,
    };
  }
}

export { detectMimeType, documentTypeFor, supportedMimeTypes } from "./file-types.js";
export {
  createPdfExtractor,
  unpdfEngine,
  pdfjsEngine,
  DEFAULT_PDF_ENGINES,
  readPdfInfo,
  type PdfEngine,
  type PdfDocumentHandle,
} from "./pdf-extractor.js";
export { readCoreProperties } from "./docx-extractor.js";
