import { getDocumentProxy } from "unpdf";
import { z } from "zod";
import { ExtractionFailedError, errorMessage } from "../errors.js";
import type { ExtractionAttempt, Logger, Metadata } from "../types.js";
import type { DocumentHandler, HandlerResult } from "./types.js";

/** An opened PDF, page numbers are 1-based. */
export interface PdfDocumentHandle {
  numPages: number;
  pageText(pageNumber: number): Promise<string>;
  info(): Promise<Metadata>;
  close(): Promise<void>;
}

export interface PdfEngine {
  readonly name: string;
  open(data: Uint8Array): Promise<PdfDocumentHandle>;
}

// The subset of pdf.js' PDFDocumentProxy both engines expose
interface PdfJsDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<{
    getTextContent(): Promise<{ items: ReadonlyArray<object> }>;
  }>;
  getMetadata(): Promise<{ info: unknown }>;
  destroy(): Promise<void>;
}

const optionalString = z.string().optional().catch(undefined);

const pdfInfoSchema = z.object({
  Title: optionalString,
  Author: optionalString,
  Subject: optionalString,
  Creator: optionalString,
  Producer: optionalString,
  CreationDate: optionalString,
  ModDate: optionalString,
});

export function readPdfInfo(info: unknown): Metadata {
  const parsed = pdfInfoSchema.safeParse(info);
  if (!parsed.success) return {};

  const fields: Array<[string, string | undefined]> = [
    ["title", parsed.data.Title],
    ["author", parsed.data.Author],
    ["subject", parsed.data.Subject],
    ["creator", parsed.data.Creator],
    ["producer", parsed.data.Producer],
    ["creationDate", parsed.data.CreationDate],
    ["modificationDate", parsed.data.ModDate],
  ];
  const metadata: Metadata = {};
  for (const [key, value] of fields) {
    if (value?.trim()) metadata[key] = value.trim();
  }
  return metadata;
}

function joinTextItems(items: ReadonlyArray<object>): string {
  let text = "";
  for (const item of items) {
    if (!("str" in item) || typeof item.str !== "string") continue;
    text += item.str;
    text += "hasEOL" in item && item.hasEOL === true ? "\n" : " ";
  }
  return text;
}

function wrapPdfJsDocument(pdf: PdfJsDocument): PdfDocumentHandle {
  return {
    numPages: pdf.numPages,
    async pageText(pageNumber) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      return joinTextItems(content.items);
    },
    async info() {
      const { info } = await pdf.getMetadata();
      return readPdfInfo(info);
    },
    close: () => pdf.destroy(),
  };
}

export const unpdfEngine: PdfEngine = {
  name: "unpdf",
  async open(data) {
    return wrapPdfJsDocument(await getDocumentProxy(data));
  },
};

let _pdfjs: typeof import("pdfjs-dist/legacy/build/pdf.mjs") | null = null;

async function getPdfjs() {
  if (!_pdfjs) {
    // Polyfill DOM globals pdfjs-dist expects in Node.js before it loads
    const canvas = await import("@napi-rs/canvas");
    const g = globalThis as Record<string, unknown>;
    if (!g.DOMMatrix) g.DOMMatrix = canvas.DOMMatrix;
    if (!g.DOMPoint) g.DOMPoint = canvas.DOMPoint;
    if (!g.ImageData) g.ImageData = canvas.ImageData;
    if (!g.Path2D) g.Path2D = canvas.Path2D;
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

export const pdfjsEngine: PdfEngine = {
  name: "pdfjs-dist",
  async open(data) {
    const pdfjs = await getPdfjs();
    const pdf = await pdfjs.getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
    }).promise;
    return wrapPdfJsDocument(pdf);
  },
};

export const DEFAULT_PDF_ENGINES: readonly PdfEngine[] = [unpdfEngine, pdfjsEngine];

async function runEngine(
  engine: PdfEngine,
  data: Buffer,
  filePath: string,
  log: Logger,
): Promise<{ text: string; metadata: Metadata }> {
  // pdf.js may take ownership of the array it is given, so each engine gets a copy
  const doc = await engine.open(new Uint8Array(data));
  try {
    if (doc.numPages === 0) throw new Error("PDF has 0 pages");

    const pageTexts: string[] = [];
    let skippedPages = 0;
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      try {
        const text = await doc.pageText(pageNumber);
        if (text.trim()) {
          pageTexts.push(text);
        } else {
          skippedPages++;
        }
      } catch (err) {
        skippedPages++;
        log(`RAG: ${engine.name} could not read page ${pageNumber} of ${filePath}: ${errorMessage(err)}`);
      }
    }

    const text = pageTexts.join("\n\n");
    if (!text.trim()) throw new Error("No readable text found in PDF");

    let info: Metadata = {};
    try {
      info = await doc.info();
    } catch (err) {
      log(`RAG: ${engine.name} could not read metadata of ${filePath}: ${errorMessage(err)}`);
    }

    return {
      text,
      metadata: {
        pages: doc.numPages,
        skippedPages,
        processingEngine: engine.name,
        ...info,
      },
    };
  } finally {
    await doc.close().catch((err: unknown) => {
      log(`RAG: ${engine.name} failed to release ${filePath}: ${errorMessage(err)}`);
    });
  }
}

/** Tries each engine in order and keeps the first that yields text. */
export function createPdfExtractor(engines: readonly PdfEngine[] = DEFAULT_PDF_ENGINES): DocumentHandler {
  return async (data, filePath, log): Promise<HandlerResult> => {
    const attempts: ExtractionAttempt[] = [];

    for (const engine of engines) {
      try {
        const { text, metadata } = await runEngine(engine, data, filePath, log);
        attempts.push({ strategy: engine.name, ok: true });
        return { text, metadata, attempts };
      } catch (err) {
        attempts.push({ strategy: engine.name, ok: false, error: errorMessage(err) });
        log(`RAG: ${engine.name} failed on ${filePath}: ${errorMessage(err)}`);
      }
    }

    const details = attempts.map((a) => `  - ${a.strategy}: ${a.error ?? "failed"}`).join("\n");
    throw new ExtractionFailedError(
      `Failed to extract text from PDF ${filePath}:\n${details}\n` +
        "The PDF may be image-based (scanned) and require OCR, which is not supported.",
      attempts,
    );
  };
}
