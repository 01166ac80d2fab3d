import path from "node:path";
import type { DocumentType } from "../types.js";

export const UNKNOWN_MIME = "unknown";

const EXTENSION_MIME: Record<string, string> = {
  ".pdf": "application/pdf",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".txt": "text/plain",
  ".text": "text/plain",
  ".log": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".csv": "text/csv",
  // Recognised, but no handler is registered for these.
  ".doc": "application/msword",
  ".rtf": "application/rtf",
  ".odt": "application/vnd.oasis.opendocument.text",
};

const MIME_DOCUMENT_TYPE: Record<string, DocumentType> = {
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "text/plain": "text",
  "text/markdown": "text",
  "text/csv": "text",
};

export function detectMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_MIME[ext] ?? UNKNOWN_MIME;
}

/** Maps a MIME type to the handler family that extracts it, if any. */
export function documentTypeFor(mimeType: string): DocumentType | undefined {
  return MIME_DOCUMENT_TYPE[mimeType];
}

export function supportedMimeTypes(): string[] {
  return Object.keys(MIME_DOCUMENT_TYPE);
}
