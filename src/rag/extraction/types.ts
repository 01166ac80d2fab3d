import type { ExtractionAttempt, Logger, Metadata } from "../types.js";

export interface HandlerResult {
  text: string;
  metadata: Metadata;
  attempts: ExtractionAttempt[];
}

/** Extracts one document family from the raw bytes of a file. */
export type DocumentHandler = (
  data: Buffer,
  filePath: string,
  log: Logger,
) => Promise<HandlerResult>;
