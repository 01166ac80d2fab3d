import type { ExtractionAttempt } from "./types.js";

export type RagErrorCode =
  | "NotFound"
  | "UnsupportedType"
  | "ExtractionFailed"
  | "ModelLoadFailed"
  | "LengthMismatch"
  | "DimensionMismatch"
  | "IndexInit"
  | "IndexWrite"
  | "Config";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class NotFoundError extends RagError {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super("NotFound", `File not found: ${filePath}`, options);
  }
}

export class UnsupportedTypeError extends RagError {
  readonly mimeType: string;

  constructor(mimeType: string, filePath: string) {
    super("UnsupportedType", `Unsupported file type: ${mimeType} (${filePath})`);
    this.mimeType = mimeType;
  }
}

export class ExtractionFailedError extends RagError {
  readonly attempts: ExtractionAttempt[];

  constructor(message: string, attempts: ExtractionAttempt[] = [], options?: { cause?: unknown }) {
    super("ExtractionFailed", message, options);
    this.attempts = attempts;
  }
}

export class ModelLoadFailedError extends RagError {
  constructor(model: string, options?: { cause?: unknown }) {
    const reason = options?.cause === undefined ? "" : `: ${errorMessage(options.cause)}`;
    super("ModelLoadFailed", `Could not load embedding model ${model}${reason}`, options);
  }
}

export class LengthMismatchError extends RagError {
  constructor(message: string) {
    super("LengthMismatch", message);
  }
}

export class DimensionMismatchError extends RagError {
  constructor(expected: number, actual: number) {
    super("DimensionMismatch", `Expected vectors of dimension ${expected}, got ${actual}`);
  }
}

export class IndexInitError extends RagError {
  constructor(location: string, options?: { cause?: unknown }) {
    const reason = options?.cause === undefined ? "" : `: ${errorMessage(options.cause)}`;
    super("IndexInit", `Could not open vector index at ${location}${reason}`, options);
  }
}

export class IndexWriteError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IndexWrite", message, options);
  }
}

export class ConfigError extends RagError {
  constructor(message: string) {
    super("Config", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof RagError ? err.code : "Unknown";
}
