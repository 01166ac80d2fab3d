import { ExtractionFailedError, errorMessage } from "../errors.js";
import type { HandlerResult } from "./types.js";

function countLines(text: string): number {
  if (text.length === 0) return 0;
  const lines = text.split(/\r\n|\r|\n/);
  // A trailing newline ends the last line rather than opening a new one
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
}

export async function extractPlainText(data: Buffer, filePath: string): Promise<HandlerResult> {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch (err) {
    const attempt = { strategy: "utf-8", ok: false, error: errorMessage(err) };
    throw new ExtractionFailedError(`${filePath} is not valid UTF-8 text`, [attempt], { cause: err });
  }

  return {
    text,
    metadata: { lines: countLines(text), characters: text.length },
    attempts: [{ strategy: "utf-8", ok: true }],
  };
}
