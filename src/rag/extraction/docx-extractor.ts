import JSZip from "jszip";
import mammoth from "mammoth";
import { ExtractionFailedError, errorMessage } from "../errors.js";
import type { Logger, Metadata } from "../types.js";
import type { HandlerResult } from "./types.js";

const CORE_PROPERTIES: Array<[key: string, tag: string]> = [
  ["title", "dc:title"],
  ["author", "dc:creator"],
  ["subject", "dc:subject"],
  ["keywords", "cp:keywords"],
];

const XML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

function decodeXmlText(raw: string): string {
  return raw.replace(/&(#x[0-9a-f]+|#\d+|\w+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return XML_ENTITIES[entity] ?? match;
  });
}

function readElement(xml: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`).exec(xml);
  const value = match?.[1];
  return value === undefined ? undefined : decodeXmlText(value).trim();
}

/** Title, author, subject and keywords from docProps/core.xml, when present. */
export async function readCoreProperties(data: Buffer): Promise<Metadata> {
  const zip = await JSZip.loadAsync(data);
  const core = zip.file("docProps/core.xml");
  if (!core) return {};

  const xml = await core.async("string");
  const metadata: Metadata = {};
  for (const [key, tag] of CORE_PROPERTIES) {
    const value = readElement(xml, tag);
    if (value) metadata[key] = value;
  }
  return metadata;
}

export async function extractDocx(data: Buffer, filePath: string, log: Logger): Promise<HandlerResult> {
  let raw: string;
  try {
    const result = await mammoth.extractRawText({ buffer: data });
    raw = result.value;
  } catch (err) {
    const attempt = { strategy: "mammoth", ok: false, error: errorMessage(err) };
    throw new ExtractionFailedError(
      `Failed to read word document ${filePath}: ${errorMessage(err)}`,
      [attempt],
      { cause: err },
    );
  }

  // mammoth ends every paragraph, empty ones included, with a blank line
  const paragraphs = raw.split("\n\n").filter((p) => p.trim() !== "");
  const text = paragraphs.join("\n\n");

  let properties: Metadata = {};
  try {
    properties = await readCoreProperties(data);
  } catch (err) {
    log(`RAG: could not read document properties of ${filePath}: ${errorMessage(err)}`);
  }

  return {
    text,
    metadata: { paragraphs: paragraphs.length, ...properties },
    attempts: [{ strategy: "mammoth", ok: true }],
  };
}
