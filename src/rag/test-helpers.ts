import JSZip from "jszip";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbeddingBackend } from "./embedding-service.js";

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/** Deterministic bag-of-words vectors: identical text gives identical vectors. */
export class HashEmbeddingBackend implements EmbeddingBackend {
  readonly model = "test-hash";
  readonly dimensions: number;
  loadCalls = 0;
  embedCalls: string[][] = [];

  constructor(dimensions = 128) {
    this.dimensions = dimensions;
  }

  async load(): Promise<void> {
    this.loadCalls++;
  }

  async embed(batch: string[]): Promise<number[][]> {
    this.embedCalls.push(batch);
    return batch.map((text) => {
      const vector = new Array<number>(this.dimensions).fill(0);
      for (const token of text.toLowerCase().match(/\w+/g) ?? []) {
        const slot = fnv1a(token) % this.dimensions;
        vector[slot] = (vector[slot] ?? 0) + 1;
      }
      return vector;
    });
  }
}

/** Returns fixed vectors per text, zeros for anything unknown. */
export class StubEmbeddingBackend implements EmbeddingBackend {
  readonly model = "test-stub";
  readonly dimensions: number;
  private readonly vectors: Map<string, number[]>;

  constructor(vectors: Record<string, number[]>, dimensions: number) {
    this.vectors = new Map(Object.entries(vectors));
    this.dimensions = dimensions;
  }

  async load(): Promise<void> {}

  async embed(batch: string[]): Promise<number[][]> {
    return batch.map((text) => this.vectors.get(text) ?? new Array<number>(this.dimensions).fill(0));
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "docrag-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface DocxFixture {
  paragraphs: string[];
  title?: string;
  author?: string;
  keywords?: string;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Builds a minimal word-processing package in memory. */
export async function makeDocx(fixture: DocxFixture): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    "[Content_Types].xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
  <Override PartName="/docProps/core.xml" ContentType="application/vnd.openxmlformats-package.core-properties+xml"/>
</Types>`,
  );
  zip.file(
    "_rels/.rels",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
  <Relationship Id="rId2" Type="http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties" Target="docProps/core.xml"/>
</Relationships>`,
  );
  const body = fixture.paragraphs
    .map((p) => `<w:p><w:r><w:t xml:space="preserve">${escapeXml(p)}</w:t></w:r></w:p>`)
    .join("");
  zip.file(
    "word/document.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`,
  );

  const properties = [
    fixture.title === undefined ? "" : `<dc:title>${escapeXml(fixture.title)}</dc:title>`,
    fixture.author === undefined ? "" : `<dc:creator>${escapeXml(fixture.author)}</dc:creator>`,
    fixture.keywords === undefined ? "" : `<cp:keywords>${escapeXml(fixture.keywords)}</cp:keywords>`,
  ].join("");
  zip.file(
    "docProps/core.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/">${properties}</cp:coreProperties>`,
  );

  return zip.generateAsync({ type: "nodebuffer" });
}

/** A one-page PDF showing `text` in Helvetica, with a document title. */
export function makePdf(text: string, title: string): Buffer {
  const stream = `BT /F1 24 Tf 72 720 Td (${text}) Tj ET`;
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>",
    `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
    `<< /Title (${title}) >>`,
  ];

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 6 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, "latin1");
}
