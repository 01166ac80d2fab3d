#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadRagConfig } from "./rag/config.js";
import { collectSources, formatSources } from "./rag/context-builder.js";
import { errorMessage } from "./rag/errors.js";
import { createRagPipeline, type RagPipeline } from "./rag/pipeline.js";

const USAGE = `Usage: docrag <command> [options]

Commands:
  ingest <paths...> [--replace]                 extract, chunk, embed and store documents
  query <text> [--top-k n] [--threshold x]      show the best matching chunks
  context <text> [--max-length n] [--top-k n]   print the assembled prompt context
  stats                                         collection statistics
  delete <filename>                             remove every chunk of a document
  reset                                         drop all indexed documents`;

function parseNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`--${flag} expects a number, got "${value}"`);
  return n;
}

async function run(pipeline: RagPipeline, command: string, args: string[], values: Record<string, string | boolean | undefined>) {
  const topK = parseNumber(typeof values["top-k"] === "string" ? values["top-k"] : undefined, "top-k");

  switch (command) {
    case "ingest": {
      if (args.length === 0) throw new Error("ingest needs at least one path");
      const summary = await pipeline.ingestMany(args, { replaceExisting: values.replace === true });
      for (const file of summary.processedFiles) {
        console.log(`✓ ${file.file}: ${file.chunks} chunks (${file.fileType})`);
      }
      for (const err of summary.errors) {
        console.log(`✗ ${err.file}: [${err.errorCode}] ${err.error}`);
      }
      console.log(`${summary.successful}/${summary.totalDocuments} ingested, ${summary.totalChunks} chunks`);
      return summary.failed === 0 ? 0 : 1;
    }

    case "query": {
      const text = args.join(" ");
      const threshold = parseNumber(typeof values.threshold === "string" ? values.threshold : undefined, "threshold");
      const results = await pipeline.query(text, { topK, similarityThreshold: threshold });
      if (results.length === 0) {
        console.log("(no results)");
        return 0;
      }
      results.forEach((r, i) => {
        const preview = r.content.replace(/\s+/g, " ").slice(0, 160);
        console.log(`${i + 1}. [${r.similarityScore.toFixed(3)}] ${String(r.metadata.filename ?? "?")}: ${preview}`);
      });
      console.log(`\u{1F4C4} ${formatSources(collectSources(results))}`);
      return 0;
    }

    case "context": {
      const text = args.join(" ");
      const maxContextLength = parseNumber(
        typeof values["max-length"] === "string" ? values["max-length"] : undefined,
        "max-length",
      );
      const context = await pipeline.buildContext(text, { maxContextLength, topK });
      console.log(context || "(no context)");
      return 0;
    }

    case "stats": {
      const stats = await pipeline.stats();
      console.log(JSON.stringify(stats, null, 2));
      return 0;
    }

    case "delete": {
      const [filename] = args;
      if (!filename) throw new Error("delete needs a filename");
      const deleted = await pipeline.deleteDocument(filename);
      console.log(deleted ? `deleted ${filename}` : `could not delete ${filename}`);
      return deleted ? 0 : 1;
    }

    case "reset": {
      const outcome = await pipeline.reset();
      console.log(`reset: ${outcome.before.totalChunks} -> ${outcome.after.totalChunks} chunks`);
      return outcome.success ? 0 : 1;
    }

    default:
      console.error(USAGE);
      return 2;
  }
}

async function main(): Promise<number> {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      replace: { type: "boolean" },
      "top-k": { type: "string" },
      threshold: { type: "string" },
      "max-length": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const [command, ...args] = positionals;
  if (!command || values.help) {
    console.error(USAGE);
    return command ? 0 : 2;
  }

  const config = loadRagConfig();
  const pipeline = createRagPipeline(config, {
    apiKey: process.env["OPENROUTER_API_KEY"],
    log: (msg) => console.error(msg),
  });
  return run(pipeline, command, args, values);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
