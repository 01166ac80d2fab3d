import { z } from "zod";
import type { EmbeddingBackend } from "./embedding-service.js";

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number()),
    }),
  ),
});

export interface OpenRouterEmbeddingsOptions {
  apiKey: string | undefined;
  model: string;
  dimensions: number;
  url?: string;
}

/** OpenAI-compatible `/embeddings` endpoint, OpenRouter by default. */
export class OpenRouterEmbeddings implements EmbeddingBackend {
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string | undefined;
  private readonly url: string;

  constructor(options: OpenRouterEmbeddingsOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.url = options.url ?? "https://openrouter.ai/api/v1/embeddings";
  }

  async load(): Promise<void> {
    if (!this.apiKey) {
      throw new Error("OPENROUTER_API_KEY environment variable is required");
    }
  }

  async embed(batch: string[]): Promise<number[][]> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey ?? ""}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: batch,
      }),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Embedding API error (${res.status}): ${text}`);
    }

    const json = embeddingResponseSchema.parse(await res.json());
    // Providers may answer out of order; `index` restores input order when present
    const items = json.data.every((item) => item.index !== undefined)
      ? [...json.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : json.data;
    return items.map((item) => item.embedding);
  }
}
