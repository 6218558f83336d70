import type OpenAI from "openai";
import { getOpenAIClient } from "../llm/client.js";
import type { RateLimiter } from "../llm/rateLimiter.js";
import type { Embedder } from "./types.js";

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly model: string,
    private readonly limiter?: RateLimiter,
    private readonly client: () => OpenAI = getOpenAIClient,
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    await this.limiter?.acquire();
    const response = await this.client().embeddings.create({ model: this.model, input: texts });
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
