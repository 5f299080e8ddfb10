import crypto from "node:crypto";
import { EmbeddingUnavailableError, createLogger } from "@citeqa/core";
import { ollamaEmbedOne } from "./ollama.js";

const log = createLogger("embeddings");

/** Embedding Gateway. Deterministic for a fixed model version. */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export type OllamaEmbedderOptions = {
  baseUrl: string;
  model: string;
  cacheSize?: number;
};

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly cacheSize: number;
  private readonly cache = new Map<string, number[]>();

  constructor(opts: OllamaEmbedderOptions) {
    this.baseUrl = opts.baseUrl;
    this.model = opts.model;
    this.cacheSize = opts.cacheSize ?? 2048;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) throw new EmbeddingUnavailableError("Embedding model returned no vector.");
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    let misses = 0;
    for (const text of texts) {
      const key = this.cacheKey(text);
      const cached = this.cache.get(key);
      if (cached) {
        // refresh recency
        this.cache.delete(key);
        this.cache.set(key, cached);
        vectors.push(cached);
        continue;
      }

      misses++;
      const v = await ollamaEmbedOne({ baseUrl: this.baseUrl, model: this.model, text });
      this.remember(key, v);
      vectors.push(v);
    }

    const dim = vectors[0]?.length ?? 0;
    for (const v of vectors) {
      if (v.length !== dim) {
        throw new EmbeddingUnavailableError(`Inconsistent embedding dimension: expected ${dim}, got ${v.length}`);
      }
    }

    log.debug("embedded batch", { model: this.model, count: texts.length, misses, dim });
    return vectors;
  }

  private cacheKey(text: string): string {
    return crypto.createHash("sha1").update(`${this.model}:${text}`).digest("hex");
  }

  private remember(key: string, vector: number[]): void {
    if (this.cacheSize <= 0) return;
    this.cache.set(key, vector);
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}

const shared = new Map<string, OllamaEmbedder>();

/**
 * One embedder per model endpoint for the whole process; callers never
 * re-create the model client per request.
 */
export function sharedOllamaEmbedder(opts: OllamaEmbedderOptions): OllamaEmbedder {
  const key = `${opts.baseUrl}|${opts.model}`;
  let embedder = shared.get(key);
  if (!embedder) {
    embedder = new OllamaEmbedder(opts);
    shared.set(key, embedder);
  }
  return embedder;
}
