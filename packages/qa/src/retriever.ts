import {
  InvalidRequestError,
  InvalidVersionFilterError,
  createLogger,
  isValidVersionLabel,
  type DocumentId,
  type RetrievedPassage,
  type VersionLabel,
} from "@citeqa/core";
import type { Embedder } from "@citeqa/embeddings";
import type { VectorIndex, VectorIndexFilter } from "@citeqa/vectorstore";

const log = createLogger("retrieve");

export type RetrieverOptions = {
  topK: number;
  similarityThreshold: number;
};

export type RetrieveParams = {
  question: string;
  version?: VersionLabel | undefined;
  topK?: number | undefined;
  similarityThreshold?: number | undefined;
  documentIds?: DocumentId[] | undefined;
};

/**
 * Embeds the question once and returns the live passages scoring at least
 * the threshold. An empty list means there is no evidence to answer from.
 */
export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    private readonly opts: RetrieverOptions
  ) {}

  async retrieve(params: RetrieveParams): Promise<RetrievedPassage[]> {
    const topK = params.topK ?? this.opts.topK;
    const threshold = params.similarityThreshold ?? this.opts.similarityThreshold;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidRequestError(`topK must be a positive integer, got ${topK}`);
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new InvalidRequestError(`Similarity threshold must be between 0 and 1, got ${threshold}`);
    }

    const filter: VectorIndexFilter = {};
    // An empty label means "all versions".
    if (params.version) {
      if (!isValidVersionLabel(params.version)) throw new InvalidVersionFilterError(params.version);
      filter.version = params.version;
    }
    if (params.documentIds) filter.documentIds = params.documentIds;

    const vector = await this.embedder.embed(params.question);
    const scored = this.index.query({ vector, topK, filter });
    const passages = scored
      .filter((r) => r.similarity >= threshold)
      .map((r) => ({ ...r, documentName: r.chunk.metadata.documentName }));

    log.debug("retrieved", {
      candidates: scored.length,
      kept: passages.length,
      threshold,
      version: filter.version ?? null,
      best: scored[0]?.similarity ?? null,
    });
    return passages;
  }
}
