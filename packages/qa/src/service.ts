import {
  ANSWER_MODES,
  EmbeddingUnavailableError,
  IngestionError,
  InvalidRequestError,
  QUERY_TYPES,
  createLogger,
  isValidVersionLabel,
  type Answer,
  type AnswerMode,
  type AskOutcome,
  type ConfidenceAggregate,
  type DocumentId,
  type DocumentRecord,
  type EmbeddedChunk,
  type Query,
  type QueryType,
  type RetrievedPassage,
} from "@citeqa/core";
import { validateCitations } from "@citeqa/citations";
import type { Embedder } from "@citeqa/embeddings";
import type { AnswerGenerator } from "@citeqa/generation";
import { buildChunks, type ChunkOptions } from "@citeqa/ingestion";
import type { VectorIndex } from "@citeqa/vectorstore";
import { assembleAnswer, refusalAnswer } from "./assembler.js";
import { KeyedLock } from "./keyedLock.js";
import type { Retriever } from "./retriever.js";

const log = createLogger("qa");

export type IngestInput = {
  documentId: DocumentId;
  version: string;
  text: string;
  filename?: string | undefined;
  uploadedAt?: string | undefined;
};

export type QaServiceDeps = {
  embedder: Embedder;
  index: VectorIndex;
  retriever: Retriever;
  generator: AnswerGenerator;
  chunking: ChunkOptions;
  citations: { aggregate: ConfidenceAggregate; maxSources: number };
};

export class QaService {
  private readonly locks = new KeyedLock();

  constructor(private readonly deps: QaServiceDeps) {}

  /** Chunks, embeds and indexes one document version. Returns the number of chunks stored. */
  async ingest(input: IngestInput): Promise<number> {
    const documentId = input.documentId.trim();
    if (!documentId) throw new IngestionError("Document id must not be empty.");
    if (!isValidVersionLabel(input.version)) {
      throw new IngestionError(`Invalid version label: "${input.version}"`);
    }

    return this.locks.run(documentId, async () => {
      if (this.deps.index.getDocument(documentId)) {
        throw new IngestionError(`Document "${documentId}" is already ingested.`);
      }

      const doc: DocumentRecord = {
        id: documentId,
        filename: input.filename?.trim() || documentId,
        version: input.version,
        uploadedAt: input.uploadedAt ?? new Date().toISOString(),
        deleted: false,
      };

      const chunks = buildChunks(doc, input.text, this.deps.chunking);
      if (chunks.length === 0) {
        log.warn("ingest skipped, no text", { documentId });
        return 0;
      }

      const started = Date.now();
      const vectors = await this.deps.embedder.embedBatch(chunks.map((c) => c.text));
      const items: EmbeddedChunk[] = chunks.map((chunk, i) => {
        const vector = vectors[i];
        if (!vector) {
          throw new EmbeddingUnavailableError(`Missing embedding for chunk index ${i} (chunkId=${chunk.id})`);
        }
        return { chunk, vector };
      });

      this.deps.index.indexDocument(doc, items);

      log.info("ingested", {
        documentId,
        version: doc.version,
        chunks: items.length,
        dim: items[0]?.vector.length ?? 0,
        ms: Date.now() - started,
      });
      return items.length;
    });
  }

  async ask(query: Query): Promise<Answer> {
    const question = query.question.trim();
    if (!question) throw new InvalidRequestError("Question must not be empty.");
    if (!QUERY_TYPES.includes(query.type)) {
      throw new InvalidRequestError(`Unknown query type: "${String(query.type)}"`);
    }
    const mode = query.mode ?? "standard";
    if (!ANSWER_MODES.includes(mode)) {
      throw new InvalidRequestError(`Unknown answer mode: "${String(mode)}"`);
    }

    const started = Date.now();
    log.debug("ask", { question, type: query.type, mode });
    try {
      const passages = await this.deps.retriever.retrieve({
        question,
        version: query.version,
        documentIds: query.documentIds,
      });
      const outcome = await this.decide(question, query.type, mode, passages);

      log.info("answered", {
        type: query.type,
        mode,
        version: query.version || null,
        documentIds: query.documentIds ?? null,
        passages: passages.length,
        outcome: outcome.kind === "answer" ? "answer" : outcome.reason,
        confidence: outcome.kind === "answer" ? outcome.answer.confidence : 0,
        usedDocuments: outcome.kind === "answer" ? outcome.answer.usedDocuments : [],
        ms: Date.now() - started,
      });
      return outcome.kind === "answer" ? outcome.answer : refusalAnswer();
    } catch (err) {
      log.error("ask failed", {
        error: err instanceof Error ? err.name : "unknown",
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  softDelete(documentId: DocumentId): boolean {
    const changed = this.deps.index.markDeleted(documentId);
    log.info("soft delete", { documentId, changed });
    return changed;
  }

  restore(documentId: DocumentId): boolean {
    const changed = this.deps.index.restore(documentId);
    log.info("restore", { documentId, changed });
    return changed;
  }

  listDocuments(): DocumentRecord[] {
    return this.deps.index.listDocuments();
  }

  private async decide(
    question: string,
    queryType: QueryType,
    mode: AnswerMode,
    passages: RetrievedPassage[]
  ): Promise<AskOutcome> {
    if (passages.length === 0) return { kind: "refuse", reason: "no_evidence" };

    const raw = await this.deps.generator.generate({ question, queryType, mode, passages });
    const validation = validateCitations(raw, passages, { aggregate: this.deps.citations.aggregate });

    if (!validation.ok) {
      log.warn("answer rejected", { ...validation.report });
      return { kind: "refuse", reason: "unsupported" };
    }
    if (validation.report.strippedClaims > 0) {
      log.info("claims stripped", { ...validation.report });
    }
    return { kind: "answer", answer: assembleAnswer(validation, this.deps.citations.maxSources) };
  }
}
