import type {
  ChunkId,
  ChunkMetadata,
  DocumentId,
  DocumentRecord,
  EmbeddedChunk,
  ScoredChunk,
  VersionLabel,
} from "@citeqa/core";

/**
 * Conjunction of all given conditions. Soft-deleted documents are excluded
 * unless includeDeleted is set.
 */
export type VectorIndexFilter = {
  version?: VersionLabel;
  documentIds?: DocumentId[];
  includeDeleted?: boolean;
};

export type UpsertMetadata = ChunkMetadata & { text: string };

export interface VectorIndex {
  init(): void;

  registerDocument(doc: DocumentRecord): void;
  getDocument(documentId: DocumentId): DocumentRecord | null;
  listDocuments(): DocumentRecord[];

  upsert(chunkId: ChunkId, vector: number[], metadata: UpsertMetadata): void;

  /** Writes the document row and all of its chunks atomically. */
  indexDocument(doc: DocumentRecord, items: EmbeddedChunk[]): void;

  query(params: { vector: number[]; topK: number; filter?: VectorIndexFilter }): ScoredChunk[];

  markDeleted(documentId: DocumentId): boolean;
  restore(documentId: DocumentId): boolean;
  countChunks(documentId: DocumentId): number;

  close(): void;
}
