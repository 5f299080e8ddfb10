export type ChunkId = string;
export type DocumentId = string;
export type VersionLabel = string;

export type QueryType = "sales" | "technical";
export type AnswerMode = "brief" | "standard" | "detailed";

export const QUERY_TYPES: readonly QueryType[] = ["sales", "technical"];
export const ANSWER_MODES: readonly AnswerMode[] = ["brief", "standard", "detailed"];

export interface DocumentRecord {
  id: DocumentId;
  filename: string;
  version: VersionLabel;
  uploadedAt: string; // ISO timestamp
  deleted: boolean;
}

export interface ChunkMetadata {
  documentId: DocumentId;
  documentName: string;
  version: VersionLabel; // denormalized copy of the document version
  ordinal: number;
  contentHash: string;
}

export interface Chunk {
  id: ChunkId;
  text: string;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

export interface ScoredChunk {
  chunk: Chunk;
  similarity: number;
}

export interface RetrievedPassage extends ScoredChunk {
  documentName: string;
}

export interface Query {
  question: string;
  type: QueryType;
  version?: VersionLabel;
  mode?: AnswerMode;
  /** Restricts retrieval to these documents. An empty list matches nothing. */
  documentIds?: DocumentId[];
}

export interface SourceItem {
  marker: string; // "S1"
  documentName: string;
  version: VersionLabel;
  ordinal: number;
  similarity: number;
  quote: string;
}

export interface Answer {
  answer: string;
  confidence: number;
  usedDocuments: string[];
  sources: SourceItem[];
  refusal: boolean;
}

export type RefusalReason = "no_evidence" | "unsupported";

export type AskOutcome =
  | { kind: "answer"; answer: Answer }
  | { kind: "refuse"; reason: RefusalReason };
