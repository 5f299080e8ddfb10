// packages/vectorstore/src/sqliteStore.ts

import Database from "better-sqlite3";
import { IndexUnavailableError } from "@citeqa/core";
import type {
  ChunkId,
  ChunkMetadata,
  DocumentId,
  DocumentRecord,
  EmbeddedChunk,
  ScoredChunk,
} from "@citeqa/core";
import type { UpsertMetadata, VectorIndex, VectorIndexFilter } from "./store.js";

type ChunkRow = {
  chunk_id: string;
  text: string;
  metadata_json: string;
  vector_json: string;
};

type DocumentRow = {
  document_id: string;
  filename: string;
  version: string;
  uploaded_at: string;
  deleted: number;
};

type ChunkParams = {
  chunk_id: string;
  document_id: string;
  version: string;
  text: string;
  metadata_json: string;
  vector_json: string;
};

function toDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.document_id,
    filename: row.filename,
    version: row.version,
    uploadedAt: row.uploaded_at,
    deleted: row.deleted !== 0,
  };
}

function parseMetadata(json: string, chunkId: string): ChunkMetadata {
  const raw: unknown = JSON.parse(json);
  if (
    raw &&
    typeof raw === "object" &&
    "documentId" in raw &&
    typeof raw.documentId === "string" &&
    "documentName" in raw &&
    typeof raw.documentName === "string" &&
    "version" in raw &&
    typeof raw.version === "string" &&
    "ordinal" in raw &&
    typeof raw.ordinal === "number" &&
    "contentHash" in raw &&
    typeof raw.contentHash === "string"
  ) {
    return {
      documentId: raw.documentId,
      documentName: raw.documentName,
      version: raw.version,
      ordinal: raw.ordinal,
      contentHash: raw.contentHash,
    };
  }
  throw new IndexUnavailableError(`Corrupt metadata for chunk ${chunkId}`);
}

function parseVector(json: string, chunkId: string): number[] {
  const raw: unknown = JSON.parse(json);
  if (Array.isArray(raw) && raw.every((v): v is number => typeof v === "number")) return raw;
  throw new IndexUnavailableError(`Corrupt vector for chunk ${chunkId}`);
}

function toChunkParams(chunkId: ChunkId, text: string, metadata: ChunkMetadata, vector: number[]): ChunkParams {
  return {
    chunk_id: chunkId,
    document_id: metadata.documentId,
    version: metadata.version,
    text,
    metadata_json: JSON.stringify(metadata),
    vector_json: JSON.stringify(vector),
  };
}

export class SqliteStore implements VectorIndex {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    try {
      this.db = new Database(dbPath);
    } catch (err) {
      throw new IndexUnavailableError(`Cannot open vector index at ${dbPath}`, { cause: err });
    }
  }

  init(): void {
    this.guard("init", () => {
      this.db.exec(`PRAGMA journal_mode = WAL;`);

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS documents (
          document_id TEXT PRIMARY KEY,
          filename TEXT NOT NULL,
          version TEXT NOT NULL,
          uploaded_at TEXT NOT NULL,
          deleted INTEGER NOT NULL DEFAULT 0
        );
      `);

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS chunks (
          chunk_id TEXT PRIMARY KEY,
          document_id TEXT NOT NULL,
          version TEXT NOT NULL,
          text TEXT NOT NULL,
          metadata_json TEXT NOT NULL,
          vector_json TEXT NOT NULL
        );
      `);

      this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id);
        CREATE INDEX IF NOT EXISTS idx_chunks_version ON chunks(version);
      `);
    });
  }

  registerDocument(doc: DocumentRecord): void {
    this.guard("registerDocument", () => this.writeDocument(doc));
  }

  getDocument(documentId: DocumentId): DocumentRecord | null {
    return this.guard("getDocument", () => {
      const row = this.db
        .prepare<[string], DocumentRow>(`SELECT * FROM documents WHERE document_id = ?`)
        .get(documentId);
      return row ? toDocument(row) : null;
    });
  }

  listDocuments(): DocumentRecord[] {
    return this.guard("listDocuments", () =>
      this.db.prepare<[], DocumentRow>(`SELECT * FROM documents ORDER BY rowid`).all().map(toDocument)
    );
  }

  upsert(chunkId: ChunkId, vector: number[], metadata: UpsertMetadata): void {
    const { text, ...rest } = metadata;
    this.guard("upsert", () => {
      this.chunkStatement().run(toChunkParams(chunkId, text, rest, vector));
    });
  }

  indexDocument(doc: DocumentRecord, items: EmbeddedChunk[]): void {
    this.guard("indexDocument", () => {
      const stmt = this.chunkStatement();
      const tx = this.db.transaction((chunks: EmbeddedChunk[]) => {
        this.writeDocument(doc);
        for (const it of chunks) {
          stmt.run(toChunkParams(it.chunk.id, it.chunk.text, it.chunk.metadata, it.vector));
        }
      });
      tx(items);
    });
  }

  query(params: { vector: number[]; topK: number; filter?: VectorIndexFilter }): ScoredChunk[] {
    if (params.topK <= 0) return [];

    const filter = params.filter ?? {};
    if (filter.documentIds && filter.documentIds.length === 0) return [];

    const conditions: string[] = [];
    const values: string[] = [];

    if (!filter.includeDeleted) conditions.push("COALESCE(d.deleted, 0) = 0");
    if (filter.version !== undefined) {
      conditions.push("c.version = ?");
      values.push(filter.version);
    }
    if (filter.documentIds) {
      conditions.push(`c.document_id IN (${filter.documentIds.map(() => "?").join(",")})`);
      values.push(...filter.documentIds);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    return this.guard("query", () => {
      const rows = this.db
        .prepare<string[], ChunkRow>(
          `
          SELECT c.chunk_id, c.text, c.metadata_json, c.vector_json
          FROM chunks c
          LEFT JOIN documents d ON d.document_id = c.document_id
          ${where}
          ORDER BY c.rowid
        `
        )
        .all(...values);

      const scored: ScoredChunk[] = [];
      for (const row of rows) {
        const vector = parseVector(row.vector_json, row.chunk_id);
        if (vector.length !== params.vector.length) {
          throw new IndexUnavailableError(
            `Vector dimension mismatch for chunk ${row.chunk_id}: stored ${vector.length}, query ${params.vector.length}`
          );
        }

        scored.push({
          chunk: {
            id: row.chunk_id,
            text: row.text,
            metadata: parseMetadata(row.metadata_json, row.chunk_id),
          },
          similarity: cosineSimilarity(params.vector, vector),
        });
      }

      // Array#sort is stable: equal scores keep rowid (insertion) order
      scored.sort((a, b) => b.similarity - a.similarity);
      return scored.slice(0, params.topK);
    });
  }

  markDeleted(documentId: DocumentId): boolean {
    return this.setDeleted(documentId, true);
  }

  restore(documentId: DocumentId): boolean {
    return this.setDeleted(documentId, false);
  }

  countChunks(documentId: DocumentId): number {
    return this.guard("countChunks", () => {
      const row = this.db
        .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM chunks WHERE document_id = ?`)
        .get(documentId);
      return row?.n ?? 0;
    });
  }

  close(): void {
    this.db.close();
  }

  private setDeleted(documentId: DocumentId, deleted: boolean): boolean {
    return this.guard(deleted ? "markDeleted" : "restore", () => {
      const res = this.db
        .prepare(`UPDATE documents SET deleted = ? WHERE document_id = ?`)
        .run(deleted ? 1 : 0, documentId);
      return res.changes > 0;
    });
  }

  private writeDocument(doc: DocumentRecord): void {
    this.db
      .prepare(
        `
        INSERT INTO documents (document_id, filename, version, uploaded_at, deleted)
        VALUES (@document_id, @filename, @version, @uploaded_at, @deleted)
        ON CONFLICT(document_id) DO UPDATE SET
          filename = excluded.filename,
          version = excluded.version,
          uploaded_at = excluded.uploaded_at,
          deleted = excluded.deleted;
      `
      )
      .run({
        document_id: doc.id,
        filename: doc.filename,
        version: doc.version,
        uploaded_at: doc.uploadedAt,
        deleted: doc.deleted ? 1 : 0,
      });
  }

  private chunkStatement(): Database.Statement<[ChunkParams]> {
    return this.db.prepare<[ChunkParams]>(`
      INSERT INTO chunks (chunk_id, document_id, version, text, metadata_json, vector_json)
      VALUES (@chunk_id, @document_id, @version, @text, @metadata_json, @vector_json)
      ON CONFLICT(chunk_id) DO UPDATE SET
        document_id = excluded.document_id,
        version = excluded.version,
        text = excluded.text,
        metadata_json = excluded.metadata_json,
        vector_json = excluded.vector_json;
    `);
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof IndexUnavailableError) throw err;
      throw new IndexUnavailableError(`Vector index ${op} failed (${this.dbPath})`, { cause: err });
    }
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }

  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
