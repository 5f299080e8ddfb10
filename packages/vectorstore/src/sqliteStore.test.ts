import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { IndexUnavailableError, type DocumentRecord, type EmbeddedChunk } from "@citeqa/core";
import { SqliteStore, cosineSimilarity } from "./sqliteStore.js";

function doc(id: string, version: string, filename = id): DocumentRecord {
  return { id, filename, version, uploadedAt: "2026-01-05T10:00:00.000Z", deleted: false };
}

function item(d: DocumentRecord, ordinal: number, text: string, vector: number[]): EmbeddedChunk {
  return {
    chunk: {
      id: `${d.id}-${ordinal}`,
      text,
      metadata: {
        documentId: d.id,
        documentName: d.filename,
        version: d.version,
        ordinal,
        contentHash: `hash-${d.id}-${ordinal}`,
      },
    },
    vector,
  };
}

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
    store.init();
  });

  afterEach(() => {
    store.close();
  });

  it("ranks chunks by cosine similarity", () => {
    const manual = doc("manual", "v1", "Manual v1");
    store.indexDocument(manual, [
      item(manual, 0, "Apples are red", [1, 0, 0]),
      item(manual, 1, "Bananas are yellow", [0, 1, 0]),
    ]);

    const results = store.query({ vector: [0.9, 0.1, 0], topK: 2 });

    expect(results.map((r) => r.chunk.id)).toEqual(["manual-0", "manual-1"]);
    expect(results[0]?.chunk.text).toBe("Apples are red");
    expect(results[0]?.chunk.metadata).toEqual({
      documentId: "manual",
      documentName: "Manual v1",
      version: "v1",
      ordinal: 0,
      contentHash: "hash-manual-0",
    });
    expect(results[0]?.similarity).toBeCloseTo(0.9939, 4);
  });

  it("breaks score ties by insertion order", () => {
    const a = doc("a", "v1");
    const b = doc("b", "v1");
    store.indexDocument(b, [item(b, 0, "second doc, first inserted", [0, 1])]);
    store.indexDocument(a, [item(a, 0, "first doc, inserted later", [0, 2])]);

    const results = store.query({ vector: [0, 1], topK: 5 });

    expect(results.map((r) => r.chunk.id)).toEqual(["b-0", "a-0"]);
    expect(results.map((r) => r.similarity)).toEqual([1, 1]);
  });

  it("filters by version", () => {
    const v1 = doc("guide-v1", "v1");
    const v2 = doc("guide-v2", "v2");
    store.indexDocument(v1, [item(v1, 0, "old", [1, 0])]);
    store.indexDocument(v2, [item(v2, 0, "new", [0.6, 0.8])]);

    expect(store.query({ vector: [1, 0], topK: 5, filter: { version: "v2" } }).map((r) => r.chunk.id)).toEqual([
      "guide-v2-0",
    ]);
    expect(store.query({ vector: [1, 0], topK: 5, filter: { version: "v3" } })).toEqual([]);
  });

  it("restricts to the given documents", () => {
    const a = doc("a", "v1");
    const b = doc("b", "v1");
    store.indexDocument(a, [item(a, 0, "a text", [1, 0])]);
    store.indexDocument(b, [item(b, 0, "b text", [1, 0])]);

    expect(store.query({ vector: [1, 0], topK: 5, filter: { documentIds: ["b"] } }).map((r) => r.chunk.id)).toEqual([
      "b-0",
    ]);
    expect(store.query({ vector: [1, 0], topK: 5, filter: { documentIds: [] } })).toEqual([]);
  });

  it("hides soft-deleted documents until restored", () => {
    const a = doc("a", "v1");
    store.indexDocument(a, [item(a, 0, "exact match", [1, 0]), item(a, 1, "also close", [0.99, 0.1])]);

    expect(store.markDeleted("a")).toBe(true);
    expect(store.query({ vector: [1, 0], topK: 5 })).toEqual([]);
    expect(store.query({ vector: [1, 0], topK: 5, filter: { includeDeleted: true } })).toHaveLength(2);
    expect(store.getDocument("a")?.deleted).toBe(true);
    expect(store.countChunks("a")).toBe(2);

    expect(store.restore("a")).toBe(true);
    expect(store.query({ vector: [1, 0], topK: 5 })).toHaveLength(2);
  });

  it("reports unknown documents on delete", () => {
    expect(store.markDeleted("missing")).toBe(false);
    expect(store.getDocument("missing")).toBeNull();
  });

  it("upserts single chunks in place", () => {
    const a = doc("a", "v1");
    store.registerDocument(a);
    const { chunk } = item(a, 0, "draft", [1, 0]);

    store.upsert(chunk.id, [1, 0], { ...chunk.metadata, text: "draft" });
    store.upsert(chunk.id, [0, 1], { ...chunk.metadata, text: "final" });

    const results = store.query({ vector: [0, 1], topK: 5 });
    expect(results).toHaveLength(1);
    expect(results[0]?.chunk.text).toBe("final");
    expect(results[0]?.similarity).toBe(1);
    expect(store.listDocuments()).toEqual([a]);
  });

  it("returns nothing for a non-positive topK", () => {
    const a = doc("a", "v1");
    store.indexDocument(a, [item(a, 0, "text", [1, 0])]);

    expect(store.query({ vector: [1, 0], topK: 0 })).toEqual([]);
  });

  it("treats a dimension mismatch as an unavailable index", () => {
    const a = doc("a", "v1");
    store.indexDocument(a, [item(a, 0, "text", [1, 0, 0])]);

    expect(() => store.query({ vector: [1, 0], topK: 3 })).toThrow(IndexUnavailableError);
  });

  it("wraps failures of a closed database", () => {
    store.close();

    expect(() => store.query({ vector: [1, 0], topK: 3 })).toThrow(IndexUnavailableError);
    store = new SqliteStore(":memory:");
  });
});

describe("cosineSimilarity", () => {
  it("is zero for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([3, 4], [3, 4])).toBeCloseTo(1, 10);
  });
});
