import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { InvalidRequestError, InvalidVersionFilterError, type DocumentRecord } from "@citeqa/core";
import type { Embedder } from "@citeqa/embeddings";
import { SqliteStore } from "@citeqa/vectorstore";
import { Retriever } from "./retriever.js";

class FixedEmbedder implements Embedder {
  readonly model = "fixed";
  calls = 0;

  async embed(): Promise<number[]> {
    this.calls++;
    return [1, 0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map(() => [1, 0]);
  }
}

function doc(id: string, version: string): DocumentRecord {
  return { id, filename: `${id}.txt`, version, uploadedAt: "2026-01-05T10:00:00.000Z", deleted: false };
}

describe("Retriever", () => {
  let store: SqliteStore;
  let embedder: FixedEmbedder;
  let retriever: Retriever;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
    store.init();
    embedder = new FixedEmbedder();
    retriever = new Retriever(embedder, store, { topK: 8, similarityThreshold: 0.75 });

    const d = doc("guide", "v1");
    store.indexDocument(d, [
      {
        chunk: {
          id: "guide-0",
          text: "close match",
          metadata: { documentId: d.id, documentName: d.filename, version: "v1", ordinal: 0, contentHash: "a" },
        },
        vector: [1, 0],
      },
      {
        chunk: {
          id: "guide-1",
          text: "weak match",
          metadata: { documentId: d.id, documentName: d.filename, version: "v1", ordinal: 1, contentHash: "b" },
        },
        vector: [0.5, 0.8660254038],
      },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  it("drops passages below the threshold and names their document", async () => {
    const passages = await retriever.retrieve({ question: "q" });

    expect(passages.map((p) => p.chunk.id)).toEqual(["guide-0"]);
    expect(passages[0]?.documentName).toBe("guide.txt");
    expect(embedder.calls).toBe(1);
  });

  it("honors a per-call threshold", async () => {
    const passages = await retriever.retrieve({ question: "q", similarityThreshold: 0.4 });
    expect(passages.map((p) => p.chunk.id)).toEqual(["guide-0", "guide-1"]);
  });

  it("keeps a passage scoring exactly the threshold and drops one just below", async () => {
    const d = doc("edge", "v1");
    store.indexDocument(d, [
      {
        chunk: {
          id: "edge-0",
          text: "boundary match",
          metadata: { documentId: d.id, documentName: d.filename, version: "v1", ordinal: 0, contentHash: "c" },
        },
        vector: [3, 4],
      },
    ]);

    const atThreshold = await retriever.retrieve({ question: "q", similarityThreshold: 0.6 });
    expect(atThreshold.map((p) => [p.chunk.id, p.similarity])).toEqual([
      ["guide-0", 1],
      ["edge-0", 0.6],
    ]);

    const above = await retriever.retrieve({ question: "q", similarityThreshold: 0.6000001 });
    expect(above.map((p) => p.chunk.id)).toEqual(["guide-0"]);
  });

  it("restricts results to the given documents", async () => {
    const d = doc("other", "v1");
    store.indexDocument(d, [
      {
        chunk: {
          id: "other-0",
          text: "other match",
          metadata: { documentId: d.id, documentName: d.filename, version: "v1", ordinal: 0, contentHash: "d" },
        },
        vector: [1, 0],
      },
    ]);

    const passages = await retriever.retrieve({ question: "q", documentIds: ["other"] });
    expect(passages.map((p) => p.chunk.id)).toEqual(["other-0"]);
    await expect(retriever.retrieve({ question: "q", documentIds: [] })).resolves.toEqual([]);
  });

  it("treats an empty version as no filter", async () => {
    await expect(retriever.retrieve({ question: "q", version: "" })).resolves.toHaveLength(1);
    await expect(retriever.retrieve({ question: "q", version: "v2" })).resolves.toEqual([]);
  });

  it("validates its inputs before embedding", async () => {
    await expect(retriever.retrieve({ question: "q", version: "../v1" })).rejects.toBeInstanceOf(
      InvalidVersionFilterError
    );
    await expect(retriever.retrieve({ question: "q", similarityThreshold: 1.5 })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    await expect(retriever.retrieve({ question: "q", topK: 0 })).rejects.toBeInstanceOf(InvalidRequestError);
    expect(embedder.calls).toBe(0);
  });
});
