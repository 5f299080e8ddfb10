import crypto from "node:crypto";
import type { Chunk, ChunkMetadata, DocumentRecord } from "@citeqa/core";
import { chunkText, type ChunkOptions } from "./textChunker.js";

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function buildChunks(
  doc: Pick<DocumentRecord, "id" | "filename" | "version">,
  text: string,
  opts: ChunkOptions
): Chunk[] {
  return chunkText(text, opts).map(({ text: part, ordinal }) => {
    const contentHash = sha256(part);
    const metadata: ChunkMetadata = {
      documentId: doc.id,
      documentName: doc.filename,
      version: doc.version,
      ordinal,
      contentHash,
    };
    const id = sha256(`${doc.id}:${doc.version}:${ordinal}:${contentHash}`);
    return { id, text: part, metadata };
  });
}
