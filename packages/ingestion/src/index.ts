export { chunkText, type ChunkOptions, type TextChunk } from "./textChunker.js";
export { buildChunks } from "./documentChunks.js";
