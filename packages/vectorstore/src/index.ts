export type { UpsertMetadata, VectorIndex, VectorIndexFilter } from "./store.js";
export { SqliteStore, cosineSimilarity } from "./sqliteStore.js";
