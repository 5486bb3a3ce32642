export { VectorStore, STORE_FILE } from "./client.js";
export type { StoreEntry, Neighbour, ArticleSummary } from "./client.js";
export { cosineSimilarity, serializeVector, deserializeVector } from "./vector.js";
