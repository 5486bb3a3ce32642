export interface Article {
  /** Normalised page URL; unique within a store. */
  url: string;
  title: string;
  content: string;
  fetchedAt: string;
}

export interface EmbeddingRecord {
  url: string;
  vector: Float32Array;
  model: string;
  contentHash: string;
}

export interface StoredArticle extends Article {
  vector: Float32Array;
  model: string;
  contentHash: string;
}

export interface CandidatePair {
  sourceUrl: string;
  targetUrl: string;
  /** Cosine similarity clamped to [0, 1]. */
  score: number;
}

export interface Suggestion {
  fromPost: string;
  toPost: string;
  toTitle: string;
  reason: string;
  anchorText: string;
  similarity: number;
}

export interface IncompleteSuggestion {
  fromPost: string;
  toPost: string;
  toTitle: string;
  similarity: number;
  error: string;
}

export type SuggestionOutcome =
  | { status: "complete"; suggestion: Suggestion }
  | { status: "incomplete"; incomplete: IncompleteSuggestion };

export type FailureStage = "sitemap" | "fetch" | "extract" | "embed";

export interface FetchFailure {
  url: string;
  stage: FailureStage;
  error: string;
  at: string;
}

export interface StoreMetadata {
  provider: string;
  model: string;
  dimensions: number;
  builtAt: string;
  sitemapUrl: string | null;
}
