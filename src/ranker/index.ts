import type pino from "pino";
import { ArticleNotIndexedError } from "../errors.js";
import type { Neighbour, VectorStore } from "../store/index.js";
import type { CandidatePair } from "../types.js";

export interface RankOptions {
  /** Maximum candidates returned. */
  limit: number;
  minSimilarity: number;
  /** Neighbours fetched from the store before filtering. */
  poolSize: number;
}

/**
 * Filters raw neighbours into candidate pairs: never the source itself,
 * never below the threshold, best first, at most `limit`. Never padded.
 */
export function rankCandidates(
  sourceUrl: string,
  neighbours: readonly Neighbour[],
  options: Pick<RankOptions, "limit" | "minSimilarity">,
): CandidatePair[] {
  return neighbours
    .filter((n) => n.id !== sourceUrl)
    .map((n) => ({ sourceUrl, targetUrl: n.id, score: Math.min(1, Math.max(0, n.score)) }))
    .filter((c) => c.score >= options.minSimilarity)
    .sort((a, b) => b.score - a.score)
    .slice(0, options.limit);
}

export function findCandidates(
  store: VectorStore,
  sourceUrl: string,
  options: RankOptions,
  logger: pino.Logger,
): CandidatePair[] {
  const source = store.get(sourceUrl);
  if (!source) {
    throw new ArticleNotIndexedError(
      sourceUrl,
      store.list().slice(0, 10).map((a) => a.url),
      store.count(),
    );
  }

  // One extra slot because the source is its own nearest neighbour
  const neighbours = store.query(source.vector, Math.max(options.poolSize, options.limit) + 1);
  const candidates = rankCandidates(sourceUrl, neighbours, options);

  if (candidates.length === 0) {
    logger.info({ url: sourceUrl, minSimilarity: options.minSimilarity }, "No candidates above threshold");
  } else {
    logger.debug(
      { url: sourceUrl, candidates: candidates.length, best: candidates[0]?.score },
      "Candidates ranked",
    );
  }
  return candidates;
}
