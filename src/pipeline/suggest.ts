import type pino from "pino";
import { normalizeUrl } from "../crawler/url.js";
import { generateSuggestions, type RationaleGenerator } from "../processor/index.js";
import { findCandidates, type RankOptions } from "../ranker/index.js";
import type { VectorStore } from "../store/index.js";
import type { IncompleteSuggestion, Suggestion } from "../types.js";

export interface SuggestDeps {
  store: VectorStore;
  generator: RationaleGenerator;
  ranking: RankOptions;
  /** When set, a store built with another embedding model is refused. */
  expectedModel?: string;
  logger: pino.Logger;
}

export interface SuggestionResult {
  source: { url: string; title: string };
  suggestions: Suggestion[];
  incomplete: IncompleteSuggestion[];
}

/**
 * Ranked link suggestions for one indexed article. An empty `suggestions`
 * array means nothing cleared the similarity threshold.
 */
export async function suggestLinks(url: string, deps: SuggestDeps): Promise<SuggestionResult> {
  const { store, generator, logger } = deps;
  const sourceUrl = normalizeUrl(url);

  store.assertQueryable(deps.expectedModel);
  const candidates = findCandidates(store, sourceUrl, deps.ranking, logger);

  // findCandidates has already proved the source exists
  const source = store.get(sourceUrl);
  if (!source || candidates.length === 0) {
    return { source: { url: sourceUrl, title: source?.title ?? "" }, suggestions: [], incomplete: [] };
  }

  const outcomes = await generateSuggestions(source, candidates, (target) => store.get(target), generator, logger);

  const suggestions: Suggestion[] = [];
  const incomplete: IncompleteSuggestion[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "complete") suggestions.push(outcome.suggestion);
    else incomplete.push(outcome.incomplete);
  }

  if (incomplete.length > 0) {
    logger.warn({ url: sourceUrl, incomplete: incomplete.length }, "Some suggestions are incomplete");
  }
  logger.info({ url: sourceUrl, suggestions: suggestions.length }, "Suggestions ready");

  return { source: { url: source.url, title: source.title }, suggestions, incomplete };
}
