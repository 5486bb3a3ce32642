import type pino from "pino";
import { ExtractionError, errorMessage } from "../errors.js";
import type { Article, FetchFailure } from "../types.js";
import { runPool } from "./pool.js";
import { scrapeArticle, type ExtractOptions } from "./scraper.js";

export { fetchSitemapUrls, parseSitemap } from "./sitemap.js";
export { scrapeArticle, extractArticle } from "./scraper.js";
export { runPool, TaskTimeoutError } from "./pool.js";
export type { PoolOptions, PoolOutcome } from "./pool.js";
export { normalizeUrl } from "./url.js";

export interface CrawlOptions extends ExtractOptions {
  maxConcurrency: number;
  fetchTimeoutMs: number;
  delayMs: number;
  signal?: AbortSignal;
}

export interface CrawlResult {
  articles: Article[];
  failures: FetchFailure[];
}

/**
 * Fetches and extracts every URL with a bounded worker pool.
 * Failed pages are logged and reported, never fatal.
 */
export async function crawlArticles(
  urls: readonly string[],
  options: CrawlOptions,
  logger: pino.Logger,
): Promise<CrawlResult> {
  logger.info(
    { pages: urls.length, concurrency: options.maxConcurrency, timeoutMs: options.fetchTimeoutMs },
    "Crawling pages",
  );

  const outcomes = await runPool(
    urls,
    (url, signal) => scrapeArticle(url, { ...options, signal }, logger.child({ url })),
    {
      concurrency: options.maxConcurrency,
      taskTimeoutMs: options.fetchTimeoutMs,
      delayMs: options.delayMs,
      signal: options.signal,
    },
  );

  const articles: Article[] = [];
  const failures: FetchFailure[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      articles.push(outcome.value);
      logger.info({ url: outcome.item, title: outcome.value.title }, "Page extracted");
    } else {
      const failure: FetchFailure = {
        url: outcome.item,
        stage: outcome.error instanceof ExtractionError ? "extract" : "fetch",
        error: errorMessage(outcome.error),
        at: new Date().toISOString(),
      };
      failures.push(failure);
      logger.warn({ url: outcome.item, stage: failure.stage, err: failure.error }, "Skipping page");
    }
  }

  logger.info({ extracted: articles.length, failed: failures.length }, "Crawl complete");
  return { articles, failures };
}
