import type pino from "pino";
import type { Config } from "../config/index.js";
import { crawlArticles, fetchSitemapUrls } from "../crawler/index.js";
import { articleEmbeddingText, contentHash, type EmbeddingService } from "../embeddings/index.js";
import { BuildError, errorMessage } from "../errors.js";
import type { StoreEntry, VectorStore } from "../store/index.js";
import type { FetchFailure } from "../types.js";

export interface BuildDeps {
  config: Pick<Config, "crawler">;
  embeddings: EmbeddingService;
  store: VectorStore;
  logger: pino.Logger;
  signal?: AbortSignal;
}

export interface BuildReport {
  sitemapUrl: string;
  discovered: number;
  indexed: number;
  failures: FetchFailure[];
  builtAt: string;
  model: string;
  dimensions: number;
}

/**
 * Crawls the sitemap, embeds every extracted article and replaces the store
 * contents in one transaction. Pages that fail at any stage are skipped and
 * reported; the build only fails when nothing at all could be indexed.
 */
export async function buildIndex(sitemapUrl: string, deps: BuildDeps): Promise<BuildReport> {
  const { config, embeddings, store, logger } = deps;
  const startedAt = Date.now();

  const urls = await fetchSitemapUrls(sitemapUrl, { timeoutMs: config.crawler.fetchTimeoutMs }, logger);
  if (urls.length === 0) {
    throw new BuildError(`Sitemap ${sitemapUrl} lists no pages on this site`);
  }

  const { articles, failures } = await crawlArticles(
    urls,
    { ...config.crawler, signal: deps.signal },
    logger,
  );

  const entries: StoreEntry[] = [];
  for (const article of articles) {
    const text = articleEmbeddingText(article);
    try {
      const vector = await embeddings.embed(text);
      entries.push({
        article,
        embedding: { url: article.url, vector, model: embeddings.model, contentHash: contentHash(text) },
      });
    } catch (err) {
      const failure: FetchFailure = {
        url: article.url,
        stage: "embed",
        error: errorMessage(err),
        at: new Date().toISOString(),
      };
      failures.push(failure);
      logger.warn({ url: article.url, err: failure.error }, "Skipping article: embedding failed");
    }
  }

  if (entries.length === 0) {
    throw new BuildError(
      `No articles could be indexed from ${urls.length} URLs (${failures.length} failures); the existing store was left unchanged`,
    );
  }

  const builtAt = new Date().toISOString();
  store.replaceAll(
    {
      provider: embeddings.provider,
      model: embeddings.model,
      dimensions: embeddings.dimension,
      builtAt,
      sitemapUrl,
    },
    entries,
    failures,
  );

  logger.info(
    {
      discovered: urls.length,
      indexed: entries.length,
      failed: failures.length,
      durationMs: Date.now() - startedAt,
    },
    "Index built",
  );

  return {
    sitemapUrl,
    discovered: urls.length,
    indexed: entries.length,
    failures,
    builtAt,
    model: embeddings.model,
    dimensions: embeddings.dimension,
  };
}
