/**
 * Error taxonomy for the link suggester.
 *
 * Per-item failures (fetch, extraction, embedding, generation) are caught by the
 * pipelines and reported; the rest abort the command that raised them.
 */

export class LinkSuggesterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends LinkSuggesterError {}

export class SitemapError extends LinkSuggesterError {
  constructor(
    readonly sitemapUrl: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Sitemap ${sitemapUrl}: ${message}`, options);
  }
}

export class FetchError extends LinkSuggesterError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ExtractionError extends LinkSuggesterError {
  constructor(
    readonly url: string,
    message: string,
  ) {
    super(message);
  }
}

export class EmbeddingError extends LinkSuggesterError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DimensionMismatchError extends LinkSuggesterError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly id?: string,
  ) {
    super(
      `Vector dimension mismatch${id ? ` for ${id}` : ""}: expected ${expected}, got ${actual}`,
    );
  }
}

export class StoreUnavailableError extends LinkSuggesterError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Vector store unavailable: ${reason}. Rebuild it with "link-suggester build".`, options);
  }
}

export class ArticleNotIndexedError extends LinkSuggesterError {
  constructor(
    readonly url: string,
    readonly sampleUrls: string[],
    readonly indexedCount: number,
  ) {
    super(`URL not found in the vector store: ${url}`);
  }
}

/** A build that produced nothing to index; the previous store is kept. */
export class BuildError extends LinkSuggesterError {}

export class GenerationError extends LinkSuggesterError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
