import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type pino from "pino";
import type { Config, EmbeddingProviderName } from "../config/index.js";
import { ConfigurationError, EmbeddingError, errorMessage } from "../errors.js";
import type { Article } from "../types.js";
import { withRetry } from "../util/retry.js";
import { createGoogleEmbeddingBackend } from "./google.js";
import { createOpenAIEmbeddingBackend } from "./openai.js";

export const DEFAULT_MODELS: Record<EmbeddingProviderName, string> = {
  openai: "text-embedding-3-small",
  google: "text-embedding-004",
};

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
  "text-embedding-004": 768,
  "gemini-embedding-001": 3072,
};

/** One provider call, without caching, truncation or retries. */
export interface EmbeddingBackend {
  provider: EmbeddingProviderName;
  model: string;
  dimension: number;
  request(text: string): Promise<number[]>;
}

export interface EmbeddingService {
  readonly provider: EmbeddingProviderName;
  readonly model: string;
  readonly dimension: number;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

export interface EmbeddingServiceOptions {
  maxInputChars: number;
  retry: { attempts: number; initialDelayMs: number };
  cacheSize?: number;
}

export function articleEmbeddingText(article: Pick<Article, "title" | "content">): string {
  return `${article.title}\n\n${article.content}`;
}

export function contentHash(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Wraps a backend with input truncation, an in-process memo and retries.
 * Identical text under the same model always yields the same vector.
 */
export function createEmbeddingServiceFromBackend(
  backend: EmbeddingBackend,
  options: EmbeddingServiceOptions,
  logger: pino.Logger,
): EmbeddingService {
  const cache = new LRUCache<string, Float32Array>({ max: options.cacheSize ?? 1000 });

  async function embed(text: string): Promise<Float32Array> {
    const input = text.slice(0, options.maxInputChars);
    if (input.trim().length === 0) {
      throw new EmbeddingError("Cannot embed empty text");
    }
    if (text.length > input.length) {
      logger.debug({ chars: text.length, kept: input.length }, "Truncated embedding input");
    }

    const key = contentHash(`${backend.model}\u0000${input}`);
    const cached = cache.get(key);
    if (cached) return cached.slice();

    let values: number[];
    try {
      values = await withRetry(() => backend.request(input), options.retry, logger);
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`${backend.provider} embedding request failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    if (values.length !== backend.dimension) {
      throw new EmbeddingError(
        `${backend.provider} returned a ${values.length}-dimensional vector, expected ${backend.dimension}`,
      );
    }

    const vector = Float32Array.from(values);
    cache.set(key, vector);
    return vector.slice();
  }

  async function embedBatch(texts: string[]): Promise<Float32Array[]> {
    const results: Float32Array[] = [];
    for (const text of texts) {
      results.push(await embed(text));
    }
    return results;
  }

  return {
    provider: backend.provider,
    model: backend.model,
    dimension: backend.dimension,
    embed,
    embedBatch,
  };
}

export function createEmbeddingService(config: Config, logger: pino.Logger): EmbeddingService {
  const { provider, dimensions } = config.embeddings;
  const model = (config.embeddings.model ?? DEFAULT_MODELS[provider]).replace(/^models\//, "");
  const dimension = dimensions ?? KNOWN_DIMENSIONS[model];
  if (dimension === undefined) {
    throw new ConfigurationError(
      `Unknown vector size for embedding model "${model}"; set EMBEDDING_DIMENSIONS`,
    );
  }

  let backend: EmbeddingBackend;
  if (provider === "openai") {
    const apiKey = config.credentials.openaiApiKey;
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for EMBEDDING_PROVIDER=openai");
    }
    backend = createOpenAIEmbeddingBackend({
      apiKey,
      baseUrl: config.credentials.openaiBaseUrl,
      model,
      dimension,
      requestDimensions: dimensions,
      timeoutMs: config.embeddings.timeoutMs,
    });
  } else {
    const apiKey = config.credentials.googleApiKey;
    if (!apiKey) {
      throw new ConfigurationError("GOOGLE_API_KEY is required for EMBEDDING_PROVIDER=google");
    }
    backend = createGoogleEmbeddingBackend({
      apiKey,
      model,
      dimension,
      requestDimensions: dimensions,
      timeoutMs: config.embeddings.timeoutMs,
    });
  }

  logger.info({ provider, model, dim: dimension }, "Embedding service ready");

  return createEmbeddingServiceFromBackend(
    backend,
    { maxInputChars: config.embeddings.maxInputChars, retry: config.retry },
    logger,
  );
}

/** Model id the configuration would embed with, without needing credentials. */
export function configuredEmbeddingModel(config: Config): string {
  return (config.embeddings.model ?? DEFAULT_MODELS[config.embeddings.provider]).replace(/^models\//, "");
}
