import { z } from "zod";
import { EmbeddingError } from "../errors.js";
import type { EmbeddingBackend } from "./index.js";

const GOOGLE_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

const responseSchema = z.object({
  embedding: z.object({ values: z.array(z.number()) }),
});

export interface GoogleEmbeddingOptions {
  apiKey: string;
  model: string;
  dimension: number;
  requestDimensions?: number;
  timeoutMs: number;
}

export function createGoogleEmbeddingBackend(options: GoogleEmbeddingOptions): EmbeddingBackend {
  // Accept both "text-embedding-004" and "models/text-embedding-004"
  const modelId = options.model.replace(/^models\//, "");
  const endpoint = `${GOOGLE_API_BASE}/models/${modelId}:embedContent`;

  return {
    provider: "google",
    model: modelId,
    dimension: options.dimension,

    async request(text: string): Promise<number[]> {
      const response = await fetch(endpoint, {
        method: "POST",
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": options.apiKey,
        },
        body: JSON.stringify({
          model: `models/${modelId}`,
          content: { parts: [{ text }] },
          taskType: "SEMANTIC_SIMILARITY",
          ...(options.requestDimensions
            ? { outputDimensionality: options.requestDimensions }
            : {}),
        }),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new EmbeddingError(
          `Google embeddings returned HTTP ${response.status}: ${body.slice(0, 200)}`,
          response.status,
        );
      }

      const parsed = responseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new EmbeddingError("Invalid embedding response from Google");
      }
      return parsed.data.embedding.values;
    },
  };
}
