import { z } from "zod";
import { EmbeddingError } from "../errors.js";
import type { EmbeddingBackend } from "./index.js";

const responseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimension: number;
  /** Sent only when the caller asked for a non-default size. */
  requestDimensions?: number;
  timeoutMs: number;
}

export function createOpenAIEmbeddingBackend(options: OpenAIEmbeddingOptions): EmbeddingBackend {
  const endpoint = `${options.baseUrl.replace(/\/+$/, "")}/embeddings`;

  return {
    provider: "openai",
    model: options.model,
    dimension: options.dimension,

    async request(text: string): Promise<number[]> {
      const response = await fetch(endpoint, {
        method: "POST",
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          model: options.model,
          input: text,
          ...(options.requestDimensions ? { dimensions: options.requestDimensions } : {}),
        }),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new EmbeddingError(
          `OpenAI embeddings returned HTTP ${response.status}: ${body.slice(0, 200)}`,
          response.status,
        );
      }

      const parsed = responseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new EmbeddingError("Invalid embedding response from OpenAI");
      }
      return parsed.data.data[0]?.embedding ?? [];
    },
  };
}
