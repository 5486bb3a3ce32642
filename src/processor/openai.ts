import { z } from "zod";
import type pino from "pino";
import { GenerationError } from "../errors.js";
import type { TextCompleter } from "./index.js";

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export interface OpenAIChatOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

/** Chat completions in JSON mode. */
export function createOpenAIChatCompleter(options: OpenAIChatOptions, logger: pino.Logger): TextCompleter {
  const endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  return {
    name: "openai",
    model: options.model,

    async complete(system: string, user: string): Promise<string> {
      logger.debug({ model: options.model, inputLength: user.length }, "Sending to OpenAI");

      const response = await fetch(endpoint, {
        method: "POST",
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          model: options.model,
          temperature: options.temperature,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
        }),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new GenerationError(
          `OpenAI chat returned HTTP ${response.status}: ${body.slice(0, 200)}`,
          response.status,
        );
      }

      const parsed = chatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GenerationError("Invalid chat completion response from OpenAI");
      }
      const content = parsed.data.choices[0]?.message.content;
      if (!content) {
        throw new GenerationError("OpenAI returned an empty completion");
      }
      return content;
    },
  };
}
