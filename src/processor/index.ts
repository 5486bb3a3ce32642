import type pino from "pino";
import type { Config } from "../config/index.js";
import { ConfigurationError, GenerationError, errorMessage } from "../errors.js";
import type { Article, CandidatePair, SuggestionOutcome } from "../types.js";
import { isTransientError, withRetry, type RetryOptions } from "../util/retry.js";
import { createClaudeCliCompleter } from "./claude-cli.js";
import { createOpenAIChatCompleter } from "./openai.js";
import {
  MalformedOutputError,
  RATIONALE_SYSTEM_PROMPT,
  buildRationalePrompt,
  parseRationaleOutput,
  type Rationale,
} from "./rationale.js";

export { parseRationaleOutput, buildRationalePrompt, MalformedOutputError } from "./rationale.js";
export type { Rationale } from "./rationale.js";

/** A model that turns a system + user prompt into raw text. */
export interface TextCompleter {
  name: string;
  model: string;
  complete(system: string, user: string): Promise<string>;
}

type ArticleText = Pick<Article, "url" | "title" | "content">;

export interface RationaleGenerator {
  readonly model: string;
  generate(source: ArticleText, target: ArticleText, score: number): Promise<Rationale>;
}

export interface RationaleGeneratorOptions {
  excerptLength: number;
  retry: Pick<RetryOptions, "attempts" | "initialDelayMs">;
}

/** Malformed output gets the same single retry as a transient failure. */
function isRetryableGenerationError(err: unknown): boolean {
  return err instanceof MalformedOutputError || isTransientError(err);
}

export function createRationaleGeneratorFromCompleter(
  completer: TextCompleter,
  options: RationaleGeneratorOptions,
  logger: pino.Logger,
): RationaleGenerator {
  return {
    model: completer.model,
    async generate(source, target, score) {
      const prompt = buildRationalePrompt(source, target, score, options.excerptLength);
      try {
        return await withRetry(
          async () => parseRationaleOutput(await completer.complete(RATIONALE_SYSTEM_PROMPT, prompt), logger),
          { ...options.retry, shouldRetry: isRetryableGenerationError },
          logger,
        );
      } catch (err) {
        if (err instanceof GenerationError) throw err;
        throw new GenerationError(`${completer.name} request failed: ${errorMessage(err)}`, undefined, {
          cause: err,
        });
      }
    },
  };
}

export function createRationaleGenerator(config: Config, logger: pino.Logger): RationaleGenerator {
  const { provider, model, temperature, timeoutMs, excerptLength } = config.generation;
  let completer: TextCompleter;

  if (provider === "openai") {
    const apiKey = config.credentials.openaiApiKey;
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for GENERATION_PROVIDER=openai");
    }
    completer = createOpenAIChatCompleter(
      { apiKey, baseUrl: config.credentials.openaiBaseUrl, model, temperature, timeoutMs },
      logger,
    );
  } else {
    completer = createClaudeCliCompleter({ model, timeoutMs }, logger);
  }

  logger.info({ provider, model }, "Rationale generator ready");
  return createRationaleGeneratorFromCompleter(completer, { excerptLength, retry: config.retry }, logger);
}

/**
 * Generates a reason and anchor text for each candidate, in rank order.
 * A candidate whose generation fails becomes an incomplete outcome; the
 * others are unaffected.
 */
export async function generateSuggestions(
  source: ArticleText,
  candidates: readonly CandidatePair[],
  lookup: (url: string) => ArticleText | null,
  generator: RationaleGenerator,
  logger: pino.Logger,
): Promise<SuggestionOutcome[]> {
  const outcomes: SuggestionOutcome[] = [];

  for (const candidate of candidates) {
    const target = lookup(candidate.targetUrl);
    const base = {
      fromPost: source.url,
      toPost: candidate.targetUrl,
      toTitle: target?.title ?? "",
      similarity: candidate.score,
    };

    if (!target) {
      outcomes.push({ status: "incomplete", incomplete: { ...base, error: "Target article missing from store" } });
      continue;
    }

    try {
      const rationale = await generator.generate(source, target, candidate.score);
      outcomes.push({
        status: "complete",
        suggestion: { ...base, reason: rationale.reason, anchorText: rationale.anchorText },
      });
      logger.debug({ to: candidate.targetUrl, anchor: rationale.anchorText }, "Suggestion generated");
    } catch (err) {
      const error = errorMessage(err);
      logger.warn({ to: candidate.targetUrl, err: error }, "Rationale generation failed");
      outcomes.push({ status: "incomplete", incomplete: { ...base, error } });
    }
  }

  return outcomes;
}
