import { z } from "zod";
import type pino from "pino";
import { GenerationError } from "../errors.js";
import type { Article } from "../types.js";

export const MIN_ANCHOR_WORDS = 3;
export const MAX_ANCHOR_WORDS = 7;

const SINGLE_QUOTE_PAIRS: Record<string, string> = { "'": "'", "‘": "’" };

/**
 * Strips wrapping quotes and trailing periods. Single quotes go only as a
 * matched pair, so a possessive like `gardeners' tips` keeps its apostrophe.
 */
export function stripQuotes(text: string): string {
  let anchor = text.trim();
  for (;;) {
    const next = anchor.replace(/^["“”`]+|["“”`.]+$/g, "").trim();
    const first = next.charAt(0);
    const closing = SINGLE_QUOTE_PAIRS[first];
    const unwrapped =
      closing !== undefined && next.length > 1 && next.endsWith(closing) ? next.slice(1, -1).trim() : next;
    if (unwrapped === anchor) return anchor;
    anchor = unwrapped;
  }
}

export function wordCount(text: string): number {
  const words = text.trim().match(/\S+/g);
  return words ? words.length : 0;
}

const rationaleSchema = z.object({
  reason: z.string().trim().min(1, "reason is empty"),
  anchor_text: z
    .string()
    .transform(stripQuotes)
    .refine(
      (anchor) => {
        const n = wordCount(anchor);
        return n >= MIN_ANCHOR_WORDS && n <= MAX_ANCHOR_WORDS;
      },
      { message: `anchor_text must be ${MIN_ANCHOR_WORDS}-${MAX_ANCHOR_WORDS} words` },
    ),
});

export interface Rationale {
  reason: string;
  anchorText: string;
}

export const RATIONALE_SYSTEM_PROMPT = `You are an SEO content strategist planning internal links between posts on the same blog.

Given a SOURCE post (where the link will be placed) and a TARGET post (the page being linked to), respond with ONLY valid JSON (no markdown fences, no explanation):
{
  "reason": "One concise sentence explaining why the source post should link to the target post.",
  "anchor_text": "3-7 word anchor phrase"
}

Rules:
- reason: focus on the semantic relationship, topical overlap and value to the reader; professional tone
- anchor_text: between ${MIN_ANCHOR_WORDS} and ${MAX_ANCHOR_WORDS} words, natural inside a sentence of the source post, descriptive of the target post's topic
- anchor_text must not be generic ("click here", "read more", "this article")
- do not wrap anchor_text in quotes`;

function excerpt(text: string, length: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > length ? `${flat.slice(0, length).trimEnd()}...` : flat;
}

export function buildRationalePrompt(
  source: Pick<Article, "url" | "title" | "content">,
  target: Pick<Article, "url" | "title" | "content">,
  score: number,
  excerptLength: number,
): string {
  return [
    `SOURCE post`,
    `URL: ${source.url}`,
    `Title: ${source.title}`,
    `Excerpt: ${excerpt(source.content, excerptLength)}`,
    ``,
    `TARGET post`,
    `URL: ${target.url}`,
    `Title: ${target.title}`,
    `Excerpt: ${excerpt(target.content, excerptLength)}`,
    ``,
    `Semantic similarity: ${(score * 100).toFixed(1)}%`,
  ].join("\n");
}

function validate(candidate: unknown): Rationale {
  const parsed = rationaleSchema.parse(candidate);
  return { reason: parsed.reason, anchorText: parsed.anchor_text };
}

export class MalformedOutputError extends GenerationError {}

/**
 * Parses model output into a rationale. Tries the whole output as JSON, then
 * a fenced code block, then the first {...} span.
 */
export function parseRationaleOutput(output: string, logger: pino.Logger): Rationale {
  let lastIssue = "no JSON object found";

  const attempt = (text: string, strategy: string): Rationale | null => {
    try {
      return validate(JSON.parse(text));
    } catch (err) {
      lastIssue =
        err instanceof z.ZodError
          ? err.issues.map((i) => i.message).join("; ")
          : "invalid JSON";
      logger.debug({ strategy, issue: lastIssue }, "Rationale parse strategy failed");
      return null;
    }
  };

  const direct = attempt(output.trim(), "direct");
  if (direct) return direct;

  const fenceMatch = output.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenceMatch?.[1]) {
    const fenced = attempt(fenceMatch[1].trim(), "code-fence");
    if (fenced) return fenced;
  }

  const braceMatch = output.match(/\{[\s\S]*\}/);
  if (braceMatch?.[0]) {
    const braced = attempt(braceMatch[0], "brace");
    if (braced) return braced;
  }

  throw new MalformedOutputError(
    `Malformed model output (${lastIssue}): ${output.slice(0, 200)}`,
  );
}
