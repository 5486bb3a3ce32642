import { describe, it, expect, vi, afterEach } from "vitest";
import { GenerationError } from "../../src/errors.js";
import {
  createRationaleGenerator,
  createRationaleGeneratorFromCompleter,
  generateSuggestions,
  type RationaleGenerator,
  type TextCompleter,
} from "../../src/processor/index.js";
import { createOpenAIChatCompleter } from "../../src/processor/openai.js";
import { MalformedOutputError } from "../../src/processor/rationale.js";
import type { CandidatePair } from "../../src/types.js";
import { json, logger, stubFetch, testConfig } from "../helpers.js";

const GOOD_OUTPUT = JSON.stringify({ reason: "Both posts cover soil health.", anchor_text: "improving garden soil health" });

const source = { url: "https://example.com/source", title: "Source", content: "Source body" };
const target = { url: "https://example.com/target", title: "Target", content: "Target body" };

function completer(complete: TextCompleter["complete"]): TextCompleter {
  return { name: "fake", model: "fake-model", complete: vi.fn(complete) };
}

const generatorOptions = { excerptLength: 300, retry: { attempts: 1, initialDelayMs: 0 } };

describe("createRationaleGeneratorFromCompleter", () => {
  it("returns the parsed rationale", async () => {
    const generator = createRationaleGeneratorFromCompleter(
      completer(async () => GOOD_OUTPUT),
      generatorOptions,
      logger,
    );

    expect(await generator.generate(source, target, 0.8)).toEqual({
      reason: "Both posts cover soil health.",
      anchorText: "improving garden soil health",
    });
  });

  it("retries malformed output once", async () => {
    const complete = vi.fn<TextCompleter["complete"]>()
      .mockResolvedValueOnce("no json here")
      .mockResolvedValueOnce(GOOD_OUTPUT);
    const generator = createRationaleGeneratorFromCompleter(
      { name: "fake", model: "fake-model", complete },
      generatorOptions,
      logger,
    );

    expect((await generator.generate(source, target, 0.8)).anchorText).toBe("improving garden soil health");
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("gives up after one retry", async () => {
    const complete = vi.fn<TextCompleter["complete"]>().mockResolvedValue("still no json");
    const generator = createRationaleGeneratorFromCompleter(
      { name: "fake", model: "fake-model", complete },
      generatorOptions,
      logger,
    );

    await expect(generator.generate(source, target, 0.8)).rejects.toBeInstanceOf(MalformedOutputError);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    const complete = vi.fn<TextCompleter["complete"]>().mockRejectedValue(new GenerationError("HTTP 400", 400));
    const generator = createRationaleGeneratorFromCompleter(
      { name: "fake", model: "fake-model", complete },
      generatorOptions,
      logger,
    );

    await expect(generator.generate(source, target, 0.8)).rejects.toThrow("HTTP 400");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("wraps unexpected errors in GenerationError", async () => {
    const generator = createRationaleGeneratorFromCompleter(
      completer(async () => {
        throw new Error("boom");
      }),
      generatorOptions,
      logger,
    );

    const result = generator.generate(source, target, 0.8);
    await expect(result).rejects.toBeInstanceOf(GenerationError);
    await expect(result).rejects.toThrow("fake request failed: boom");
  });
});

describe("createRationaleGenerator", () => {
  it("requires an OpenAI key for the openai provider", () => {
    expect(() => createRationaleGenerator(testConfig(), logger)).toThrow(
      "OPENAI_API_KEY is required for GENERATION_PROVIDER=openai",
    );
  });

  it("builds a claude-cli generator without a key", () => {
    const config = testConfig();
    config.generation = { ...config.generation, provider: "claude-cli", model: "sonnet" };
    expect(createRationaleGenerator(config, logger).model).toBe("sonnet");
  });
});

describe("generateSuggestions", () => {
  const candidates: CandidatePair[] = [0.95, 0.9, 0.8, 0.7, 0.6].map((score, i) => ({
    sourceUrl: source.url,
    targetUrl: `https://example.com/post-${i + 1}`,
    score,
  }));

  const lookup = (url: string) => ({ url, title: `Title of ${url.slice(-6)}`, content: "Body" });

  it("turns one failed pair into an incomplete marker and keeps the rest", async () => {
    const generator: RationaleGenerator = {
      model: "fake-model",
      generate: vi.fn(async (_source: unknown, t: { url: string; title: string }) => {
        if (t.url.endsWith("post-3")) throw new GenerationError("Claude CLI exited with code 1: ");
        return { reason: `Links to ${t.title}`, anchorText: "useful related gardening post" };
      }),
    };

    const outcomes = await generateSuggestions(source, candidates, lookup, generator, logger);

    expect(outcomes.map((o) => o.status)).toEqual(["complete", "complete", "incomplete", "complete", "complete"]);
    expect(outcomes[0]).toEqual({
      status: "complete",
      suggestion: {
        fromPost: "https://example.com/source",
        toPost: "https://example.com/post-1",
        toTitle: "Title of post-1",
        reason: "Links to Title of post-1",
        anchorText: "useful related gardening post",
        similarity: 0.95,
      },
    });
    expect(outcomes[2]).toEqual({
      status: "incomplete",
      incomplete: {
        fromPost: "https://example.com/source",
        toPost: "https://example.com/post-3",
        toTitle: "Title of post-3",
        similarity: 0.8,
        error: "Claude CLI exited with code 1: ",
      },
    });
  });

  it("marks a target missing from the store as incomplete", async () => {
    const generator: RationaleGenerator = { model: "fake-model", generate: vi.fn() };

    const outcomes = await generateSuggestions(source, candidates.slice(0, 1), () => null, generator, logger);

    expect(outcomes).toEqual([
      {
        status: "incomplete",
        incomplete: {
          fromPost: "https://example.com/source",
          toPost: "https://example.com/post-1",
          toTitle: "",
          similarity: 0.95,
          error: "Target article missing from store",
        },
      },
    ]);
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it("returns nothing for no candidates", async () => {
    const generator: RationaleGenerator = { model: "fake-model", generate: vi.fn() };
    expect(await generateSuggestions(source, [], lookup, generator, logger)).toEqual([]);
  });
});

describe("createOpenAIChatCompleter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const options = {
    apiKey: "test-secret",
    baseUrl: "https://api.example.test/v1",
    model: "gpt-4o",
    temperature: 0.7,
    timeoutMs: 1000,
  };

  it("requests a JSON-mode chat completion", async () => {
    const fetchMock = stubFetch({
      "https://api.example.test/v1/chat/completions": json({ choices: [{ message: { content: GOOD_OUTPUT } }] }),
    });

    const output = await createOpenAIChatCompleter(options, logger).complete("system prompt", "user prompt");

    expect(output).toBe(GOOD_OUTPUT);
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toEqual({
      model: "gpt-4o",
      temperature: 0.7,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: "system prompt" },
        { role: "user", content: "user prompt" },
      ],
    });
  });

  it("raises GenerationError with the HTTP status", async () => {
    stubFetch({
      "https://api.example.test/v1/chat/completions": () => new Response("busy", { status: 503 }),
    });

    await expect(createOpenAIChatCompleter(options, logger).complete("s", "u")).rejects.toMatchObject({
      name: "GenerationError",
      status: 503,
    });
  });

  it("rejects an empty completion", async () => {
    stubFetch({
      "https://api.example.test/v1/chat/completions": json({ choices: [{ message: { content: null } }] }),
    });

    await expect(createOpenAIChatCompleter(options, logger).complete("s", "u")).rejects.toThrow(
      "OpenAI returned an empty completion",
    );
  });
});
