import { z } from "zod";
import dotenv from "dotenv";
import { ConfigurationError } from "../errors.js";

dotenv.config();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.toLowerCase()),
  );

const configSchema = z.object({
  site: z.object({
    sitemapUrl: z.string().url().optional(),
  }),
  crawler: z.object({
    maxConcurrency: z.coerce.number().int().positive().default(5),
    fetchTimeoutMs: z.coerce.number().positive().default(30000),
    delayMs: z.coerce.number().min(0).default(1000),
    maxContentLength: z.coerce.number().int().positive().default(10000),
    minWords: z.coerce.number().int().min(0).default(10),
    renderScripts: booleanFlag.default(false),
  }),
  embeddings: z.object({
    provider: z.enum(["openai", "google"]).default("google"),
    model: z.string().min(1).optional(),
    dimensions: z.coerce.number().int().positive().optional(),
    maxInputChars: z.coerce.number().int().positive().default(8000),
    timeoutMs: z.coerce.number().positive().default(30000),
  }),
  generation: z.object({
    provider: z.enum(["openai", "claude-cli"]).default("openai"),
    model: z.string().min(1).default("gpt-4o"),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    timeoutMs: z.coerce.number().positive().default(60000),
    excerptLength: z.coerce.number().int().positive().default(300),
  }),
  credentials: z.object({
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().url().default("https://api.openai.com/v1"),
    googleApiKey: z.string().optional(),
  }),
  retry: z.object({
    attempts: z.coerce.number().int().min(0).default(1),
    initialDelayMs: z.coerce.number().min(0).default(1000),
  }),
  ranking: z
    .object({
      finalSuggestions: z.coerce.number().int().positive().default(5),
      candidatePoolSize: z.coerce.number().int().positive().default(10),
      minSimilarity: z.coerce.number().min(0).max(1).default(0.5),
    })
    .refine((r) => r.candidatePoolSize >= r.finalSuggestions, {
      message: "CANDIDATE_POOL_SIZE must be at least FINAL_SUGGESTIONS",
    }),
  store: z.object({
    dir: z.string().default("./data/vector-store"),
  }),
  dashboard: z.object({
    port: z.coerce.number().int().positive().default(3848),
  }),
  log: z.object({
    level: z.string().default("info"),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type EmbeddingProviderName = Config["embeddings"]["provider"];
export type GenerationProviderName = Config["generation"]["provider"];

// Empty strings in .env mean "unset"
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

function buildRawConfig(): Record<string, unknown> {
  return {
    site: {
      sitemapUrl: env("SITEMAP_URL"),
    },
    crawler: {
      maxConcurrency: env("MAX_CONCURRENT_FETCHES"),
      fetchTimeoutMs: env("FETCH_TIMEOUT_MS"),
      delayMs: env("FETCH_DELAY_MS"),
      maxContentLength: env("MAX_CONTENT_LENGTH"),
      minWords: env("MIN_CONTENT_WORDS"),
      renderScripts: env("RENDER_SCRIPTS"),
    },
    embeddings: {
      provider: env("EMBEDDING_PROVIDER"),
      model: env("EMBEDDING_MODEL"),
      dimensions: env("EMBEDDING_DIMENSIONS"),
      maxInputChars: env("EMBEDDING_MAX_INPUT_CHARS"),
      timeoutMs: env("EMBEDDING_TIMEOUT_MS"),
    },
    generation: {
      provider: env("GENERATION_PROVIDER"),
      model: env("GENERATION_MODEL"),
      temperature: env("GENERATION_TEMPERATURE"),
      timeoutMs: env("GENERATION_TIMEOUT_MS"),
      excerptLength: env("GENERATION_EXCERPT_LENGTH"),
    },
    credentials: {
      openaiApiKey: env("OPENAI_API_KEY"),
      openaiBaseUrl: env("OPENAI_BASE_URL"),
      googleApiKey: env("GOOGLE_API_KEY"),
    },
    retry: {
      attempts: env("RETRY_ATTEMPTS"),
      initialDelayMs: env("RETRY_INITIAL_DELAY_MS"),
    },
    ranking: {
      finalSuggestions: env("FINAL_SUGGESTIONS"),
      candidatePoolSize: env("CANDIDATE_POOL_SIZE"),
      minSimilarity: env("MIN_SIMILARITY"),
    },
    store: {
      dir: env("VECTOR_STORE_DIR"),
    },
    dashboard: {
      port: env("DASHBOARD_PORT"),
    },
    log: {
      level: env("LOG_LEVEL"),
    },
  };
}

export function loadConfig(): Config {
  const result = configSchema.safeParse(buildRawConfig());
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
