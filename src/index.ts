#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { renderBuildReport, renderReport, renderSaveNotice } from "./cli/render.js";
import { loadConfig, type Config } from "./config/index.js";
import { createLogger } from "./config/logger.js";
import { createDashboardServer } from "./dashboard/server.js";
import { configuredEmbeddingModel, createEmbeddingService } from "./embeddings/index.js";
import { ArticleNotIndexedError, ConfigurationError, errorMessage } from "./errors.js";
import { serializeSuggestions } from "./export/index.js";
import { buildIndex } from "./pipeline/build.js";
import { suggestLinks } from "./pipeline/suggest.js";
import { createRationaleGenerator } from "./processor/index.js";
import type { RankOptions } from "./ranker/index.js";
import { VectorStore } from "./store/index.js";

const USAGE = `Usage: link-suggester <command> [options]

Commands:
  build [--sitemap <url>]          Crawl the sitemap and rebuild the vector store
  query [<url>] [--out <file>]     Suggest internal links for one indexed post
        [--limit <n>] [--min-similarity <x>]
  urls                             List indexed posts
  serve [--port <n>]               Start the dashboard

Options:
  -h, --help                       Show this help
  -v, --version                    Show the version`;

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  const parsed = z.object({ version: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.version : "unknown";
}

function numericFlag<T>(value: string | undefined, flag: string, schema: z.ZodType<T>): T | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid value for --${flag}: ${value}`);
  }
  return parsed.data;
}

function rankingOptions(config: Config, limit?: number, minSimilarity?: number): RankOptions {
  const finalLimit = limit ?? config.ranking.finalSuggestions;
  return {
    limit: finalLimit,
    minSimilarity: minSimilarity ?? config.ranking.minSimilarity,
    poolSize: Math.max(config.ranking.candidatePoolSize, finalLimit),
  };
}

async function promptForUrl(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question("Blog post URL: ")).trim();
  } finally {
    rl.close();
  }
}

async function runBuild(config: Config, sitemapFlag: string | undefined): Promise<void> {
  const logger = createLogger(config.log.level, "build");
  const sitemapUrl = sitemapFlag ?? config.site.sitemapUrl;
  if (!sitemapUrl) {
    throw new ConfigurationError("SITEMAP_URL or --sitemap is required for build");
  }

  const embeddings = createEmbeddingService(config, logger);
  const store = VectorStore.open(config.store.dir);
  try {
    const report = await buildIndex(sitemapUrl, { config, embeddings, store, logger });
    console.log(renderBuildReport(report));
  } finally {
    store.close();
  }
}

async function runQuery(
  config: Config,
  urlArg: string | undefined,
  flags: { out?: string; limit?: string; minSimilarity?: string },
): Promise<void> {
  const logger = createLogger(config.log.level, "query");
  const limit = numericFlag(flags.limit, "limit", z.coerce.number().int().positive());
  const minSimilarity = numericFlag(flags.minSimilarity, "min-similarity", z.coerce.number().min(0).max(1));

  const url = urlArg ?? (await promptForUrl());
  if (!url) {
    throw new ConfigurationError("A blog post URL is required");
  }

  const store = VectorStore.openExisting(config.store.dir);
  try {
    const result = await suggestLinks(url, {
      store,
      generator: createRationaleGenerator(config, logger),
      ranking: rankingOptions(config, limit, minSimilarity),
      expectedModel: configuredEmbeddingModel(config),
      logger,
    });
    console.log(renderReport(result));

    if (flags.out) {
      await writeFile(flags.out, `${serializeSuggestions(result.suggestions)}\n`, "utf-8");
      console.log(`\n${renderSaveNotice(result, flags.out)}`);
    }
  } catch (err) {
    if (err instanceof ArticleNotIndexedError && err.sampleUrls.length > 0) {
      console.error(`Indexed posts include (${err.indexedCount} total):`);
      for (const sample of err.sampleUrls) console.error(`  ${sample}`);
    }
    throw err;
  } finally {
    store.close();
  }
}

function runUrls(config: Config): void {
  const store = VectorStore.openExisting(config.store.dir);
  try {
    store.assertQueryable();
    for (const article of store.list()) {
      console.log(`${article.url}\t${article.title}`);
    }
  } finally {
    store.close();
  }
}

async function runServe(config: Config, portFlag: string | undefined): Promise<void> {
  const logger = createLogger(config.log.level, "dashboard");
  const port = numericFlag(portFlag, "port", z.coerce.number().int().min(0).max(65535)) ?? config.dashboard.port;

  const dashboard = createDashboardServer(
    {
      openStore: () => VectorStore.openExisting(config.store.dir),
      createGenerator: () => createRationaleGenerator(config, logger),
      ranking: rankingOptions(config),
      expectedModel: configuredEmbeddingModel(config),
    },
    logger,
  );
  const bound = await dashboard.start(port);
  console.log(`Dashboard: http://localhost:${bound}/`);

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down...");
    dashboard.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: errorMessage(err) }, "Shutdown failed");
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      sitemap: { type: "string" },
      out: { type: "string", short: "o" },
      limit: { type: "string" },
      "min-similarity": { type: "string" },
      port: { type: "string" },
    },
  });

  if (values.version) {
    console.log(readVersion());
    return;
  }
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  switch (command) {
    case "build":
      await runBuild(config, values.sitemap);
      break;
    case "query":
      await runQuery(config, rest[0], {
        out: values.out,
        limit: values.limit,
        minSimilarity: values["min-similarity"],
      });
      break;
    case "urls":
      runUrls(config);
      break;
    case "serve":
      await runServe(config, values.port);
      break;
    default:
      throw new ConfigurationError(`Unknown command "${command}"\n\n${USAGE}`);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
