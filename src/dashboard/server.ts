import express from "express";
import type { ErrorRequestHandler, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import fs from "node:fs";
import type { Server } from "node:http";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type pino from "pino";
import { z } from "zod";
import { ArticleNotIndexedError, StoreUnavailableError, errorMessage } from "../errors.js";
import { exportRecordSchema, formatSimilarity, serializeRecords, toExportRecord } from "../export/index.js";
import { suggestLinks, type SuggestionResult } from "../pipeline/suggest.js";
import type { RationaleGenerator } from "../processor/index.js";
import type { RankOptions } from "../ranker/index.js";
import type { VectorStore } from "../store/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function resolveHtml(): string {
  const local = path.join(__dirname, "index.html");
  if (fs.existsSync(local)) return local;
  const srcPath = path.join(__dirname, "../../src/dashboard/index.html");
  if (fs.existsSync(srcPath)) return srcPath;
  return local;
}

export interface DashboardDeps {
  /** Opened on first use; a failure is retried on the next request. */
  openStore: () => VectorStore;
  /** Built on first suggestion request. */
  createGenerator: () => RationaleGenerator;
  ranking: RankOptions;
  expectedModel?: string;
}

export interface DashboardServer {
  app: express.Express;
  /** Resolves with the bound port. */
  start(port: number): Promise<number>;
  stop(): Promise<void>;
}

const suggestionRequestSchema = z.object({
  url: z.string().trim().url(),
});

const exportRequestSchema = z.object({
  suggestions: z.array(exportRecordSchema),
});

export function toSuggestionResponse(result: SuggestionResult) {
  return {
    from_post: result.source.url,
    from_title: result.source.title,
    suggestions: result.suggestions.map((s) => ({ ...toExportRecord(s), to_title: s.toTitle })),
    incomplete: result.incomplete.map((i) => ({
      to_post: i.toPost,
      to_title: i.toTitle,
      similarity_score: formatSimilarity(i.similarity),
      error: i.error,
    })),
  };
}

export function createDashboardServer(deps: DashboardDeps, logger: pino.Logger): DashboardServer {
  const app = express();
  app.use(express.json());

  const suggestLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many suggestion requests, please try again later" },
  });

  let store: VectorStore | null = null;
  let generator: RationaleGenerator | null = null;
  let server: Server | null = null;

  function getStore(): VectorStore {
    store ??= deps.openStore();
    return store;
  }

  function getGenerator(): RationaleGenerator {
    generator ??= deps.createGenerator();
    return generator;
  }

  function sendError(res: Response, err: unknown, context: string): void {
    if (err instanceof ArticleNotIndexedError) {
      res.status(404).json({
        error: err.message,
        indexed_count: err.indexedCount,
        sample_urls: err.sampleUrls,
      });
      return;
    }
    if (err instanceof StoreUnavailableError) {
      res.status(503).json({ error: err.message });
      return;
    }
    logger.error({ err: errorMessage(err) }, `${context} failed`);
    res.status(500).json({ error: `${context} failed; check server logs` });
  }

  async function runSuggestions(url: string): Promise<SuggestionResult> {
    return suggestLinks(url, {
      store: getStore(),
      generator: getGenerator(),
      ranking: deps.ranking,
      expectedModel: deps.expectedModel,
      logger,
    });
  }

  app.get("/", (_req, res) => {
    res.sendFile(resolveHtml());
  });

  app.get("/api/health", (_req, res) => {
    try {
      const meta = getStore().assertQueryable(deps.expectedModel);
      res.json({ status: "ok", articles: getStore().count(), store: meta });
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        res.status(503).json({ status: "unavailable", error: err.message });
        return;
      }
      sendError(res, err, "Health check");
    }
  });

  app.get("/api/articles", (_req, res) => {
    try {
      const s = getStore();
      res.json({ articles: s.list(), failures: s.failures() });
    } catch (err) {
      sendError(res, err, "Listing articles");
    }
  });

  app.post("/api/suggestions", suggestLimiter, async (req: Request, res: Response) => {
    const parsed = suggestionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Body must be JSON with an absolute \"url\"" });
      return;
    }

    try {
      logger.info({ url: parsed.data.url }, "Suggestion query from dashboard");
      const result = await runSuggestions(parsed.data.url);
      res.json(toSuggestionResponse(result));
    } catch (err) {
      sendError(res, err, "Suggestion request");
    }
  });

  // Serializes the records the page already shows; nothing is regenerated.
  app.post("/api/suggestions/export", (req: Request, res: Response) => {
    const parsed = exportRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ error: `Invalid export body: ${issue ? issue.message : "unknown shape"}` });
      return;
    }
    res.setHeader("Content-Disposition", 'attachment; filename="link-suggestions.json"');
    res.type("application/json").send(serializeRecords(parsed.data.suggestions));
  });

  const jsonErrors: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Request body is not valid JSON" });
      return;
    }
    next(err);
  };
  app.use(jsonErrors);

  return {
    app,
    start(port: number) {
      return new Promise<number>((resolve, reject) => {
        const listening = app.listen(port, () => {
          const address = listening.address();
          const bound = typeof address === "object" && address ? address.port : port;
          logger.info({ port: bound }, "Dashboard server started");
          resolve(bound);
        });
        listening.once("error", reject);
        server = listening;
      });
    },
    stop() {
      return new Promise<void>((resolve, reject) => {
        const current = server;
        server = null;
        store?.close();
        store = null;
        if (!current) {
          resolve();
          return;
        }
        current.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info("Dashboard server stopped");
          resolve();
        });
      });
    },
  };
}
