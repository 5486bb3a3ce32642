import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  DimensionMismatchError,
  StoreUnavailableError,
  errorMessage,
} from "../errors.js";
import type { Article, EmbeddingRecord, FetchFailure, StoreMetadata, StoredArticle } from "../types.js";
import {
  CREATE_ARTICLES_TABLE,
  CREATE_FAILURES_TABLE,
  CREATE_META_TABLE,
  SCHEMA_VERSION,
} from "./schema.js";
import { cosineSimilarity, deserializeVector, serializeVector } from "./vector.js";

export const STORE_FILE = "vectors.db";

export interface StoreEntry {
  article: Article;
  embedding: EmbeddingRecord;
}

export interface Neighbour {
  id: string;
  score: number;
}

export interface ArticleSummary {
  url: string;
  title: string;
}

interface ArticleRow {
  id: number;
  url: string;
  title: string;
  content: string;
  fetched_at: string;
  model: string;
  content_hash: string;
  dimensions: number;
  embedding: Buffer;
}

interface FailureRow {
  url: string;
  stage: FetchFailure["stage"];
  error: string;
  failed_at: string;
}

function toStoredArticle(row: ArticleRow): StoredArticle {
  return {
    url: row.url,
    title: row.title,
    content: row.content,
    fetchedAt: row.fetched_at,
    model: row.model,
    contentHash: row.content_hash,
    vector: deserializeVector(row.embedding),
  };
}

/**
 * Persistent article + embedding store. Nearest-neighbour queries scan every
 * stored vector and rank by cosine similarity.
 */
export class VectorStore {
  readonly db: BetterSqlite3.Database;

  constructor(dbPath: string, options: { fileMustExist?: boolean } = {}) {
    try {
      this.db = new Database(dbPath, { fileMustExist: options.fileMustExist ?? false });
      this.db.pragma("journal_mode = WAL");
      this.db.exec(CREATE_META_TABLE);
      this.db.exec(CREATE_ARTICLES_TABLE);
      this.db.exec(CREATE_FAILURES_TABLE);
    } catch (err) {
      throw new StoreUnavailableError(`cannot open ${dbPath} (${errorMessage(err)})`, { cause: err });
    }
  }

  /** Opens (creating if needed) the store inside `dir`. */
  static open(dir: string): VectorStore {
    mkdirSync(dir, { recursive: true });
    return new VectorStore(join(dir, STORE_FILE));
  }

  /** Opens a store that a previous build must have written. */
  static openExisting(dir: string): VectorStore {
    const path = join(dir, STORE_FILE);
    if (!existsSync(path)) {
      throw new StoreUnavailableError(`no vector store found at ${path}`);
    }
    return new VectorStore(path, { fileMustExist: true });
  }

  metadata(): StoreMetadata | null {
    const rows = this.db
      .prepare<[], { key: string; value: string }>(`SELECT key, value FROM meta`)
      .all();
    const meta = new Map(rows.map((r) => [r.key, r.value]));
    const dimensions = Number(meta.get("dimensions"));
    const provider = meta.get("provider");
    const model = meta.get("model");
    const builtAt = meta.get("built_at");
    if (!provider || !model || !builtAt || !Number.isInteger(dimensions) || dimensions <= 0) {
      return null;
    }
    return {
      provider,
      model,
      dimensions,
      builtAt,
      sitemapUrl: meta.get("sitemap_url") ?? null,
    };
  }

  /** Empties the store and records the settings every future vector must match. */
  reset(meta: StoreMetadata): void {
    const upsertMeta = this.db.prepare<[string, string]>(
      `INSERT INTO meta (key, value) VALUES (?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    );
    this.db.transaction(() => {
      this.db.exec(`DELETE FROM articles; DELETE FROM build_failures; DELETE FROM meta;`);
      this.db.exec(`DELETE FROM sqlite_sequence WHERE name IN ('articles', 'build_failures')`);
      upsertMeta.run("schema_version", String(SCHEMA_VERSION));
      upsertMeta.run("provider", meta.provider);
      upsertMeta.run("model", meta.model);
      upsertMeta.run("dimensions", String(meta.dimensions));
      upsertMeta.run("built_at", meta.builtAt);
      if (meta.sitemapUrl) upsertMeta.run("sitemap_url", meta.sitemapUrl);
    })();
  }

  upsert(entry: StoreEntry): void {
    const meta = this.metadata();
    if (!meta) {
      throw new StoreUnavailableError("store has not been initialised");
    }
    const { article, embedding } = entry;
    if (embedding.vector.length !== meta.dimensions) {
      throw new DimensionMismatchError(meta.dimensions, embedding.vector.length, article.url);
    }

    this.db
      .prepare(
        `INSERT INTO articles (url, title, content, fetched_at, model, content_hash, dimensions, embedding)
         VALUES (@url, @title, @content, @fetchedAt, @model, @contentHash, @dimensions, @embedding)
         ON CONFLICT(url) DO UPDATE SET
           title = excluded.title,
           content = excluded.content,
           fetched_at = excluded.fetched_at,
           model = excluded.model,
           content_hash = excluded.content_hash,
           dimensions = excluded.dimensions,
           embedding = excluded.embedding,
           updated_at = datetime('now')`,
      )
      .run({
        url: article.url,
        title: article.title,
        content: article.content,
        fetchedAt: article.fetchedAt,
        model: embedding.model,
        contentHash: embedding.contentHash,
        dimensions: embedding.vector.length,
        embedding: serializeVector(embedding.vector),
      });
  }

  /** All-or-nothing: a mismatching entry rolls back the whole batch. */
  upsertMany(entries: readonly StoreEntry[]): void {
    this.db.transaction(() => {
      for (const entry of entries) this.upsert(entry);
    })();
  }

  /** Atomically swaps the store contents for a fresh build. */
  replaceAll(meta: StoreMetadata, entries: readonly StoreEntry[], failures: readonly FetchFailure[]): void {
    this.db.transaction(() => {
      this.reset(meta);
      this.upsertMany(entries);
      this.recordFailures(failures);
    })();
  }

  get(url: string): StoredArticle | null {
    const row = this.db
      .prepare<[string], ArticleRow>(`SELECT * FROM articles WHERE url = ?`)
      .get(url);
    return row ? toStoredArticle(row) : null;
  }

  has(url: string): boolean {
    return (
      this.db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM articles WHERE url = ?`).get(url) !==
      undefined
    );
  }

  list(): ArticleSummary[] {
    return this.db
      .prepare<[], ArticleSummary>(`SELECT url, title FROM articles ORDER BY id ASC`)
      .all();
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM articles`).get();
    return row?.count ?? 0;
  }

  /**
   * The `k` stored vectors closest to `vector`, best first. Equal scores keep
   * insertion order.
   */
  query(vector: Float32Array, k: number): Neighbour[] {
    const meta = this.metadata();
    if (meta && vector.length !== meta.dimensions) {
      throw new DimensionMismatchError(meta.dimensions, vector.length);
    }
    if (k <= 0) return [];

    const rows = this.db
      .prepare<[], Pick<ArticleRow, "url" | "embedding">>(
        `SELECT url, embedding FROM articles ORDER BY id ASC`,
      )
      .all();

    const scored = rows.map((row) => ({
      id: row.url,
      score: cosineSimilarity(vector, deserializeVector(row.embedding)),
    }));
    // Array.prototype.sort is stable
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  recordFailures(failures: readonly FetchFailure[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO build_failures (url, stage, error, failed_at) VALUES (@url, @stage, @error, @at)`,
    );
    this.db.transaction(() => {
      for (const f of failures) stmt.run({ url: f.url, stage: f.stage, error: f.error, at: f.at });
    })();
  }

  failures(): FetchFailure[] {
    return this.db
      .prepare<[], FailureRow>(`SELECT url, stage, error, failed_at FROM build_failures ORDER BY id ASC`)
      .all()
      .map((row) => ({ url: row.url, stage: row.stage, error: row.error, at: row.failed_at }));
  }

  /**
   * Throws StoreUnavailableError unless the store holds a finished build made
   * with `expectedModel`.
   */
  assertQueryable(expectedModel?: string): StoreMetadata {
    let meta: StoreMetadata | null;
    let count: number;
    try {
      meta = this.metadata();
      count = this.count();
    } catch (err) {
      throw new StoreUnavailableError(`store is corrupt (${errorMessage(err)})`, { cause: err });
    }
    if (!meta) {
      throw new StoreUnavailableError("store has no build metadata");
    }
    if (count === 0) {
      throw new StoreUnavailableError("store is empty");
    }
    if (expectedModel && meta.model !== expectedModel) {
      throw new StoreUnavailableError(
        `store was built with embedding model "${meta.model}" but "${expectedModel}" is configured`,
      );
    }
    return meta;
  }

  close(): void {
    this.db.close();
  }
}
