import pino from "pino";
import { vi } from "vitest";
import type { Config } from "../src/config/index.js";
import type { EmbeddingBackend } from "../src/embeddings/index.js";
import { VectorStore } from "../src/store/index.js";
import type { StoreMetadata } from "../src/types.js";

export const logger = pino({ level: "silent" });

type Route = (init?: RequestInit) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

/** Stubs global fetch; unknown URLs get a 404. */
export function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const route = routes[requestUrl(input)];
    return route ? route(init) : new Response("", { status: 404, statusText: "Not Found" });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function html(body: string, status = 200): Route {
  return () => new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function xml(body: string): Route {
  return () => new Response(body, { status: 200, headers: { "content-type": "application/xml" } });
}

export function json(body: unknown, status = 200): Route {
  return () => new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

export function postHtml(title: string, paragraphs: string[]): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>
<nav><a href="/">Home</a> <a href="/about">About</a></nav>
<article><h1>${title}</h1>${paragraphs.map((p) => `<p>${p}</p>`).join("\n")}</article>
<footer>Copyright Example Garden Blog</footer>
</body></html>`;
}

export function urlset(urls: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map((u) => `  <url><loc>${u}</loc></url>`).join("\n")}
</urlset>`;
}

export function sitemapIndex(urls: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map((u) => `  <sitemap><loc>${u}</loc></sitemap>`).join("\n")}
</sitemapindex>`;
}

/** Bag-of-letters vector: same text, same vector. */
export function letterVector(text: string, dimension = 4): number[] {
  const values = new Array<number>(dimension).fill(0);
  for (const ch of text.toLowerCase()) {
    const code = ch.charCodeAt(0);
    if (code >= 97 && code <= 122) values[code % dimension] = (values[code % dimension] ?? 0) + 1;
  }
  return values;
}

export function fakeBackend(overrides: Partial<EmbeddingBackend> = {}): EmbeddingBackend {
  return {
    provider: "openai",
    model: "fake-embed",
    dimension: 4,
    request: vi.fn(async (text: string) => letterVector(text)),
    ...overrides,
  };
}

export const testMeta = (overrides: Partial<StoreMetadata> = {}): StoreMetadata => ({
  provider: "openai",
  model: "fake-embed",
  dimensions: 3,
  builtAt: "2026-01-01T00:00:00.000Z",
  sitemapUrl: "https://example.com/sitemap.xml",
  ...overrides,
});

export interface SeedArticle {
  url: string;
  title: string;
  vector: number[];
  content?: string;
}

/** In-memory store pre-filled with hand-made vectors. */
export function seededStore(articles: SeedArticle[], meta: Partial<StoreMetadata> = {}): VectorStore {
  const store = new VectorStore(":memory:");
  const dimensions = articles[0]?.vector.length ?? 3;
  store.replaceAll(
    testMeta({ dimensions, ...meta }),
    articles.map((a) => ({
      article: {
        url: a.url,
        title: a.title,
        content: a.content ?? `${a.title} body text`,
        fetchedAt: "2026-01-01T00:00:00.000Z",
      },
      embedding: {
        url: a.url,
        vector: Float32Array.from(a.vector),
        model: meta.model ?? "fake-embed",
        contentHash: `hash-${a.url}`,
      },
    })),
    [],
  );
  return store;
}

export function testConfig(): Config {
  return {
    site: { sitemapUrl: "https://example.com/sitemap.xml" },
    crawler: {
      maxConcurrency: 2,
      fetchTimeoutMs: 5000,
      delayMs: 0,
      maxContentLength: 10000,
      minWords: 10,
      renderScripts: false,
    },
    embeddings: { provider: "google", maxInputChars: 8000, timeoutMs: 5000 },
    generation: {
      provider: "openai",
      model: "gpt-4o",
      temperature: 0.7,
      timeoutMs: 5000,
      excerptLength: 300,
    },
    credentials: { openaiBaseUrl: "https://api.openai.com/v1" },
    retry: { attempts: 1, initialDelayMs: 0 },
    ranking: { finalSuggestions: 5, candidatePoolSize: 10, minSimilarity: 0.5 },
    store: { dir: "./data/test-store" },
    dashboard: { port: 0 },
    log: { level: "silent" },
  };
}
