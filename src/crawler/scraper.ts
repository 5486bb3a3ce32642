import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";
import type pino from "pino";
import { ExtractionError, FetchError } from "../errors.js";
import type { Article } from "../types.js";
import { USER_AGENT } from "./sitemap.js";
import { normalizeUrl } from "./url.js";

export interface ExtractOptions {
  maxContentLength: number;
  minWords: number;
  /** Run the page's inline scripts before extracting. */
  renderScripts?: boolean;
}

export interface ScrapeOptions extends ExtractOptions {
  signal?: AbortSignal;
}

const BOILERPLATE_SELECTOR =
  "nav, footer, aside, noscript, form, [role='navigation'], [role='banner'], [role='contentinfo']";

const BLOCK_SELECTOR = "p, h1, h2, h3, h4, h5, h6, li, blockquote, pre, tr, div, section, article";

function createDom(html: string, url: string, renderScripts: boolean): JSDOM {
  return new JSDOM(html, {
    url,
    virtualConsole: new VirtualConsole(),
    ...(renderScripts ? { runScripts: "dangerously" as const, pretendToBeVisual: true } : {}),
  });
}

async function waitForLoad(dom: JSDOM, signal?: AbortSignal): Promise<void> {
  const { window } = dom;
  if (window.document.readyState === "complete") return;
  await new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(new Error("Aborted while rendering page"));
    signal?.addEventListener("abort", onAbort, { once: true });
    window.addEventListener(
      "load",
      () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      },
      { once: true },
    );
  });
}

/** Renders an HTML fragment as plain text, keeping paragraph and list breaks. */
export function htmlToText(html: string): string {
  const { document } = new JSDOM(`<body>${html}</body>`, {
    virtualConsole: new VirtualConsole(),
  }).window;

  for (const br of document.querySelectorAll("br")) br.replaceWith("\n");
  for (const li of document.querySelectorAll("li")) li.prepend("- ");
  for (const block of document.querySelectorAll(BLOCK_SELECTOR)) block.append("\n\n");

  return normalizeText(document.body.textContent ?? "");
}

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t\f\v ]+/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function countWords(text: string): number {
  const words = text.match(/\S+/g);
  return words ? words.length : 0;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max).trimEnd() : text;
}

/**
 * Pulls the main readable content out of a page. Navigation and other
 * boilerplate are dropped before Readability scores the document.
 */
export async function extractArticle(
  html: string,
  url: string,
  options: ExtractOptions & { signal?: AbortSignal },
): Promise<Article> {
  const dom = createDom(html, url, options.renderScripts ?? false);
  try {
    if (options.renderScripts) {
      await waitForLoad(dom, options.signal);
    }

    const { document } = dom.window;
    const pageTitle = document.title.trim();
    for (const el of document.querySelectorAll(BOILERPLATE_SELECTOR)) el.remove();

    const parsed = new Readability(document).parse();

    let title = parsed?.title?.trim() || pageTitle;
    let content = parsed?.content ? htmlToText(parsed.content) : "";

    if (!content) {
      for (const el of document.querySelectorAll("script, style, header")) el.remove();
      content = normalizeText(document.body?.textContent ?? "");
      title = title || document.querySelector("h1")?.textContent?.trim() || "";
    }

    const words = countWords(content);
    if (words < options.minWords) {
      throw new ExtractionError(
        url,
        `Extracted ${words} words, fewer than the minimum of ${options.minWords}`,
      );
    }

    return {
      url: normalizeUrl(url),
      title: title || "Untitled",
      content: truncate(content, options.maxContentLength),
      fetchedAt: new Date().toISOString(),
    };
  } finally {
    dom.window.close();
  }
}

export async function scrapeArticle(
  url: string,
  options: ScrapeOptions,
  logger: pino.Logger,
): Promise<Article> {
  logger.debug({ url }, "Fetching page");

  let response: Response;
  try {
    response = await fetch(url, {
      signal: options.signal,
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
      redirect: "follow",
    });
  } catch (err) {
    throw new FetchError(url, `Request failed: ${err instanceof Error ? err.message : String(err)}`, undefined, {
      cause: err,
    });
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status}: ${response.statusText}`, response.status);
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (contentType && !/html|xml/i.test(contentType)) {
    throw new FetchError(url, `Unsupported content type: ${contentType}`, response.status);
  }

  const html = await response.text();
  const article = await extractArticle(html, url, options);

  logger.debug({ url, title: article.title, chars: article.content.length }, "Page extracted");
  return article;
}
