import { JSDOM } from "jsdom";
import type pino from "pino";
import { SitemapError, errorMessage } from "../errors.js";
import { isHttpUrl, normalizeUrl, sameSite } from "./url.js";

export const USER_AGENT =
  "Mozilla/5.0 (compatible; InternalLinkSuggester/0.1; +https://www.sitemaps.org/)";

export interface SitemapOptions {
  timeoutMs: number;
  /** How many levels of <sitemapindex> to follow. */
  maxDepth?: number;
  maxUrls?: number;
}

export interface ParsedSitemap {
  kind: "index" | "urlset";
  locs: string[];
}

// Some WordPress setups wrap the sitemap XML in an HTML shell
function extractSitemapPayload(raw: string): string {
  for (const tag of ["sitemapindex", "urlset"]) {
    const start = raw.indexOf(`<${tag}`);
    if (start === -1) continue;
    const end = raw.indexOf(`</${tag}>`, start);
    if (end === -1) continue;
    return raw.slice(start, end + tag.length + 3);
  }
  return raw;
}

const LOC_PATTERN =
  /<\s*(?:[A-Za-z_][\w.-]*:)?loc\s*>([\s\S]*?)<\s*\/\s*(?:[A-Za-z_][\w.-]*:)?loc\s*>/gi;

function decodeEntities(text: string): string {
  return text
    .replace(/^<!\[CDATA\[([\s\S]*)\]\]>$/, "$1")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

function parseXml(xmlText: string): ParsedSitemap | null {
  try {
    const { document } = new JSDOM(xmlText, { contentType: "text/xml" }).window;
    const root = document.documentElement.localName.toLowerCase();
    if (root !== "sitemapindex" && root !== "urlset") return null;
    const locs = Array.from(document.getElementsByTagNameNS("*", "loc"))
      .map((el) => el.textContent?.trim() ?? "")
      .filter((loc) => loc.length > 0);
    return { kind: root === "sitemapindex" ? "index" : "urlset", locs };
  } catch {
    return null;
  }
}

export function parseSitemap(raw: string): ParsedSitemap {
  const payload = extractSitemapPayload(raw);
  // Bare '&' breaks strict XML parsers
  const sanitized = payload.replace(
    /&(?!amp;|lt;|gt;|apos;|quot;|#\d+;|#x[a-fA-F0-9]+;)/g,
    "&amp;",
  );

  const strict = parseXml(sanitized);
  if (strict) return strict;

  // Lenient scan for documents a strict XML parser rejects
  const locs = Array.from(payload.matchAll(LOC_PATTERN), (m) => decodeEntities((m[1] ?? "").trim()))
    .filter((loc) => loc.length > 0);
  if (locs.length === 0) {
    throw new Error("Document is not a sitemap (no <loc> entries)");
  }
  return { kind: /<\s*(?:[\w.-]+:)?sitemapindex[\s>]/i.test(payload) ? "index" : "urlset", locs };
}

async function fetchSitemapXml(url: string, timeoutMs: number): Promise<string> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/xml,text/xml;q=0.9,*/*;q=0.8",
    },
    redirect: "follow",
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }
  return response.text();
}

/**
 * Resolves a sitemap (or sitemap index) into the page URLs it lists.
 * Only URLs on the sitemap's own site are kept, normalised and de-duplicated.
 */
export async function fetchSitemapUrls(
  sitemapUrl: string,
  options: SitemapOptions,
  logger: pino.Logger,
): Promise<string[]> {
  const maxDepth = options.maxDepth ?? 3;
  const maxUrls = options.maxUrls ?? 50_000;
  const visited = new Set<string>();
  const pages = new Set<string>();

  async function visit(url: string, depth: number): Promise<void> {
    if (visited.has(url) || pages.size >= maxUrls) return;
    visited.add(url);

    let parsed: ParsedSitemap;
    try {
      parsed = parseSitemap(await fetchSitemapXml(url, options.timeoutMs));
    } catch (err) {
      if (depth === 0) {
        throw new SitemapError(url, errorMessage(err), { cause: err });
      }
      logger.warn({ sitemap: url, err: errorMessage(err) }, "Skipping child sitemap");
      return;
    }

    logger.debug({ sitemap: url, kind: parsed.kind, entries: parsed.locs.length }, "Sitemap parsed");

    if (parsed.kind === "index") {
      if (depth >= maxDepth) {
        logger.warn({ sitemap: url }, "Sitemap index nesting too deep, not following");
        return;
      }
      for (const child of parsed.locs) {
        if (isHttpUrl(child)) await visit(child, depth + 1);
      }
      return;
    }

    for (const loc of parsed.locs) {
      if (pages.size >= maxUrls) break;
      if (!isHttpUrl(loc)) continue;
      if (!sameSite(loc, sitemapUrl)) {
        logger.debug({ url: loc }, "Skipping off-site URL");
        continue;
      }
      pages.add(normalizeUrl(loc));
    }
  }

  await visit(sitemapUrl, 0);

  logger.info({ sitemap: sitemapUrl, urls: pages.size }, "Sitemap resolved");
  return Array.from(pages);
}
