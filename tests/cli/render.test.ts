import { describe, it, expect } from "vitest";
import { renderBuildReport, renderReport, renderSaveNotice } from "../../src/cli/render.js";

const source = { url: "https://example.com/blog/raised-beds", title: "Raised Beds" };

describe("renderReport", () => {
  it("explains an empty result", () => {
    expect(renderReport({ source, suggestions: [], incomplete: [] })).toBe(
      [
        "Link suggestions for Raised Beds",
        "  https://example.com/blog/raised-beds",
        "",
        "No related posts cleared the similarity threshold.",
      ].join("\n"),
    );
  });

  it("lists suggestions then incomplete markers", () => {
    const text = renderReport({
      source,
      suggestions: [
        {
          fromPost: source.url,
          toPost: "https://example.com/blog/soil-mix",
          toTitle: "Soil Mix",
          reason: "Beds need good soil.",
          anchorText: "raised bed soil recipe",
          similarity: 0.8,
        },
      ],
      incomplete: [
        {
          fromPost: source.url,
          toPost: "https://example.com/blog/trellis",
          toTitle: "Trellis",
          similarity: 0.6,
          error: "Claude CLI exited with code 1: ",
        },
      ],
    });

    expect(text).toBe(
      [
        "Link suggestions for Raised Beds",
        "  https://example.com/blog/raised-beds",
        "",
        "1. Soil Mix (80.0%)",
        "   https://example.com/blog/soil-mix",
        '   Anchor: "raised bed soil recipe"',
        "   Why: Beds need good soil.",
        "",
        "[incomplete] Trellis (60.0%)",
        "   https://example.com/blog/trellis",
        "   Error: Claude CLI exited with code 1:",
      ].join("\n"),
    );
  });
});

describe("renderSaveNotice", () => {
  const suggestion = {
    fromPost: source.url,
    toPost: "https://example.com/blog/soil-mix",
    toTitle: "Soil Mix",
    similarity: 0.8,
    reason: "Beds need good soil.",
    anchorText: "raised bed soil recipe",
  };
  const incomplete = {
    fromPost: source.url,
    toPost: "https://example.com/blog/trellis",
    toTitle: "Trellis",
    similarity: 0.6,
    error: "Claude CLI exited with code 1:",
  };

  it("reports the saved count", () => {
    expect(renderSaveNotice({ source, suggestions: [suggestion], incomplete: [] }, "out.json")).toBe(
      "Saved 1 suggestions to out.json",
    );
  });

  it("notes incomplete pairs left out of the file", () => {
    expect(renderSaveNotice({ source, suggestions: [suggestion], incomplete: [incomplete] }, "out.json")).toBe(
      "Saved 1 suggestions to out.json (1 incomplete pair not exported)",
    );
    expect(
      renderSaveNotice({ source, suggestions: [], incomplete: [incomplete, { ...incomplete, toTitle: "Compost" }] }, "out.json"),
    ).toBe("Saved 0 suggestions to out.json (2 incomplete pairs not exported)");
  });
});

describe("renderBuildReport", () => {
  it("summarises the build and its failures", () => {
    expect(
      renderBuildReport({
        sitemapUrl: "https://example.com/sitemap.xml",
        discovered: 3,
        indexed: 2,
        failures: [{ url: "https://example.com/gone", stage: "fetch", error: "HTTP 404: Not Found", at: "x" }],
        builtAt: "2026-01-01T00:00:00.000Z",
        model: "text-embedding-004",
        dimensions: 768,
      }),
    ).toBe(
      [
        "Indexed 2 of 3 pages from https://example.com/sitemap.xml",
        "Model: text-embedding-004 (768 dimensions)",
        "Skipped 1:",
        "  [fetch] https://example.com/gone: HTTP 404: Not Found",
      ].join("\n"),
    );
  });
});
