import { formatSimilarity } from "../export/index.js";
import type { BuildReport } from "../pipeline/build.js";
import type { SuggestionResult } from "../pipeline/suggest.js";

export function renderReport(result: SuggestionResult): string {
  const lines: string[] = [`Link suggestions for ${result.source.title || result.source.url}`, `  ${result.source.url}`, ""];

  if (result.suggestions.length === 0 && result.incomplete.length === 0) {
    lines.push("No related posts cleared the similarity threshold.");
    return lines.join("\n");
  }

  result.suggestions.forEach((s, i) => {
    lines.push(`${i + 1}. ${s.toTitle} (${formatSimilarity(s.similarity)})`);
    lines.push(`   ${s.toPost}`);
    lines.push(`   Anchor: "${s.anchorText}"`);
    lines.push(`   Why: ${s.reason}`);
    lines.push("");
  });

  for (const inc of result.incomplete) {
    lines.push(`[incomplete] ${inc.toTitle || inc.toPost} (${formatSimilarity(inc.similarity)})`);
    lines.push(`   ${inc.toPost}`);
    lines.push(`   Error: ${inc.error}`);
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function renderSaveNotice(result: SuggestionResult, file: string): string {
  const saved = `Saved ${result.suggestions.length} suggestions to ${file}`;
  const skipped = result.incomplete.length;
  if (skipped === 0) return saved;
  return `${saved} (${skipped} incomplete ${skipped === 1 ? "pair" : "pairs"} not exported)`;
}

export function renderBuildReport(report: BuildReport): string {
  const lines = [
    `Indexed ${report.indexed} of ${report.discovered} pages from ${report.sitemapUrl}`,
    `Model: ${report.model} (${report.dimensions} dimensions)`,
  ];
  if (report.failures.length > 0) {
    lines.push(`Skipped ${report.failures.length}:`);
    for (const f of report.failures) lines.push(`  [${f.stage}] ${f.url}: ${f.error}`);
  }
  return lines.join("\n");
}
