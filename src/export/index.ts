import { z } from "zod";
import type { Suggestion } from "../types.js";

export const exportRecordSchema = z.object({
  from_post: z.string().url(),
  to_post: z.string().url(),
  reason: z.string().min(1),
  anchor_text: z.string().min(1),
  similarity_score: z.string().regex(/^\d{1,3}\.\d%$/, "similarity_score must look like 87.5%"),
});

export type ExportRecord = z.infer<typeof exportRecordSchema>;

/** 0.875 -> "87.5%" */
export function formatSimilarity(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

export function toExportRecord(suggestion: Suggestion): ExportRecord {
  return {
    from_post: suggestion.fromPost,
    to_post: suggestion.toPost,
    reason: suggestion.reason,
    anchor_text: suggestion.anchorText,
    similarity_score: formatSimilarity(suggestion.similarity),
  };
}

export function serializeRecords(records: readonly ExportRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export function serializeSuggestions(suggestions: readonly Suggestion[]): string {
  return serializeRecords(suggestions.map(toExportRecord));
}

export function parseSuggestions(json: string): ExportRecord[] {
  return z.array(exportRecordSchema).parse(JSON.parse(json));
}
