import type { ExtractionResult, FetchOutcome, OutputFormat } from "./types";

export const NO_CONTENT_ERROR = "All tiers failed — no useful content extracted.";

export function toExtractionResult(
  url: string,
  outcome: FetchOutcome,
  extractedAt: Date = new Date()
): ExtractionResult {
  return {
    url,
    tier: outcome.tier,
    content: outcome.content,
    extracted_at: extractedAt.toISOString(),
    error: outcome.content ? null : NO_CONTENT_ERROR,
    attempts: outcome.attempts,
  };
}

export function formatResult(
  result: ExtractionResult,
  format: OutputFormat = "text",
): string {
  switch (format) {
    case "json":
      return JSON.stringify(result, null, 2);
    case "jsonl":
      return JSON.stringify(result);
    case "text":
    default:
      return result.content;
  }
}
