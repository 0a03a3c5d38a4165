import type {
  DetectedSpan,
  EntityCandidate,
  EntityCategory
} from "../types/entities";

export interface CandidateFilter {
  /** Spans below this confidence are dropped */
  minConfidence: number;
  /** Categories to keep; empty keeps all */
  categories: readonly EntityCategory[];
}

/**
 * Tie detector spans to a document version, dropping low-confidence spans
 * and categories the reviewer does not track.
 */
export function toCandidates(
  document: { documentId: string; version: string; text: string },
  spans: DetectedSpan[],
  filter: CandidateFilter
): EntityCandidate[] {
  return spans
    .filter(
      (span) =>
        span.confidence >= filter.minConfidence &&
        (filter.categories.length === 0 ||
          filter.categories.includes(span.category))
    )
    .map((span) => ({
      documentId: document.documentId,
      documentVersion: document.version,
      start: span.start,
      end: span.end,
      rawText: document.text.slice(span.start, span.end),
      category: span.category,
      confidence: span.confidence
    }));
}
