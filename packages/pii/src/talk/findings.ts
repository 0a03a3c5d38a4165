import { CATEGORY_PROFILES } from "../detector/sensitivity";
import { activeOccurrences, type NormalizedEntity } from "../types/entities";
import type { FindingRecord, ReviewStatus } from "../types/review";

/**
 * Finding record for the review UI. Only active occurrences count.
 */
export function toFinding(
  entity: NormalizedEntity,
  status: ReviewStatus
): FindingRecord {
  const occurrences = activeOccurrences(entity);
  const profile = CATEGORY_PROFILES[entity.category];
  return {
    entityId: entity.entityId,
    category: entity.category,
    sampleOccurrenceText: occurrences[0]?.rawText ?? entity.canonicalText,
    confidence: occurrences.reduce((max, o) => Math.max(max, o.confidence), 0),
    occurrenceCount: occurrences.length,
    status,
    sensitivity: profile.sensitivity,
    description: profile.description,
    suggestion: profile.suggestion
  };
}
