/**
 * Rendering-agnostic highlighting for review screens.
 */

import { CATEGORY_PROFILES } from "../detector/sensitivity";
import {
  activeOccurrences,
  type EntityCategory,
  type NormalizedEntity,
  type SensitivityLevel
} from "../types/entities";
import type { ReviewStatus, TalkDocument } from "../types/review";

export type HighlightSegment =
  | { kind: "text"; text: string }
  | {
      kind: "finding";
      text: string;
      entityId: string;
      category: EntityCategory;
      sensitivity: SensitivityLevel;
      status: ReviewStatus;
      start: number;
      end: number;
    };

/**
 * Split a document into plain text and flagged spans, in document order.
 */
export function highlightSegments(
  document: TalkDocument,
  entities: NormalizedEntity[],
  statusOf: (entityId: string) => ReviewStatus
): HighlightSegment[] {
  const marks = entities
    .flatMap((entity) =>
      activeOccurrences(entity, document.documentId)
        .filter((o) => o.documentVersion === document.version)
        .map((occurrence) => ({ entity, occurrence }))
    )
    .sort((a, b) => a.occurrence.start - b.occurrence.start);

  const segments: HighlightSegment[] = [];
  let cursor = 0;
  for (const { entity, occurrence } of marks) {
    if (occurrence.start < cursor) continue;
    if (occurrence.start > cursor) {
      segments.push({
        kind: "text",
        text: document.text.slice(cursor, occurrence.start)
      });
    }
    segments.push({
      kind: "finding",
      text: document.text.slice(occurrence.start, occurrence.end),
      entityId: entity.entityId,
      category: entity.category,
      sensitivity: CATEGORY_PROFILES[entity.category].sensitivity,
      status: statusOf(entity.entityId),
      start: occurrence.start,
      end: occurrence.end
    });
    cursor = occurrence.end;
  }
  if (cursor < document.text.length) {
    segments.push({ kind: "text", text: document.text.slice(cursor) });
  }
  return segments;
}
