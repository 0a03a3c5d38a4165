/**
 * Entity types: raw detector output and identity-resolved entities.
 */

// =============================================================================
// Categories
// =============================================================================

export const ENTITY_CATEGORIES = [
  "PERSON",
  "ORG",
  "LOCATION",
  "EMAIL",
  "PHONE",
  "ID_NUMBER",
  "DATE",
  "MISC"
] as const;

export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

export function isEntityCategory(value: unknown): value is EntityCategory {
  return ENTITY_CATEGORIES.some((category) => category === value);
}

export type SensitivityLevel = "low" | "medium" | "high" | "critical";

// =============================================================================
// Detector Output
// =============================================================================

/**
 * A span reported by a detector, before it is tied to a document.
 */
export interface DetectedSpan {
  /** Start offset (UTF-16 code units, inclusive) */
  start: number;
  /** End offset (exclusive) */
  end: number;
  category: EntityCategory;
  /** Detector confidence in [0, 1] */
  confidence: number;
  /** Name of the detector or rule that produced the span */
  source?: string;
}

/**
 * Raw detector output for one document version. Immutable once produced.
 */
export interface EntityCandidate {
  documentId: string;
  /** Version of the document text the offsets refer to */
  documentVersion: string;
  start: number;
  end: number;
  rawText: string;
  category: EntityCategory;
  confidence: number;
}

// =============================================================================
// Normalized Entities
// =============================================================================

/**
 * One mention of an entity in one document version.
 */
export interface Occurrence {
  documentId: string;
  documentVersion: string;
  start: number;
  end: number;
  rawText: string;
  confidence: number;
  /** Set when the document was replaced by a newer version */
  superseded: boolean;
}

/**
 * An identity-resolved entity. Every occurrence under one entityId was judged
 * equivalent by the normalizer; entities are never deleted.
 */
export interface NormalizedEntity {
  /** Stable within a talk */
  entityId: string;
  category: EntityCategory;
  canonicalText: string;
  /** Ordered by insertion; superseded occurrences are kept */
  occurrences: Occurrence[];
}

/**
 * Key identifying an occurrence independently of the entity it belongs to.
 */
export function occurrenceKey(
  occurrence: Pick<Occurrence, "documentId" | "documentVersion" | "start" | "end">
): string {
  return `${occurrence.documentId}@${occurrence.documentVersion}:${occurrence.start}-${occurrence.end}`;
}

export function activeOccurrences(
  entity: NormalizedEntity,
  documentId?: string
): Occurrence[] {
  return entity.occurrences.filter(
    (o) =>
      !o.superseded && (documentId === undefined || o.documentId === documentId)
  );
}
