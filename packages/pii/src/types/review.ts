/**
 * Review, document and sanitization types.
 */

import type { EntityCategory, SensitivityLevel } from "./entities";

// =============================================================================
// Review Decisions
// =============================================================================

export const REVIEW_STATUSES = [
  "PENDING",
  "ACCEPTED_REDACT",
  "ACCEPTED_KEEP",
  "EDITED"
] as const;

export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

export function isReviewStatus(value: unknown): value is ReviewStatus {
  return REVIEW_STATUSES.some((status) => status === value);
}

/**
 * A decision as submitted by a reviewer.
 */
export interface DecisionInput {
  entityId: string;
  status: ReviewStatus;
  /** Required for EDITED; optional non-default mask for ACCEPTED_REDACT */
  replacementText?: string;
  note?: string;
  /** ISO timestamp; defaults to the time the ledger records it */
  decidedAt?: string;
}

/**
 * One entry of the append-only decision log.
 */
export interface ReviewDecision {
  decisionId: string;
  /** Position in the talk's decision log, starting at 1 */
  sequence: number;
  entityId: string;
  status: ReviewStatus;
  replacementText?: string;
  reviewerNote?: string;
  /** Replacement applied to every occurrence (ACCEPTED_REDACT and EDITED) */
  resolvedReplacement?: string;
  /** Reviewer timestamp, used for last-write-wins */
  decidedAt: string;
  /** When the ledger appended the entry */
  recordedAt: string;
  /** Decision this one replaced as current, if any */
  supersedes?: string;
}

// =============================================================================
// Documents
// =============================================================================

export interface TalkDocument {
  documentId: string;
  /** Content hash of `text` */
  version: string;
  text: string;
  language: string;
  /** Position in the talk, by first upload */
  order: number;
  scannedAt: string;
}

// =============================================================================
// Findings (UI boundary)
// =============================================================================

/**
 * Rendering-agnostic record describing one entity for review.
 */
export interface FindingRecord {
  entityId: string;
  category: EntityCategory;
  sampleOccurrenceText: string;
  /** Highest confidence across active occurrences */
  confidence: number;
  occurrenceCount: number;
  status: ReviewStatus;
  sensitivity: SensitivityLevel;
  description: string;
  suggestion: string;
}

// =============================================================================
// Sanitized Output
// =============================================================================

export interface DiffEntry {
  entityId: string;
  start: number;
  end: number;
  originalText: string;
  replacementText: string;
}

/**
 * Derived from (document version, ledger snapshot); never stored.
 */
export interface SanitizedDocument {
  documentId: string;
  sourceVersion: string;
  /** Ledger version the output was computed against */
  ledgerVersion: number;
  text: string;
  /** Applied replacements in ascending offset order */
  appliedDiff: DiffEntry[];
  /** Possible personal data left in the output */
  residueWarnings: string[];
}
