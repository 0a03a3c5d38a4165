/**
 * Dict converters for API responses.
 *
 * Internal records are camelCase; the API speaks snake_case. Optional
 * fields are normalized to null so clients can rely on every key being
 * present.
 *
 * @module
 */

import type {
  FindingRecord,
  HighlightSegment,
  LedgerSnapshot,
  ReviewDecision,
  SanitizedDocument,
  ScanResult,
  TalkDocument
} from "@talkguard/pii";

/**
 * Document metadata, without the text itself.
 */
export function documentToDict(document: TalkDocument): Record<string, unknown> {
  return {
    document_id: document.documentId,
    version: document.version,
    language: document.language,
    order: document.order,
    scanned_at: document.scannedAt,
    char_count: document.text.length
  };
}

export function findingToDict(finding: FindingRecord): Record<string, unknown> {
  return {
    entity_id: finding.entityId,
    category: finding.category,
    sample_occurrence_text: finding.sampleOccurrenceText,
    confidence: finding.confidence,
    occurrence_count: finding.occurrenceCount,
    status: finding.status,
    sensitivity: finding.sensitivity,
    description: finding.description,
    suggestion: finding.suggestion
  };
}

export function decisionToDict(decision: ReviewDecision): Record<string, unknown> {
  return {
    decision_id: decision.decisionId,
    sequence: decision.sequence,
    entity_id: decision.entityId,
    status: decision.status,
    replacement_text: decision.replacementText ?? null,
    reviewer_note: decision.reviewerNote ?? null,
    resolved_replacement: decision.resolvedReplacement ?? null,
    decided_at: decision.decidedAt,
    recorded_at: decision.recordedAt,
    supersedes: decision.supersedes ?? null
  };
}

/**
 * Current decisions keyed by entity id.
 */
export function snapshotToDict(snapshot: LedgerSnapshot): Record<string, unknown> {
  return {
    talk_id: snapshot.talkId,
    version: snapshot.version,
    decisions: Object.fromEntries(
      [...snapshot.decisions].map(([entityId, decision]) => [
        entityId,
        decisionToDict(decision)
      ])
    )
  };
}

/**
 * Scan outcome. The normalization summary is flattened; skipped overlaps
 * are reported as a count.
 */
export function scanResultToDict(result: ScanResult): Record<string, unknown> {
  if (result.status === "detection_unavailable") {
    return {
      status: result.status,
      talk_id: result.talkId,
      document_id: result.documentId,
      reason: result.reason
    };
  }

  const { normalization } = result;
  return {
    status: result.status,
    talk_id: result.talkId,
    document_id: result.documentId,
    version: result.version,
    detector: result.detector,
    pending_count: result.pendingCount,
    created: normalization.created,
    extended: normalization.extended,
    unchanged: normalization.unchanged,
    superseded: normalization.superseded,
    reactivated: normalization.reactivated,
    skipped_overlaps: normalization.skippedOverlaps.length,
    dropped_overlaps: normalization.droppedOverlaps.map((c) => ({
      category: c.category,
      text: c.rawText,
      start: c.start,
      end: c.end
    })),
    ambiguous: normalization.ambiguous.map((a) => ({
      text: a.text,
      matcher: a.matcher,
      entity_ids: a.entityIds,
      created_entity_id: a.createdEntityId
    }))
  };
}

export function sanitizedToDict(document: SanitizedDocument): Record<string, unknown> {
  return {
    document_id: document.documentId,
    source_version: document.sourceVersion,
    ledger_version: document.ledgerVersion,
    text: document.text,
    applied_diff: document.appliedDiff.map((entry) => ({
      entity_id: entry.entityId,
      start: entry.start,
      end: entry.end,
      original_text: entry.originalText,
      replacement_text: entry.replacementText
    })),
    residue_warnings: document.residueWarnings
  };
}

export function segmentToDict(segment: HighlightSegment): Record<string, unknown> {
  if (segment.kind === "text") {
    return { kind: "text", text: segment.text };
  }
  return {
    kind: "finding",
    text: segment.text,
    entity_id: segment.entityId,
    category: segment.category,
    sensitivity: segment.sensitivity,
    status: segment.status,
    start: segment.start,
    end: segment.end
  };
}
