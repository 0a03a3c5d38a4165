/**
 * Sanitizer: applies the ledger's decisions to one document.
 *
 * Pure function of (document version, entities, ledger snapshot). Nothing
 * is emitted while any entity in the document is still pending.
 */

import { NormalizationConflict, UnreviewedEntities } from "../errors";
import type { LedgerSnapshot } from "../ledger/ledger";
import type { ReplacementResolver } from "../resolver/resolver";
import {
  occurrenceKey,
  type NormalizedEntity,
  type Occurrence
} from "../types/entities";
import type {
  DiffEntry,
  SanitizedDocument,
  TalkDocument
} from "../types/review";
import { maskSpans, residueCheck } from "./residue";

export interface SanitizeInput {
  document: TalkDocument;
  entities: NormalizedEntity[];
  snapshot: LedgerSnapshot;
  resolver: ReplacementResolver;
}

function checkOccurrence(
  document: TalkDocument,
  entityId: string,
  occurrence: Occurrence
): void {
  const matches =
    occurrence.documentVersion === document.version &&
    document.text.slice(occurrence.start, occurrence.end) === occurrence.rawText;
  if (!matches) {
    throw new NormalizationConflict(
      `Occurrence ${occurrenceKey(occurrence)} of ${entityId} does not match document ${document.documentId}@${document.version}`,
      occurrenceKey(occurrence),
      [entityId]
    );
  }
}

function checkNoOverlap(
  spans: Array<{ entityId: string; occurrence: Occurrence }>
): void {
  const sorted = [...spans].sort(
    (a, b) => a.occurrence.start - b.occurrence.start
  );
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous && current && current.occurrence.start < previous.occurrence.end) {
      throw new NormalizationConflict(
        `Occurrences ${occurrenceKey(previous.occurrence)} and ${occurrenceKey(current.occurrence)} overlap`,
        occurrenceKey(current.occurrence),
        [previous.entityId, current.entityId]
      );
    }
  }
}

/**
 * Produce the sanitized text and its diff.
 *
 * @throws UnreviewedEntities when an entity in the document is pending
 * @throws NormalizationConflict when occurrences do not fit the document
 */
export function sanitizeDocument(input: SanitizeInput): SanitizedDocument {
  const { document, entities, snapshot, resolver } = input;
  const plan = resolver.plan(document.documentId, entities, snapshot);

  if (plan.unreviewed.length > 0) {
    throw new UnreviewedEntities(plan.unreviewed);
  }

  const covered = [...plan.replacements, ...plan.kept];
  for (const { entityId, occurrence } of covered) {
    checkOccurrence(document, entityId, occurrence);
  }
  checkNoOverlap(covered);

  // Rewrite from the end so earlier offsets stay valid.
  let text = document.text;
  const descending = [...plan.replacements].sort(
    (a, b) => b.occurrence.start - a.occurrence.start
  );
  for (const { occurrence, replacementText } of descending) {
    text =
      text.slice(0, occurrence.start) +
      replacementText +
      text.slice(occurrence.end);
  }

  const appliedDiff: DiffEntry[] = plan.replacements.map(
    ({ entityId, occurrence, replacementText }) => ({
      entityId,
      start: occurrence.start,
      end: occurrence.end,
      originalText: occurrence.rawText,
      replacementText
    })
  );

  const uncovered = maskSpans(
    document.text,
    covered.map(({ occurrence }) => occurrence)
  );

  return {
    documentId: document.documentId,
    sourceVersion: document.version,
    ledgerVersion: snapshot.version,
    text,
    appliedDiff,
    residueWarnings: residueCheck(uncovered)
  };
}
