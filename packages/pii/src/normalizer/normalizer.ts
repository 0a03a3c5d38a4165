/**
 * Entity normalizer: turns per-document candidates into talk-wide entities.
 */

import { createLogger, type Logger } from "@talkguard/core";
import type { EntityCandidate, Occurrence } from "../types/entities";
import { occurrenceKey } from "../types/entities";
import { DEFAULT_MATCHERS, type EntityMatcher } from "./matchers";
import { DEFAULT_JOIN_PUNCTUATION, mergeCandidates } from "./merge";
import type { EntityPartition } from "./partition";

export interface NormalizerOptions {
  /** Tried in order; the first "match" wins (default: exact only) */
  matchers?: readonly EntityMatcher[];
  joinPunctuation?: string;
  logger?: Logger;
}

export interface NormalizedDocument {
  documentId: string;
  version: string;
  text: string;
}

export interface AmbiguousMatch {
  text: string;
  matcher: string;
  entityIds: string[];
  /** Entity created instead of merging */
  createdEntityId: string;
}

export interface NormalizationResult {
  documentId: string;
  /** Candidates left after merging */
  mergedCount: number;
  /** Entities first seen in this run */
  created: string[];
  /** Existing entities that gained occurrences */
  extended: string[];
  /** Occurrences already present from an earlier run */
  unchanged: number;
  /** Occurrences of other versions of this document now superseded */
  superseded: number;
  /** Occurrences of this version active again after a revert */
  reactivated: number;
  /** New spans dropped because they overlap an existing occurrence */
  skippedOverlaps: EntityCandidate[];
  /** Spans that lost an overlap with a stronger span of another category */
  droppedOverlaps: EntityCandidate[];
  ambiguous: AmbiguousMatch[];
}

export class EntityNormalizer {
  private readonly matchers: readonly EntityMatcher[];
  private readonly joinPunctuation: string;
  private readonly logger: Logger;

  constructor(options: NormalizerOptions = {}) {
    this.matchers = options.matchers ?? DEFAULT_MATCHERS;
    this.joinPunctuation = options.joinPunctuation ?? DEFAULT_JOIN_PUNCTUATION;
    this.logger = options.logger ?? createLogger("normalizer");
  }

  /**
   * Fold one document's candidates into the talk partition.
   *
   * Re-running on the same document version is idempotent. A new version
   * supersedes the old version's occurrences; the entities themselves and
   * their ids remain.
   */
  normalize(
    partition: EntityPartition,
    document: NormalizedDocument,
    candidates: EntityCandidate[]
  ): NormalizationResult {
    for (const candidate of candidates) {
      if (
        candidate.documentId !== document.documentId ||
        candidate.documentVersion !== document.version
      ) {
        throw new Error(
          `Candidate for ${candidate.documentId}@${candidate.documentVersion} passed with ${document.documentId}@${document.version}`
        );
      }
    }

    const { superseded, reactivated } = partition.supersedeDocument(
      document.documentId,
      document.version
    );
    if (reactivated > 0) {
      this.logger.info(
        `${document.documentId} reverted to ${document.version}; ${reactivated} occurrence(s) active again`
      );
    }
    const { candidates: merged, dropped } = mergeCandidates(
      document.text,
      candidates,
      { joinPunctuation: this.joinPunctuation }
    );
    for (const candidate of dropped) {
      this.logger.warn(
        `Dropping ${candidate.category} "${candidate.rawText}" in ${document.documentId}: overlaps a stronger span`
      );
    }

    const result: NormalizationResult = {
      documentId: document.documentId,
      mergedCount: merged.length,
      created: [],
      extended: [],
      unchanged: 0,
      superseded,
      reactivated,
      skippedOverlaps: [],
      droppedOverlaps: dropped,
      ambiguous: []
    };

    const existing = partition
      .entitiesInDocument(document.documentId)
      .flatMap((entity) =>
        entity.occurrences.filter(
          (o) => !o.superseded && o.documentId === document.documentId
        )
      );

    for (const candidate of merged) {
      const occurrence: Occurrence = {
        documentId: candidate.documentId,
        documentVersion: candidate.documentVersion,
        start: candidate.start,
        end: candidate.end,
        rawText: candidate.rawText,
        confidence: candidate.confidence,
        superseded: false
      };

      if (partition.ownerOf(occurrenceKey(occurrence)) !== undefined) {
        result.unchanged++;
        continue;
      }

      const overlapping = existing.some(
        (o) => o.start < occurrence.end && occurrence.start < o.end
      );
      if (overlapping) {
        this.logger.warn(
          `Skipping ${occurrenceKey(occurrence)}: overlaps an occurrence from an earlier scan`
        );
        result.skippedOverlaps.push(candidate);
        continue;
      }

      this.place(partition, candidate, occurrence, result);
      existing.push(occurrence);
    }

    return result;
  }

  private place(
    partition: EntityPartition,
    candidate: EntityCandidate,
    occurrence: Occurrence,
    result: NormalizationResult
  ): void {
    const query = { category: candidate.category, text: candidate.rawText };

    for (const matcher of this.matchers) {
      const match = matcher.match(query, partition);
      if (match.kind === "none") continue;

      if (match.kind === "match") {
        partition.addOccurrence(match.entityId, occurrence);
        if (
          !result.created.includes(match.entityId) &&
          !result.extended.includes(match.entityId)
        ) {
          result.extended.push(match.entityId);
        }
        return;
      }

      // Ambiguous: split rather than guess.
      const entity = partition.createEntity(candidate.category, occurrence);
      result.created.push(entity.entityId);
      result.ambiguous.push({
        text: candidate.rawText,
        matcher: matcher.name,
        entityIds: match.entityIds,
        createdEntityId: entity.entityId
      });
      this.logger.info(
        `Ambiguous ${matcher.name} match for "${candidate.rawText}" (${match.entityIds.join(", ")}); created ${entity.entityId}`
      );
      return;
    }

    const entity = partition.createEntity(candidate.category, occurrence);
    result.created.push(entity.entityId);
  }
}
