/**
 * Replacement resolver.
 *
 * Decisions are keyed by entity, not by occurrence: the replacement is
 * resolved once per decision and then applied to every active occurrence
 * of that entity in every document of the talk. This is what keeps one
 * person masked identically everywhere.
 */

import type { LedgerSnapshot } from "../ledger/ledger";
import {
  activeOccurrences,
  type EntityCategory,
  type NormalizedEntity,
  type Occurrence
} from "../types/entities";
import type { ReviewStatus } from "../types/review";

export const DEFAULT_MASKS: Readonly<Record<EntityCategory, string>> = {
  PERSON: "[PERSON]",
  ORG: "[ORG]",
  LOCATION: "[LOCATION]",
  EMAIL: "[EMAIL]",
  PHONE: "[PHONE]",
  ID_NUMBER: "[ID_NUMBER]",
  DATE: "[DATE]",
  MISC: "[REDACTED]"
};

export interface PlannedReplacement {
  entityId: string;
  occurrence: Occurrence;
  replacementText: string;
}

export interface ReplacementPlan {
  documentId: string;
  /** Occurrences to rewrite, ascending by start */
  replacements: PlannedReplacement[];
  /** Occurrences left untouched (ACCEPTED_KEEP) */
  kept: Array<{ entityId: string; occurrence: Occurrence }>;
  /** Entities in the document without a non-pending decision */
  unreviewed: string[];
}

export class ReplacementResolver {
  private readonly masks: Record<EntityCategory, string>;

  constructor(masks: Partial<Record<EntityCategory, string>> = {}) {
    this.masks = { ...DEFAULT_MASKS, ...masks };
  }

  defaultMask(category: EntityCategory): string {
    return this.masks[category];
  }

  /**
   * Effective replacement for a decision, or undefined when nothing is
   * replaced (ACCEPTED_KEEP, PENDING).
   */
  resolve(
    entity: NormalizedEntity,
    status: ReviewStatus,
    replacementText?: string
  ): string | undefined {
    switch (status) {
      case "ACCEPTED_REDACT":
        return replacementText ?? this.defaultMask(entity.category);
      case "EDITED":
        return replacementText;
      case "ACCEPTED_KEEP":
      case "PENDING":
        return undefined;
    }
  }

  /**
   * Decide, for every active occurrence in `documentId`, what the
   * sanitizer must do with it under `snapshot`.
   */
  plan(
    documentId: string,
    entities: NormalizedEntity[],
    snapshot: LedgerSnapshot
  ): ReplacementPlan {
    const plan: ReplacementPlan = {
      documentId,
      replacements: [],
      kept: [],
      unreviewed: []
    };

    for (const entity of entities) {
      const occurrences = activeOccurrences(entity, documentId);
      if (occurrences.length === 0) continue;

      const decision = snapshot.decisions.get(entity.entityId);
      if (!decision || decision.status === "PENDING") {
        plan.unreviewed.push(entity.entityId);
        continue;
      }

      if (decision.status === "ACCEPTED_KEEP") {
        for (const occurrence of occurrences) {
          plan.kept.push({ entityId: entity.entityId, occurrence });
        }
        continue;
      }

      const replacementText =
        decision.resolvedReplacement ??
        this.resolve(entity, decision.status, decision.replacementText);
      if (replacementText === undefined) {
        plan.unreviewed.push(entity.entityId);
        continue;
      }
      for (const occurrence of occurrences) {
        plan.replacements.push({
          entityId: entity.entityId,
          occurrence,
          replacementText
        });
      }
    }

    plan.replacements.sort((a, b) => a.occurrence.start - b.occurrence.start);
    return plan;
  }
}
