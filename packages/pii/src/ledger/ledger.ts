/**
 * Review ledger: the append-only decision log of one talk.
 *
 * The log is the source of truth; the "current" index (one decision per
 * entity) is materialized from it and can be rebuilt at any time. Decisions
 * are superseded, never deleted. Between two decisions for the same entity,
 * the later `decidedAt` wins; equal timestamps fall back to log order.
 */

import { createLogger, type Logger } from "@talkguard/core";
import { InvalidDecision } from "../errors";
import type { ReplacementResolver } from "../resolver/resolver";
import {
  activeOccurrences,
  type NormalizedEntity
} from "../types/entities";
import {
  isReviewStatus,
  type ReviewDecision,
  type ReviewStatus
} from "../types/review";

/**
 * Read access to the talk's entities, owned by the normalizer.
 */
export interface EntityDirectory {
  get(entityId: string): NormalizedEntity | undefined;
  list(): NormalizedEntity[];
}

export interface DecideOptions {
  replacementText?: string;
  note?: string;
  /** Reviewer timestamp (ISO); defaults to now */
  decidedAt?: string;
}

export interface DecisionOutcome {
  /** The entry appended to the log */
  recorded: ReviewDecision;
  /** The entity's current decision after this call */
  current: ReviewDecision;
  /** Whether `recorded` became current (false for a stale write) */
  applied: boolean;
}

/**
 * Immutable view of the ledger at one version.
 */
export interface LedgerSnapshot {
  talkId: string;
  /** Number of log entries the snapshot reflects */
  version: number;
  decisions: ReadonlyMap<string, ReviewDecision>;
}

export interface ReviewLedgerOptions {
  talkId: string;
  entities: EntityDirectory;
  resolver: ReplacementResolver;
  /** Existing log to rebuild from */
  log?: ReviewDecision[];
  now?: () => Date;
  logger?: Logger;
}

function wins(candidate: ReviewDecision, current: ReviewDecision): boolean {
  const a = Date.parse(candidate.decidedAt);
  const b = Date.parse(current.decidedAt);
  if (a !== b) return a > b;
  return candidate.sequence > current.sequence;
}

export class ReviewLedger {
  readonly talkId: string;
  private readonly entities: EntityDirectory;
  private readonly resolver: ReplacementResolver;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly log: ReviewDecision[] = [];
  private readonly currentIndex = new Map<string, ReviewDecision>();

  constructor(options: ReviewLedgerOptions) {
    this.talkId = options.talkId;
    this.entities = options.entities;
    this.resolver = options.resolver;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("ledger");

    const entries = [...(options.log ?? [])].sort(
      (a, b) => a.sequence - b.sequence
    );
    for (const entry of entries) {
      this.log.push(entry);
      this.index(entry);
    }
  }

  private index(entry: ReviewDecision): boolean {
    const existing = this.currentIndex.get(entry.entityId);
    if (!existing || wins(entry, existing)) {
      this.currentIndex.set(entry.entityId, entry);
      return true;
    }
    return false;
  }

  /**
   * Discard the materialized index and rebuild it from the log.
   */
  rebuildIndex(): void {
    this.currentIndex.clear();
    for (const entry of this.log) {
      this.index(entry);
    }
  }

  get version(): number {
    return this.log.length;
  }

  private validate(
    entityId: string,
    status: ReviewStatus,
    options: DecideOptions
  ): NormalizedEntity {
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new InvalidDecision(`Unknown entity: ${entityId}`, entityId);
    }
    if (!isReviewStatus(status)) {
      throw new InvalidDecision(`Unknown status: ${String(status)}`, entityId);
    }

    const { replacementText, decidedAt } = options;
    if (replacementText !== undefined && replacementText.trim() === "") {
      throw new InvalidDecision("Replacement text must not be empty", entityId);
    }
    if (status === "EDITED" && replacementText === undefined) {
      throw new InvalidDecision(
        "Replacement text is required for EDITED",
        entityId
      );
    }
    if (
      (status === "ACCEPTED_KEEP" || status === "PENDING") &&
      replacementText !== undefined
    ) {
      throw new InvalidDecision(
        `Replacement text is not allowed for ${status}`,
        entityId
      );
    }
    if (decidedAt !== undefined && Number.isNaN(Date.parse(decidedAt))) {
      throw new InvalidDecision(`Invalid decidedAt: ${decidedAt}`, entityId);
    }

    return entity;
  }

  /**
   * Record a decision for an entity.
   *
   * The previous current decision is superseded but kept in the log. For
   * ACCEPTED_REDACT and EDITED the replacement is resolved once here and
   * applies to every occurrence of the entity, present and future.
   *
   * @throws InvalidDecision for unknown entities or malformed input
   */
  decide(
    entityId: string,
    status: ReviewStatus,
    options: DecideOptions = {}
  ): DecisionOutcome {
    const entity = this.validate(entityId, status, options);
    const recordedAt = this.now().toISOString();
    const previous = this.currentIndex.get(entityId);
    const decidedAt = options.decidedAt
      ? new Date(options.decidedAt).toISOString()
      : recordedAt;

    const sequence = this.log.length + 1;
    const draft: ReviewDecision = {
      decisionId: `dec_${sequence}`,
      sequence,
      entityId,
      status,
      decidedAt,
      recordedAt
    };
    if (options.replacementText !== undefined) {
      draft.replacementText = options.replacementText;
    }
    if (options.note !== undefined && options.note !== "") {
      draft.reviewerNote = options.note;
    }
    const resolved = this.resolver.resolve(entity, status, options.replacementText);
    if (resolved !== undefined) {
      draft.resolvedReplacement = resolved;
    }
    if (previous && wins(draft, previous)) {
      draft.supersedes = previous.decisionId;
    }

    const recorded = Object.freeze(draft);
    this.log.push(recorded);
    const applied = this.index(recorded);

    if (applied) {
      this.logger.debug(
        `${this.talkId}/${entityId}: ${previous?.status ?? "PENDING"} -> ${status}`
      );
    } else {
      this.logger.warn(
        `${this.talkId}/${entityId}: stale decision ${recorded.decisionId} (decidedAt ${decidedAt}) kept for audit only`
      );
    }

    const current = this.currentIndex.get(entityId) ?? recorded;
    return { recorded, current, applied };
  }

  /**
   * Entities with active occurrences that still await a decision, ordered
   * by first active occurrence: document order, then offset.
   */
  getPending(documentOrder: ReadonlyMap<string, number>): NormalizedEntity[] {
    return sortByFirstOccurrence(
      this.entities
        .list()
        .filter(
          (entity) =>
            activeOccurrences(entity).length > 0 &&
            this.statusOf(entity.entityId) === "PENDING"
        ),
      documentOrder
    );
  }

  statusOf(entityId: string): ReviewStatus {
    return this.currentIndex.get(entityId)?.status ?? "PENDING";
  }

  /**
   * Copy-on-read snapshot of the current decisions.
   */
  current(): LedgerSnapshot {
    return {
      talkId: this.talkId,
      version: this.log.length,
      decisions: new Map(this.currentIndex)
    };
  }

  /**
   * The full log (superseded decisions included), optionally for one entity.
   */
  history(entityId?: string): ReviewDecision[] {
    return this.log.filter(
      (entry) => entityId === undefined || entry.entityId === entityId
    );
  }
}

/**
 * Order entities by their first active occurrence.
 */
export function sortByFirstOccurrence(
  entities: NormalizedEntity[],
  documentOrder: ReadonlyMap<string, number>
): NormalizedEntity[] {
  const firstPosition = (entity: NormalizedEntity): [number, number] => {
    let best: [number, number] = [Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY];
    for (const occurrence of activeOccurrences(entity)) {
      const order =
        documentOrder.get(occurrence.documentId) ?? Number.POSITIVE_INFINITY;
      if (
        order < best[0] ||
        (order === best[0] && occurrence.start < best[1])
      ) {
        best = [order, occurrence.start];
      }
    }
    return best;
  };

  return entities
    .map((entity) => ({ entity, position: firstPosition(entity) }))
    .sort(
      (a, b) =>
        a.position[0] - b.position[0] ||
        a.position[1] - b.position[1] ||
        a.entity.entityId.localeCompare(b.entity.entityId)
    )
    .map(({ entity }) => entity);
}
