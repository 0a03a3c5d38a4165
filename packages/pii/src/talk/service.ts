/**
 * Talk privacy service: one talk's documents, entities and review ledger,
 * behind a per-talk lock.
 *
 * Detection runs outside the lock (it is the slow, remote part); merging
 * the result into the talk and every decision run inside it, so scans and
 * decisions for one talk are applied one at a time.
 */

import { createHash } from "crypto";
import {
  createLogger,
  isValidTalkId,
  type Config,
  type Logger
} from "@talkguard/core";
import {
  createDetector,
  detectWithTimeout,
  recommendationsFor,
  toCandidates,
  type EntityDetector
} from "../detector";
import {
  DetectionUnavailable,
  NormalizationConflict,
  isPiiError,
  NotFound,
  TalkHalted
} from "../errors";
import {
  KeyedMutex,
  ReviewLedger,
  sortByFirstOccurrence,
  type DecisionOutcome,
  type LedgerSnapshot
} from "../ledger";
import {
  DEFAULT_MATCHERS,
  EntityNormalizer,
  EntityPartition,
  FUZZY_MATCHERS,
  type NormalizationResult
} from "../normalizer";
import { ReplacementResolver } from "../resolver";
import {
  highlightSegments,
  sanitizeDocument,
  type HighlightSegment
} from "../sanitizer";
import {
  isEntityCategory,
  type DetectedSpan,
  type EntityCategory,
  type NormalizedEntity
} from "../types/entities";
import type {
  DecisionInput,
  FindingRecord,
  ReviewDecision,
  SanitizedDocument,
  TalkDocument
} from "../types/review";
import { toFinding } from "./findings";
import { JsonFileTalkRepository, type TalkRepository } from "./repository";

export interface DocumentInput {
  documentId: string;
  text: string;
  /** Defaults to the configured detector language */
  language?: string;
}

export type ScanResult =
  | {
      status: "scanned";
      talkId: string;
      documentId: string;
      version: string;
      detector: string;
      normalization: NormalizationResult;
      /** Entities of the talk still awaiting review after this scan */
      pendingCount: number;
    }
  | {
      status: "detection_unavailable";
      talkId: string;
      documentId: string;
      reason: string;
    };

export interface PendingReview {
  talkId: string;
  entities: NormalizedEntity[];
  findings: FindingRecord[];
  recommendations: string[];
}

export interface TalkPrivacyServiceOptions {
  repository: TalkRepository;
  detector: EntityDetector;
  normalizer?: EntityNormalizer;
  resolver?: ReplacementResolver;
  /** Detector deadline (default: 10000) */
  timeoutMs?: number;
  minConfidence?: number;
  /** Categories to keep; empty keeps all */
  categories?: readonly EntityCategory[];
  /** Default: "de" */
  defaultLanguage?: string;
  now?: () => Date;
  logger?: Logger;
}

interface TalkState {
  talkId: string;
  documents: Map<string, TalkDocument>;
  partition: EntityPartition;
  ledger: ReviewLedger;
}

/** Content hash identifying one version of a document. */
export function documentVersion(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex").slice(0, 16);
}

export class TalkPrivacyService {
  private readonly repository: TalkRepository;
  private readonly detector: EntityDetector;
  private readonly normalizer: EntityNormalizer;
  private readonly resolver: ReplacementResolver;
  private readonly timeoutMs: number;
  private readonly minConfidence: number;
  private readonly categories: readonly EntityCategory[];
  private readonly defaultLanguage: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private readonly mutex = new KeyedMutex();
  private readonly states = new Map<string, TalkState>();
  private readonly halted = new Map<string, string>();

  constructor(options: TalkPrivacyServiceOptions) {
    this.repository = options.repository;
    this.detector = options.detector;
    this.logger = options.logger ?? createLogger("talks");
    this.normalizer =
      options.normalizer ??
      new EntityNormalizer({ logger: this.logger.child("normalizer") });
    this.resolver = options.resolver ?? new ReplacementResolver();
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.minConfidence = options.minConfidence ?? 0;
    this.categories = options.categories ?? [];
    this.defaultLanguage = options.defaultLanguage ?? "de";
    this.now = options.now ?? (() => new Date());
  }

  get detectorName(): string {
    return this.detector.name;
  }

  // ===========================================================================
  // Talk state
  // ===========================================================================

  private assertUsable(talkId: string): void {
    if (!isValidTalkId(talkId)) {
      throw new NotFound("talk", talkId);
    }
    const cause = this.halted.get(talkId);
    if (cause !== undefined) {
      throw new TalkHalted(talkId, cause);
    }
  }

  private async load(talkId: string): Promise<TalkState> {
    const cached = this.states.get(talkId);
    if (cached) return cached;

    const stored = await this.repository.loadTalk(talkId);
    const partition = new EntityPartition(stored.entities);
    const state: TalkState = {
      talkId,
      documents: new Map(stored.documents.map((d) => [d.documentId, d])),
      partition,
      ledger: new ReviewLedger({
        talkId,
        entities: partition,
        resolver: this.resolver,
        log: stored.decisions,
        now: this.now,
        logger: this.logger.child("ledger")
      })
    };
    this.states.set(talkId, state);
    return state;
  }

  /**
   * Run `task` with exclusive access to the talk. A NormalizationConflict
   * halts the talk; an unexpected failure (storage, usually) drops the
   * cached state so the next call reloads what was persisted.
   */
  private withTalk<T>(
    talkId: string,
    task: (state: TalkState) => Promise<T> | T
  ): Promise<T> {
    return this.mutex.runExclusive(talkId, async () => {
      this.assertUsable(talkId);
      try {
        return await task(await this.load(talkId));
      } catch (error) {
        if (error instanceof NormalizationConflict) {
          this.halted.set(talkId, error.message);
          this.states.delete(talkId);
          this.logger.error(
            `Halting talk ${talkId}: ${error.message} (entities: ${error.entityIds.join(", ")})`
          );
        } else if (!isPiiError(error)) {
          this.states.delete(talkId);
        }
        throw error;
      }
    });
  }

  private documentOrder(state: TalkState): Map<string, number> {
    return new Map(
      [...state.documents.values()].map((d) => [d.documentId, d.order])
    );
  }

  private requireDocument(state: TalkState, documentId: string): TalkDocument {
    const document = state.documents.get(documentId);
    if (!document) {
      throw new NotFound("document", documentId);
    }
    return document;
  }

  // ===========================================================================
  // Scanning
  // ===========================================================================

  /**
   * Detect and normalize one document. A detector failure is reported as
   * `detection_unavailable` and leaves the talk untouched; it never means
   * the document is clean.
   */
  async scanDocument(talkId: string, input: DocumentInput): Promise<ScanResult> {
    this.assertUsable(talkId);
    const language = input.language ?? this.defaultLanguage;
    const version = documentVersion(input.text);

    let spans: DetectedSpan[];
    try {
      spans = await detectWithTimeout(
        this.detector,
        input.text,
        language,
        this.timeoutMs
      );
    } catch (error) {
      if (error instanceof DetectionUnavailable) {
        this.logger.warn(
          `Scan of ${talkId}/${input.documentId} skipped: ${error.reason}`
        );
        return {
          status: "detection_unavailable",
          talkId,
          documentId: input.documentId,
          reason: error.reason
        };
      }
      throw error;
    }

    const document = { documentId: input.documentId, version, text: input.text };
    const candidates = toCandidates(document, spans, {
      minConfidence: this.minConfidence,
      categories: this.categories
    });

    return this.withTalk(talkId, async (state) => {
      const normalization = this.normalizer.normalize(
        state.partition,
        document,
        candidates
      );

      const previous = state.documents.get(input.documentId);
      state.documents.set(input.documentId, {
        documentId: input.documentId,
        version,
        text: input.text,
        language,
        order: previous?.order ?? state.documents.size,
        scannedAt: this.now().toISOString()
      });

      await this.repository.saveEntities(talkId, state.partition.snapshot());
      await this.repository.saveDocuments(talkId, [...state.documents.values()]);

      const pendingCount = state.ledger.getPending(this.documentOrder(state)).length;
      this.logger.info(
        `Scanned ${talkId}/${input.documentId}@${version}: ${candidates.length} spans, ${normalization.created.length} new entities, ${pendingCount} pending`
      );

      return {
        status: "scanned",
        talkId,
        documentId: input.documentId,
        version,
        detector: this.detector.name,
        normalization,
        pendingCount
      };
    });
  }

  /**
   * Scan several documents. Detection runs concurrently; the results are
   * merged into the talk one document at a time.
   */
  scanDocuments(talkId: string, inputs: DocumentInput[]): Promise<ScanResult[]> {
    return Promise.all(inputs.map((input) => this.scanDocument(talkId, input)));
  }

  // ===========================================================================
  // Review
  // ===========================================================================

  async getPending(talkId: string): Promise<PendingReview> {
    return this.withTalk(talkId, (state) => {
      const entities = state.ledger
        .getPending(this.documentOrder(state))
        .map((entity) => structuredClone(entity));
      const findings = entities.map((entity) => toFinding(entity, "PENDING"));
      return {
        talkId,
        entities,
        findings,
        recommendations: recommendationsFor(findings)
      };
    });
  }

  /**
   * Every entity with active occurrences, with its current status.
   */
  async listFindings(talkId: string): Promise<FindingRecord[]> {
    return this.withTalk(talkId, (state) =>
      sortByFirstOccurrence(
        state.partition.list().filter((entity) =>
          entity.occurrences.some((o) => !o.superseded)
        ),
        this.documentOrder(state)
      ).map((entity) => toFinding(entity, state.ledger.statusOf(entity.entityId)))
    );
  }

  async decide(talkId: string, input: DecisionInput): Promise<DecisionOutcome> {
    return this.withTalk(talkId, async (state) => {
      const options: { replacementText?: string; note?: string; decidedAt?: string } = {};
      if (input.replacementText !== undefined) options.replacementText = input.replacementText;
      if (input.note !== undefined) options.note = input.note;
      if (input.decidedAt !== undefined) options.decidedAt = input.decidedAt;

      const outcome = state.ledger.decide(input.entityId, input.status, options);
      await this.repository.appendDecision(talkId, outcome.recorded);
      return outcome;
    });
  }

  async current(talkId: string): Promise<LedgerSnapshot> {
    return this.withTalk(talkId, (state) => state.ledger.current());
  }

  async history(talkId: string, entityId?: string): Promise<ReviewDecision[]> {
    return this.withTalk(talkId, (state) => {
      if (entityId !== undefined && !state.partition.has(entityId)) {
        throw new NotFound("entity", entityId);
      }
      return state.ledger.history(entityId);
    });
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  /**
   * @throws UnreviewedEntities while any entity in the document is pending
   */
  async sanitize(talkId: string, documentId: string): Promise<SanitizedDocument> {
    return this.withTalk(talkId, (state) => {
      const document = this.requireDocument(state, documentId);
      return sanitizeDocument({
        document,
        entities: sortByFirstOccurrence(
          state.partition.entitiesInDocument(documentId),
          this.documentOrder(state)
        ),
        snapshot: state.ledger.current(),
        resolver: this.resolver
      });
    });
  }

  async highlight(talkId: string, documentId: string): Promise<HighlightSegment[]> {
    return this.withTalk(talkId, (state) => {
      const document = this.requireDocument(state, documentId);
      return highlightSegments(
        document,
        state.partition.entitiesInDocument(documentId),
        (entityId) => state.ledger.statusOf(entityId)
      );
    });
  }

  async listDocuments(talkId: string): Promise<TalkDocument[]> {
    return this.withTalk(talkId, (state) =>
      [...state.documents.values()].sort((a, b) => a.order - b.order)
    );
  }

  listTalks(): Promise<string[]> {
    return this.repository.listTalks();
  }

  isHalted(talkId: string): boolean {
    return this.halted.has(talkId);
  }
}

export interface ServiceOverrides {
  repository?: TalkRepository;
  detector?: EntityDetector;
  logger?: Logger;
}

/**
 * Wire a service from loaded configuration.
 */
export function createServiceFromConfig(
  config: Config,
  overrides: ServiceOverrides = {}
): TalkPrivacyService {
  const logger = overrides.logger ?? createLogger("talks");
  return new TalkPrivacyService({
    repository: overrides.repository ?? new JsonFileTalkRepository(config.dataDir),
    detector: overrides.detector ?? createDetector(config.detector),
    normalizer: new EntityNormalizer({
      matchers: config.normalizer.fuzzyPersonMatching
        ? FUZZY_MATCHERS
        : DEFAULT_MATCHERS,
      joinPunctuation: config.normalizer.joinPunctuation,
      logger: logger.child("normalizer")
    }),
    timeoutMs: config.detector.timeoutMs,
    minConfidence: config.detector.minConfidence,
    categories: config.detector.categories.filter(isEntityCategory),
    defaultLanguage: config.detector.language,
    logger
  });
}
