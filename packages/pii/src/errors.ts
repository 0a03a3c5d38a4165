/**
 * Error taxonomy for the personal-data pipeline.
 *
 * Every error carries a `code` so transport layers can map it without
 * instanceof chains.
 */

export type PiiErrorCode =
  | "DETECTION_UNAVAILABLE"
  | "INVALID_DECISION"
  | "UNREVIEWED_ENTITIES"
  | "NORMALIZATION_CONFLICT"
  | "TALK_HALTED"
  | "NOT_FOUND";

export abstract class PiiError extends Error {
  abstract readonly code: PiiErrorCode;
}

/**
 * The detector could not be reached, failed, or timed out. Recoverable:
 * the scan can be retried. Never means "no personal data found".
 */
export class DetectionUnavailable extends PiiError {
  readonly code = "DETECTION_UNAVAILABLE";
  override readonly name = "DetectionUnavailable";

  constructor(
    readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Detection unavailable: ${reason}`, options);
  }
}

/**
 * Malformed decision or unknown entity. Surfaced to the reviewer.
 */
export class InvalidDecision extends PiiError {
  readonly code = "INVALID_DECISION";
  override readonly name = "InvalidDecision";

  constructor(
    message: string,
    readonly entityId?: string
  ) {
    super(message);
  }
}

/**
 * Sanitization was attempted while findings are still pending.
 */
export class UnreviewedEntities extends PiiError {
  readonly code = "UNREVIEWED_ENTITIES";
  override readonly name = "UnreviewedEntities";

  constructor(readonly entityIds: string[]) {
    super(`${entityIds.length} unreviewed entities: ${entityIds.join(", ")}`);
  }
}

/**
 * Internal invariant violation in the entity partition. Fatal for the talk.
 */
export class NormalizationConflict extends PiiError {
  readonly code = "NORMALIZATION_CONFLICT";
  override readonly name = "NormalizationConflict";

  constructor(
    message: string,
    readonly occurrenceKey: string,
    readonly entityIds: string[]
  ) {
    super(message);
  }
}

/**
 * A talk hit a NormalizationConflict earlier and refuses further work.
 */
export class TalkHalted extends PiiError {
  readonly code = "TALK_HALTED";
  override readonly name = "TalkHalted";

  constructor(
    readonly talkId: string,
    readonly causeMessage: string
  ) {
    super(`Talk ${talkId} is halted pending manual inspection: ${causeMessage}`);
  }
}

export class NotFound extends PiiError {
  readonly code = "NOT_FOUND";
  override readonly name = "NotFound";

  constructor(
    readonly kind: "talk" | "document" | "entity",
    readonly id: string
  ) {
    super(`Unknown ${kind}: ${id}`);
  }
}

export function isPiiError(error: unknown): error is PiiError {
  return error instanceof PiiError;
}
