/**
 * Entity detector contract.
 *
 * A detector turns text into candidate spans. It must be deterministic for
 * identical input and model version, and must throw (never return an empty
 * list) when it cannot do its job.
 */

import type { DetectedSpan } from "../types/entities";

export interface DetectOptions {
  /** Aborted when the caller gives up (timeout) */
  signal?: AbortSignal;
}

export interface EntityDetector {
  /** Detector name, used in logs and error messages */
  readonly name: string;
  /**
   * Detect candidate spans in `text`.
   *
   * @throws DetectionUnavailable when the underlying model or service
   *   cannot be used
   */
  detect(
    text: string,
    language: string,
    options?: DetectOptions
  ): Promise<DetectedSpan[]>;
}
