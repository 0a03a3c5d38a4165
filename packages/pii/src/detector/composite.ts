/**
 * Runs several detectors over the same text and concatenates their spans.
 *
 * If any detector is unavailable the whole detection is unavailable: a
 * partial result would hide everything the missing detector would have found.
 */

import type { DetectedSpan } from "../types/entities";
import type { DetectOptions, EntityDetector } from "./types";

export class CompositeDetector implements EntityDetector {
  readonly name: string;

  constructor(private readonly detectors: EntityDetector[]) {
    if (detectors.length === 0) {
      throw new Error("CompositeDetector needs at least one detector");
    }
    this.name = detectors.map((d) => d.name).join("+");
  }

  async detect(
    text: string,
    language: string,
    options: DetectOptions = {}
  ): Promise<DetectedSpan[]> {
    const results = await Promise.all(
      this.detectors.map((detector) => detector.detect(text, language, options))
    );
    return results
      .flat()
      .sort((a, b) => a.start - b.start || a.end - b.end);
  }
}
