/**
 * Detector invocation with a deadline and output validation.
 */

import { DetectionUnavailable } from "../errors";
import type { DetectedSpan } from "../types/entities";
import type { EntityDetector } from "./types";

function validateSpans(
  detector: EntityDetector,
  text: string,
  spans: DetectedSpan[]
): DetectedSpan[] {
  for (const span of spans) {
    const valid =
      Number.isInteger(span.start) &&
      Number.isInteger(span.end) &&
      span.start >= 0 &&
      span.end <= text.length &&
      span.start < span.end &&
      span.confidence >= 0 &&
      span.confidence <= 1;
    if (!valid) {
      throw new DetectionUnavailable(
        `${detector.name} returned an invalid span ${span.start}-${span.end}`
      );
    }
  }
  return spans;
}

/**
 * Run a detector, aborting it after `timeoutMs`.
 *
 * Every failure (timeout, thrown error, malformed span) is reported as
 * DetectionUnavailable.
 */
export async function detectWithTimeout(
  detector: EntityDetector,
  text: string,
  language: string,
  timeoutMs: number
): Promise<DetectedSpan[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new DetectionUnavailable(`${detector.name} timed out after ${timeoutMs} ms`)
      );
    }, timeoutMs);
  });

  try {
    const spans = await Promise.race([
      detector.detect(text, language, { signal: controller.signal }),
      deadline
    ]);
    return validateSpans(detector, text, spans);
  } catch (error) {
    if (error instanceof DetectionUnavailable) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new DetectionUnavailable(`${detector.name} failed: ${message}`, {
      cause: error
    });
  } finally {
    clearTimeout(timer);
  }
}
