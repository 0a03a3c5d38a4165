/**
 * Presidio analyzer adapter.
 *
 * Calls a Presidio analyzer service (`POST /analyze`) which combines a
 * statistical NER model with Presidio's own recognizers.
 */

import { z } from "zod";
import { DetectionUnavailable } from "../errors";
import type { DetectedSpan, EntityCategory } from "../types/entities";
import type { DetectOptions, EntityDetector } from "./types";

const PresidioResultSchema = z.array(
  z.object({
    entity_type: z.string(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    score: z.number().min(0).max(1)
  })
);

/**
 * Presidio entity types mapped onto our categories. Anything not listed
 * becomes MISC.
 */
const PRESIDIO_CATEGORY_MAP: Record<string, EntityCategory> = {
  PERSON: "PERSON",
  ORGANIZATION: "ORG",
  NRP: "ORG",
  LOCATION: "LOCATION",
  GPE: "LOCATION",
  EMAIL_ADDRESS: "EMAIL",
  PHONE_NUMBER: "PHONE",
  IBAN_CODE: "ID_NUMBER",
  CREDIT_CARD: "ID_NUMBER",
  US_SSN: "ID_NUMBER",
  US_PASSPORT: "ID_NUMBER",
  US_DRIVER_LICENSE: "ID_NUMBER",
  DE_TAX_ID: "ID_NUMBER",
  MEDICAL_LICENSE: "ID_NUMBER",
  DATE_TIME: "DATE"
};

export function mapPresidioEntityType(entityType: string): EntityCategory {
  return PRESIDIO_CATEGORY_MAP[entityType.toUpperCase()] ?? "MISC";
}

export interface PresidioDetectorConfig {
  /** Analyzer base URL, e.g. http://localhost:5002 */
  baseUrl: string;
  /** Presidio-side score threshold (default: 0) */
  scoreThreshold?: number;
  /** Custom fetch implementation (tests) */
  fetch?: typeof fetch;
}

export class PresidioDetector implements EntityDetector {
  readonly name = "presidio";

  private readonly baseUrl: string;
  private readonly scoreThreshold: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: PresidioDetectorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.scoreThreshold = config.scoreThreshold ?? 0;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async detect(
    text: string,
    language: string,
    options: DetectOptions = {}
  ): Promise<DetectedSpan[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/analyze`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          text,
          language,
          score_threshold: this.scoreThreshold
        }),
        signal: options.signal
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new DetectionUnavailable("Presidio request aborted", {
          cause: error
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes("ECONNREFUSED") || message.includes("fetch failed")) {
        throw new DetectionUnavailable(
          `Presidio analyzer not reachable at ${this.baseUrl}`,
          { cause: error }
        );
      }
      throw new DetectionUnavailable(message, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new DetectionUnavailable(
        `Presidio analyzer error: ${response.status}${body ? ` - ${body}` : ""}`
      );
    }

    const parsed = PresidioResultSchema.safeParse(
      await response.json().catch(() => null)
    );
    if (!parsed.success) {
      throw new DetectionUnavailable("Presidio analyzer returned a malformed response");
    }

    return parsed.data.map((result) => ({
      start: result.start,
      end: result.end,
      category: mapPresidioEntityType(result.entity_type),
      confidence: result.score,
      source: `presidio:${result.entity_type}`
    }));
  }
}
