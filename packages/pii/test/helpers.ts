import type { DetectOptions, EntityDetector } from "../src/detector";
import type {
  DetectedSpan,
  EntityCandidate,
  EntityCategory
} from "../src/types";

export interface Phrase {
  text: string;
  category: EntityCategory;
  confidence?: number;
}

/**
 * Test detector that reports every occurrence of a fixed list of phrases.
 * `mode` switches it into a stalled or failing detector.
 */
export class PhraseDetector implements EntityDetector {
  mode: "ok" | "stall" | "error" = "ok";
  calls = 0;

  constructor(
    private readonly phrases: Phrase[],
    readonly name = "phrases"
  ) {}

  async detect(
    text: string,
    _language: string,
    options: DetectOptions = {}
  ): Promise<DetectedSpan[]> {
    this.calls++;
    if (this.mode === "error") {
      throw new Error("model crashed");
    }
    if (this.mode === "stall") {
      return new Promise<DetectedSpan[]>((_, reject) => {
        options.signal?.addEventListener(
          "abort",
          () => reject(new Error("aborted")),
          { once: true }
        );
      });
    }

    const spans: DetectedSpan[] = [];
    for (const phrase of this.phrases) {
      let from = text.indexOf(phrase.text);
      while (from !== -1) {
        spans.push({
          start: from,
          end: from + phrase.text.length,
          category: phrase.category,
          confidence: phrase.confidence ?? 0.9
        });
        from = text.indexOf(phrase.text, from + phrase.text.length);
      }
    }
    return spans.sort((a, b) => a.start - b.start);
  }
}

export interface TestDocument {
  documentId: string;
  version: string;
  text: string;
}

/**
 * Candidate for the first occurrence of `rawText` at or after `from`.
 */
export function candidateFor(
  document: TestDocument,
  rawText: string,
  category: EntityCategory,
  confidence = 0.9,
  from = 0
): EntityCandidate {
  const start = document.text.indexOf(rawText, from);
  if (start === -1) {
    throw new Error(`"${rawText}" not in ${document.documentId}`);
  }
  return {
    documentId: document.documentId,
    documentVersion: document.version,
    start,
    end: start + rawText.length,
    rawText,
    category,
    confidence
  };
}
