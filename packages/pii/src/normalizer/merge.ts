/**
 * Within-document span merging.
 *
 * Detectors often split one mention ("Max" + "Mustermann") or report the
 * same span twice (rules and NER both find an e-mail). Candidates of one
 * category that overlap or touch across a short joiner are merged into
 * their union span with the highest confidence. Overlapping candidates of
 * different categories are resolved in favour of the more confident one so
 * that no two resulting spans overlap; the losers are returned as `dropped`
 * so callers can report them.
 */

import type { EntityCandidate } from "../types/entities";

export interface MergeOptions {
  /**
   * Characters besides spaces and tabs that may sit between two spans of
   * the same category for them to merge. Line breaks never join.
   */
  joinPunctuation: string;
}

export interface MergeResult {
  /** Non-overlapping candidates, ascending by start */
  candidates: EntityCandidate[];
  /** Candidates that lost a cross-category overlap */
  dropped: EntityCandidate[];
}

export const DEFAULT_JOIN_PUNCTUATION = "-.'’";

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, "\\$&");
}

function buildJoinerPattern(joinPunctuation: string): RegExp {
  return new RegExp(`^[ \\t${escapeForCharClass(joinPunctuation)}]*$`);
}

function byPosition(a: EntityCandidate, b: EntityCandidate): number {
  return a.start - b.start || b.end - a.end;
}

function unite(
  text: string,
  a: EntityCandidate,
  b: EntityCandidate
): EntityCandidate {
  const start = Math.min(a.start, b.start);
  const end = Math.max(a.end, b.end);
  return {
    ...a,
    start,
    end,
    rawText: text.slice(start, end),
    confidence: Math.max(a.confidence, b.confidence)
  };
}

/**
 * Prefer the more confident candidate, then the longer one, then the earlier.
 */
function stronger(a: EntityCandidate, b: EntityCandidate): EntityCandidate {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence ? a : b;
  const lengthA = a.end - a.start;
  const lengthB = b.end - b.start;
  if (lengthA !== lengthB) return lengthA > lengthB ? a : b;
  return a.start <= b.start ? a : b;
}

/**
 * Merge the candidates of one document. `text` must be the exact document
 * version the candidates were produced from.
 */
export function mergeCandidates(
  text: string,
  candidates: EntityCandidate[],
  options: MergeOptions = { joinPunctuation: DEFAULT_JOIN_PUNCTUATION }
): MergeResult {
  const joiner = buildJoinerPattern(options.joinPunctuation);

  // Pass 1: same-category union of overlapping or joined spans.
  const byCategory = new Map<string, EntityCandidate[]>();
  for (const candidate of candidates) {
    const list = byCategory.get(candidate.category) ?? [];
    list.push(candidate);
    byCategory.set(candidate.category, list);
  }

  const merged: EntityCandidate[] = [];
  for (const list of byCategory.values()) {
    let current: EntityCandidate | undefined;
    for (const candidate of [...list].sort(byPosition)) {
      if (!current) {
        current = candidate;
        continue;
      }
      const touches =
        candidate.start <= current.end ||
        joiner.test(text.slice(current.end, candidate.start));
      if (touches) {
        current = unite(text, current, candidate);
      } else {
        merged.push(current);
        current = candidate;
      }
    }
    if (current) merged.push(current);
  }

  // Pass 2: cross-category overlaps, strongest wins.
  const result: EntityCandidate[] = [];
  const dropped: EntityCandidate[] = [];
  for (const candidate of merged.sort(byPosition)) {
    const last = result[result.length - 1];
    if (last && candidate.start < last.end) {
      const winner = stronger(last, candidate);
      result[result.length - 1] = winner;
      dropped.push(winner === last ? candidate : last);
    } else {
      result.push(candidate);
    }
  }

  return { candidates: result, dropped };
}
