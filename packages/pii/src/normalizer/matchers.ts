/**
 * Identity matchers decide whether a new mention refers to an entity the
 * talk already knows.
 *
 * Matchers must prefer a split over a merge: when more than one entity
 * could match, they answer "ambiguous" and the normalizer creates a new
 * entity. A false merge would apply one person's decision to another.
 */

import type { EntityCategory } from "../types/entities";
import type { EntityPartition } from "./partition";
import { tokens } from "./text";

export interface MatchQuery {
  category: EntityCategory;
  text: string;
}

export type MatchResult =
  | { kind: "match"; entityId: string }
  | { kind: "ambiguous"; entityIds: string[] }
  | { kind: "none" };

export interface EntityMatcher {
  readonly name: string;
  match(query: MatchQuery, partition: EntityPartition): MatchResult;
}

function fromCandidates(entityIds: string[]): MatchResult {
  const unique = [...new Set(entityIds)].sort();
  if (unique.length === 0) return { kind: "none" };
  const [only] = unique;
  if (unique.length === 1 && only !== undefined) {
    return { kind: "match", entityId: only };
  }
  return { kind: "ambiguous", entityIds: unique };
}

/**
 * Same category and same text, ignoring case and whitespace runs.
 */
export const exactMatcher: EntityMatcher = {
  name: "exact",
  match(query, partition) {
    return fromCandidates(partition.findByText(query.category, query.text));
  }
};

/**
 * Links a surname-only mention to a full name (and the reverse) for
 * PERSON entities, but only when exactly one known person fits.
 *
 * "Smith" joins "Alice Smith" if no other known person is called Smith.
 * A full name never joins an entity known only by the bare surname: the
 * bare "Smith" could be any Smith, so such entities make the match
 * ambiguous instead.
 */
export const surnameMatcher: EntityMatcher = {
  name: "surname",
  match(query, partition) {
    if (query.category !== "PERSON") return { kind: "none" };
    const queryTokens = tokens(query.text);
    const surname = queryTokens[queryTokens.length - 1];
    if (surname === undefined) return { kind: "none" };

    const fullName = queryTokens.join(" ");
    const candidates: string[] = [];
    const surnameOnly: string[] = [];
    for (const entity of partition.list()) {
      if (entity.category !== "PERSON") continue;
      const known = entity.occurrences.map((o) => tokens(o.rawText));
      const sharesSurname = known.some(
        (t) => t.length > 0 && t[t.length - 1] === surname
      );
      if (!sharesSurname) continue;

      const fullNames = known.filter((t) => t.length > 1).map((t) => t.join(" "));
      if (queryTokens.length === 1) {
        if (fullNames.length > 0) candidates.push(entity.entityId);
      } else if (fullNames.length === 0) {
        surnameOnly.push(entity.entityId);
      } else if (fullNames.every((name) => name === fullName)) {
        candidates.push(entity.entityId);
      }
    }

    if (surnameOnly.length > 0) {
      return {
        kind: "ambiguous",
        entityIds: [...new Set([...candidates, ...surnameOnly])].sort()
      };
    }
    return fromCandidates(candidates);
  }
};

export const DEFAULT_MATCHERS: readonly EntityMatcher[] = [exactMatcher];

export const FUZZY_MATCHERS: readonly EntityMatcher[] = [
  exactMatcher,
  surnameMatcher
];
