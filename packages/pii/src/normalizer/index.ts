export { EntityPartition } from "./partition";
export {
  EntityNormalizer,
  type AmbiguousMatch,
  type NormalizationResult,
  type NormalizedDocument,
  type NormalizerOptions
} from "./normalizer";
export {
  DEFAULT_MATCHERS,
  FUZZY_MATCHERS,
  exactMatcher,
  surnameMatcher,
  type EntityMatcher,
  type MatchQuery,
  type MatchResult
} from "./matchers";
export {
  DEFAULT_JOIN_PUNCTUATION,
  mergeCandidates,
  type MergeOptions,
  type MergeResult
} from "./merge";
export { normalizeText, tokens } from "./text";
