/**
 * Entity detection: the detector contract and its adapters.
 */

export type { DetectOptions, EntityDetector } from "./types";
export {
  RuleDetector,
  compileRule,
  loadDefaultRules,
  type CompiledRule,
  type RuleDefinition
} from "./rules";
export {
  PresidioDetector,
  mapPresidioEntityType,
  type PresidioDetectorConfig
} from "./presidio";
export { CompositeDetector } from "./composite";
export { detectWithTimeout } from "./timeout";
export { toCandidates, type CandidateFilter } from "./candidates";
export {
  CATEGORY_PROFILES,
  recommendationsFor,
  type CategoryProfile
} from "./sensitivity";
export { createDetector } from "./factory";
