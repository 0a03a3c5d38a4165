export {
  DEFAULT_MASKS,
  ReplacementResolver,
  type PlannedReplacement,
  type ReplacementPlan
} from "./resolver";
