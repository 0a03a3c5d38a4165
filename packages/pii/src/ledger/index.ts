export {
  ReviewLedger,
  sortByFirstOccurrence,
  type DecideOptions,
  type DecisionOutcome,
  type EntityDirectory,
  type LedgerSnapshot,
  type ReviewLedgerOptions
} from "./ledger";
export { KeyedMutex } from "./mutex";
