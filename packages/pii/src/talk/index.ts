export {
  TalkPrivacyService,
  createServiceFromConfig,
  documentVersion,
  type DocumentInput,
  type PendingReview,
  type ScanResult,
  type ServiceOverrides,
  type TalkPrivacyServiceOptions
} from "./service";
export {
  InMemoryTalkRepository,
  JsonFileTalkRepository,
  type StoredTalk,
  type TalkRepository
} from "./repository";
export { toFinding } from "./findings";
export {
  DocumentTableSchema,
  EntityTableSchema,
  NormalizedEntitySchema,
  OccurrenceSchema,
  ReviewDecisionSchema,
  TalkDocumentSchema
} from "./schemas";
