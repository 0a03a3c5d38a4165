export { createReviewApp, type ReviewAppState } from "./app";
export {
  startReviewServer,
  type ReviewServer,
  type ReviewServerOptions
} from "./server";
export {
  decisionToDict,
  documentToDict,
  findingToDict,
  sanitizedToDict,
  scanResultToDict,
  segmentToDict,
  snapshotToDict
} from "./dict-converters";
export { RequestValidationError, handleError, readBody } from "./errors";
