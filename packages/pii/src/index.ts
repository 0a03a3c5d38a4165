/**
 * @talkguard/pii
 *
 * Personal-data detection, normalization, review and sanitization for
 * talks (sets of related documents reviewed together).
 */

export * from "./types";
export * from "./errors";
export * from "./detector";
export * from "./normalizer";
export * from "./ledger";
export * from "./resolver";
export * from "./sanitizer";
export * from "./talk";
