/**
 * @talkguard/core
 *
 * Shared infrastructure for talkguard packages:
 * - Storage helpers (paths, atomic JSON tables, append-only JSONL logs)
 * - TOML configuration with validation and environment overrides
 * - Scoped console logger
 */

export * from "./storage";
export * from "./config";
export * from "./logger";
