/**
 * Storage module for talkguard.
 *
 * Provides:
 * - Centralized storage path constants
 * - File system utilities (expandPath, ensureDir, etc.)
 * - JSON store for tables rewritten as a whole
 * - JSONL store for append-only logs
 */

export * from "./paths";

export {
  expandPath,
  ensureDir,
  writeFileAtomic,
  pathExists
} from "./file-utils";

export { loadJson, saveJson } from "./json-store";

export {
  appendJsonl,
  readJsonl,
  createJsonlStore,
  type JsonlStore
} from "./jsonl-store";
