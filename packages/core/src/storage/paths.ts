/**
 * Centralized storage paths for talkguard.
 *
 * All persistent data locations are defined here so every package agrees
 * on where a talk's state lives.
 */

import { join } from "path";
import { expandPath } from "./file-utils";

// =============================================================================
// BASE DIRECTORIES
// =============================================================================

/** Primary data directory for talk state */
export const DATA_DIR = "~/.talkguard";

/** Configuration directory (follows XDG Base Directory spec) */
export const CONFIG_DIR = "~/.config/talkguard";

/** Main configuration file (TOML) */
export const CONFIG_FILE = `${CONFIG_DIR}/config.toml`;

// =============================================================================
// PER-TALK LAYOUT
// =============================================================================

export interface TalkPaths {
  /** Directory holding all state of one talk */
  dir: string;
  /** Raw documents, immutable once scanned */
  documents: string;
  /** Normalized entities table */
  entities: string;
  /** Append-only review decision log */
  decisions: string;
}

const TALK_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Whether a talk id is safe to use as a directory name.
 */
export function isValidTalkId(talkId: string): boolean {
  return TALK_ID_PATTERN.test(talkId) && !talkId.includes("..");
}

/**
 * Resolve the on-disk layout for a talk.
 */
export function getTalkPaths(dataDir: string, talkId: string): TalkPaths {
  if (!isValidTalkId(talkId)) {
    throw new Error(`Invalid talk id: ${talkId}`);
  }
  const dir = join(expandPath(dataDir), "talks", talkId);
  return {
    dir,
    documents: join(dir, "documents.json"),
    entities: join(dir, "entities.json"),
    decisions: join(dir, "decisions.jsonl")
  };
}
