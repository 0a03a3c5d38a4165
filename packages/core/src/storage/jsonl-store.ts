/**
 * Append-only JSONL (JSON Lines) store.
 *
 * Used for the review decision log: every decision ever made is one line,
 * superseded decisions included. A partial write only loses the last line.
 */

import { appendFileSync, existsSync, readFileSync } from "fs";
import { ensureDir, expandPath } from "./file-utils";

/**
 * Append a single record to a JSONL file.
 *
 * @example
 * appendJsonl("~/.talkguard/talks/t1/decisions.jsonl", decision);
 */
export function appendJsonl<T>(filePath: string, record: T): void {
  const expanded = expandPath(filePath);
  ensureDir(expanded);
  appendFileSync(expanded, `${JSON.stringify(record)}\n`);
}

/**
 * Read all records from a JSONL file.
 *
 * Blank lines are ignored. Unparseable lines are reported through
 * `onInvalidLine` and skipped.
 */
export function readJsonl<T>(
  filePath: string,
  onInvalidLine?: (line: string, lineNumber: number) => void
): T[] {
  const expanded = expandPath(filePath);

  if (!existsSync(expanded)) {
    return [];
  }

  const content = readFileSync(expanded, "utf-8");
  const records: T[] = [];

  content.split("\n").forEach((line, index) => {
    if (!line.trim()) return;
    try {
      records.push(JSON.parse(line) as T);
    } catch {
      onInvalidLine?.(line, index + 1);
    }
  });

  return records;
}

export interface JsonlStore<T> {
  /** Path to the JSONL file */
  readonly path: string;
  /** Append a record */
  append(record: T): void;
  /** Read all records */
  readAll(): T[];
  /** Check if the file exists */
  exists(): boolean;
}

/**
 * Create a typed JSONL store for a specific file path.
 *
 * @example
 * const log = createJsonlStore<ReviewDecision>(decisionsPath);
 * log.append(decision);
 * const all = log.readAll();
 */
export function createJsonlStore<T>(
  filePath: string,
  onInvalidLine?: (line: string, lineNumber: number) => void
): JsonlStore<T> {
  const path = expandPath(filePath);
  return {
    path,
    append: (record: T): void => appendJsonl(path, record),
    readAll: (): T[] => readJsonl<T>(path, onInvalidLine),
    exists: (): boolean => existsSync(path)
  };
}
