/**
 * File system utilities for talkguard storage.
 *
 * These utilities handle common file operations with consistent
 * error handling and path expansion.
 */

import { existsSync, mkdirSync, renameSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

/**
 * Expand ~ to home directory in paths.
 *
 * @example
 * expandPath("~/.talkguard/talks") // => "/home/reviewer/.talkguard/talks"
 */
export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Ensure the parent directory of a file path exists.
 * Creates directories recursively if needed.
 */
export function ensureDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Write a file atomically by writing to a temp file first.
 * A crash mid-write leaves the previous content in place.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const expanded = expandPath(filePath);
  ensureDir(expanded);

  const tempPath = `${expanded}.tmp.${process.pid}`;
  writeFileSync(tempPath, content);
  renameSync(tempPath, expanded);
}

/**
 * Check if a file or directory exists.
 */
export function pathExists(path: string): boolean {
  return existsSync(expandPath(path));
}
