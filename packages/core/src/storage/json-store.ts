/**
 * JSON document store for state that is rewritten as a whole
 * (document tables, entity tables).
 */

import { existsSync, readFileSync } from "fs";
import type { z } from "zod";
import { expandPath, writeFileAtomic } from "./file-utils";

/**
 * Load and validate a JSON file, returning `fallback` when the file does
 * not exist.
 *
 * Unlike JSONL logs, a corrupt JSON table is an error: silently starting
 * from an empty table would drop review state.
 */
export function loadJson<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T
): T {
  const expanded = expandPath(filePath);
  if (!existsSync(expanded)) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(expanded, "utf-8"));
  } catch (error) {
    throw new Error(
      `Failed to parse ${expanded}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Invalid ${expanded}${where}: ${issue?.message ?? "schema mismatch"}`);
  }
  return result.data;
}

/**
 * Save a value as pretty-printed JSON using an atomic write.
 */
export function saveJson<T>(filePath: string, value: T): void {
  writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
