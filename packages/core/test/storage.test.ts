import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import {
  appendJsonl,
  createJsonlStore,
  expandPath,
  getTalkPaths,
  isValidTalkId,
  loadJson,
  readJsonl,
  saveJson
} from "../src";

describe("expandPath", () => {
  it("expands ~ to the home directory", () => {
    expect(expandPath("~/.talkguard")).toBe(join(homedir(), ".talkguard"));
    expect(expandPath("~")).toBe(homedir());
  });

  it("leaves absolute and relative paths unchanged", () => {
    expect(expandPath("/etc/talkguard")).toBe("/etc/talkguard");
    expect(expandPath("./local")).toBe("./local");
  });
});

describe("talk paths", () => {
  it("lays out a talk under talks/<id>", () => {
    const paths = getTalkPaths("/data", "keynote-2024");
    expect(paths.dir).toBe("/data/talks/keynote-2024");
    expect(paths.documents).toBe("/data/talks/keynote-2024/documents.json");
    expect(paths.entities).toBe("/data/talks/keynote-2024/entities.json");
    expect(paths.decisions).toBe("/data/talks/keynote-2024/decisions.jsonl");
  });

  it("rejects ids that would escape the data directory", () => {
    expect(isValidTalkId("../etc")).toBe(false);
    expect(isValidTalkId("a/b")).toBe(false);
    expect(isValidTalkId("")).toBe(false);
    expect(() => getTalkPaths("/data", "../x")).toThrow("Invalid talk id");
  });
});

describe("JSON and JSONL stores", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "talkguard-core-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const Table = z.object({ rows: z.array(z.number()) });

  it("returns the fallback for a missing JSON file", () => {
    expect(loadJson(join(dir, "missing.json"), Table, { rows: [7] })).toEqual({ rows: [7] });
  });

  it("saves and reloads JSON, creating parent directories", () => {
    const file = join(dir, "nested", "table.json");
    saveJson(file, { rows: [1, 2] });
    expect(existsSync(file)).toBe(true);
    expect(loadJson(file, Table, { rows: [] })).toEqual({ rows: [1, 2] });
  });

  it("throws on a corrupt JSON table instead of starting empty", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{not json");
    expect(() => loadJson(file, Table, { rows: [] })).toThrow("Failed to parse");
  });

  it("rejects a table that does not match its schema", () => {
    const file = join(dir, "table.json");
    saveJson(file, { rows: ["x"] });
    expect(() => loadJson(file, Table, { rows: [] })).toThrow(
      `Invalid ${file} at rows.0: Expected number, received string`
    );
  });

  it("appends JSONL lines and reads them back in order", () => {
    const file = join(dir, "log.jsonl");
    appendJsonl(file, { seq: 1 });
    appendJsonl(file, { seq: 2 });
    expect(readFileSync(file, "utf-8")).toBe('{"seq":1}\n{"seq":2}\n');
    expect(readJsonl<{ seq: number }>(file)).toEqual([{ seq: 1 }, { seq: 2 }]);
  });

  it("reports and skips unparseable JSONL lines", () => {
    const file = join(dir, "log.jsonl");
    writeFileSync(file, '{"seq":1}\n{oops\n\n{"seq":3}\n');
    const bad: number[] = [];
    const records = readJsonl<{ seq: number }>(file, (_line, n) =>
      bad.push(n)
    );
    expect(records).toEqual([{ seq: 1 }, { seq: 3 }]);
    expect(bad).toEqual([2]);
  });

  it("createJsonlStore wraps a single file", () => {
    const store = createJsonlStore<{ id: string }>(join(dir, "s.jsonl"));
    expect(store.exists()).toBe(false);
    expect(store.readAll()).toEqual([]);
    store.append({ id: "a" });
    expect(store.exists()).toBe(true);
    expect(store.readAll()).toEqual([{ id: "a" }]);
  });
});
