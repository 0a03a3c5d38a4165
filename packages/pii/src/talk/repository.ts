/**
 * Talk persistence.
 *
 * Layout per talk: raw documents, the normalized entity table, and the
 * append-only decision log. Sanitized output is derived and never stored.
 */

import { readdirSync } from "fs";
import { join } from "path";
import {
  createJsonlStore,
  createLogger,
  expandPath,
  getTalkPaths,
  isValidTalkId,
  loadJson,
  pathExists,
  saveJson,
  type Logger
} from "@talkguard/core";
import type { NormalizedEntity } from "../types/entities";
import type { ReviewDecision, TalkDocument } from "../types/review";
import {
  DocumentTableSchema,
  EntityTableSchema,
  ReviewDecisionSchema
} from "./schemas";

export interface StoredTalk {
  documents: TalkDocument[];
  entities: NormalizedEntity[];
  decisions: ReviewDecision[];
}

export interface TalkRepository {
  /** Load a talk; unknown talks load empty */
  loadTalk(talkId: string): Promise<StoredTalk>;
  saveDocuments(talkId: string, documents: TalkDocument[]): Promise<void>;
  saveEntities(talkId: string, entities: NormalizedEntity[]): Promise<void>;
  /** Append one entry to the decision log */
  appendDecision(talkId: string, decision: ReviewDecision): Promise<void>;
  listTalks(): Promise<string[]>;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * In-process repository, used by tests and short-lived tools.
 */
export class InMemoryTalkRepository implements TalkRepository {
  private readonly talks = new Map<string, StoredTalk>();

  private talk(talkId: string): StoredTalk {
    let talk = this.talks.get(talkId);
    if (!talk) {
      talk = { documents: [], entities: [], decisions: [] };
      this.talks.set(talkId, talk);
    }
    return talk;
  }

  async loadTalk(talkId: string): Promise<StoredTalk> {
    return clone(this.talks.get(talkId) ?? { documents: [], entities: [], decisions: [] });
  }

  async saveDocuments(talkId: string, documents: TalkDocument[]): Promise<void> {
    this.talk(talkId).documents = clone(documents);
  }

  async saveEntities(talkId: string, entities: NormalizedEntity[]): Promise<void> {
    this.talk(talkId).entities = clone(entities);
  }

  async appendDecision(talkId: string, decision: ReviewDecision): Promise<void> {
    this.talk(talkId).decisions.push(clone(decision));
  }

  async listTalks(): Promise<string[]> {
    return [...this.talks.keys()].sort();
  }
}

/**
 * File-backed repository under `<dataDir>/talks/<talkId>/`.
 */
export class JsonFileTalkRepository implements TalkRepository {
  private readonly logger: Logger;

  constructor(
    private readonly dataDir: string,
    logger: Logger = createLogger("repository")
  ) {
    this.logger = logger;
  }

  async loadTalk(talkId: string): Promise<StoredTalk> {
    const paths = getTalkPaths(this.dataDir, talkId);

    const documents = loadJson(paths.documents, DocumentTableSchema, []);
    const entities = loadJson(paths.entities, EntityTableSchema, []);
    const log = createJsonlStore<unknown>(paths.decisions, (_line, lineNumber) => {
      this.logger.error(
        `${paths.decisions}:${lineNumber} is not valid JSON; entry ignored`
      );
    });
    const decisions = log.readAll().map((entry, index) => {
      const parsed = ReviewDecisionSchema.safeParse(entry);
      if (!parsed.success) {
        throw new Error(
          `Invalid decision #${index + 1} in ${paths.decisions}: ${parsed.error.issues
            .map((i) => `${i.path.join(".")}: ${i.message}`)
            .join("; ")}`
        );
      }
      return parsed.data;
    });

    return { documents, entities, decisions };
  }

  async saveDocuments(talkId: string, documents: TalkDocument[]): Promise<void> {
    saveJson(getTalkPaths(this.dataDir, talkId).documents, documents);
  }

  async saveEntities(talkId: string, entities: NormalizedEntity[]): Promise<void> {
    saveJson(getTalkPaths(this.dataDir, talkId).entities, entities);
  }

  async appendDecision(talkId: string, decision: ReviewDecision): Promise<void> {
    createJsonlStore<ReviewDecision>(
      getTalkPaths(this.dataDir, talkId).decisions
    ).append(decision);
  }

  async listTalks(): Promise<string[]> {
    const root = join(expandPath(this.dataDir), "talks");
    if (!pathExists(root)) {
      return [];
    }
    return readdirSync(root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && isValidTalkId(entry.name))
      .map((entry) => entry.name)
      .sort();
  }
}
