/**
 * Entity partition: the single owner of entity identity within a talk.
 *
 * Occurrences are grouped under entity ids. The partition only grows:
 * occurrences are appended or marked superseded, never moved between
 * entities. Any attempt to map one occurrence to two entities raises
 * NormalizationConflict.
 */

import { NormalizationConflict } from "../errors";
import {
  activeOccurrences,
  occurrenceKey,
  type EntityCategory,
  type NormalizedEntity,
  type Occurrence
} from "../types/entities";
import { normalizeText } from "./text";

const ENTITY_ID_PATTERN = /^ent_(\d+)$/;

function textKey(category: EntityCategory, text: string): string {
  return `${category}|${normalizeText(text)}`;
}

function cloneEntity(entity: NormalizedEntity): NormalizedEntity {
  return {
    ...entity,
    occurrences: entity.occurrences.map((o) => ({ ...o }))
  };
}

export class EntityPartition {
  private readonly entities = new Map<string, NormalizedEntity>();
  private readonly owners = new Map<string, string>();
  private readonly textIndex = new Map<string, Set<string>>();
  private nextId = 1;

  constructor(entities: NormalizedEntity[] = []) {
    for (const entity of entities) {
      this.restore(cloneEntity(entity));
    }
  }

  private restore(entity: NormalizedEntity): void {
    if (this.entities.has(entity.entityId)) {
      throw new NormalizationConflict(
        `Duplicate entity id ${entity.entityId}`,
        entity.entityId,
        [entity.entityId]
      );
    }
    const occurrences = entity.occurrences;
    entity.occurrences = [];
    this.entities.set(entity.entityId, entity);
    for (const occurrence of occurrences) {
      this.attach(entity, occurrence);
    }

    const match = ENTITY_ID_PATTERN.exec(entity.entityId);
    if (match?.[1]) {
      this.nextId = Math.max(this.nextId, Number(match[1]) + 1);
    }
  }

  private attach(entity: NormalizedEntity, occurrence: Occurrence): void {
    const key = occurrenceKey(occurrence);
    const owner = this.owners.get(key);
    if (owner !== undefined) {
      throw new NormalizationConflict(
        `Occurrence ${key} already belongs to ${owner}`,
        key,
        [owner, entity.entityId]
      );
    }
    this.owners.set(key, entity.entityId);
    entity.occurrences.push(occurrence);

    const indexKey = textKey(entity.category, occurrence.rawText);
    let ids = this.textIndex.get(indexKey);
    if (!ids) {
      ids = new Set();
      this.textIndex.set(indexKey, ids);
    }
    ids.add(entity.entityId);
  }

  /**
   * Create a new entity with a first occurrence.
   */
  createEntity(
    category: EntityCategory,
    occurrence: Occurrence
  ): NormalizedEntity {
    const entity: NormalizedEntity = {
      entityId: `ent_${this.nextId++}`,
      category,
      canonicalText: occurrence.rawText.trim(),
      occurrences: []
    };
    this.entities.set(entity.entityId, entity);
    this.attach(entity, occurrence);
    return entity;
  }

  /**
   * Append an occurrence to an existing entity.
   */
  addOccurrence(entityId: string, occurrence: Occurrence): NormalizedEntity {
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new NormalizationConflict(
        `Cannot add occurrence to unknown entity ${entityId}`,
        occurrenceKey(occurrence),
        [entityId]
      );
    }
    this.attach(entity, occurrence);
    return entity;
  }

  /**
   * Make `version` the live version of `documentId`: occurrences of other
   * versions are marked superseded, occurrences of `version` itself are
   * active again (a document reverted to an earlier text).
   */
  supersedeDocument(
    documentId: string,
    version: string
  ): { superseded: number; reactivated: number } {
    let superseded = 0;
    let reactivated = 0;
    for (const entity of this.entities.values()) {
      for (const occurrence of entity.occurrences) {
        if (occurrence.documentId !== documentId) continue;
        const current = occurrence.documentVersion === version;
        if (current && occurrence.superseded) {
          occurrence.superseded = false;
          reactivated++;
        } else if (!current && !occurrence.superseded) {
          occurrence.superseded = true;
          superseded++;
        }
      }
    }
    return { superseded, reactivated };
  }

  ownerOf(key: string): string | undefined {
    return this.owners.get(key);
  }

  get(entityId: string): NormalizedEntity | undefined {
    return this.entities.get(entityId);
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  /**
   * Entity ids whose occurrences include `text` (case-insensitive) in
   * `category`.
   */
  findByText(category: EntityCategory, text: string): string[] {
    return [...(this.textIndex.get(textKey(category, text)) ?? [])];
  }

  list(): NormalizedEntity[] {
    return [...this.entities.values()];
  }

  /**
   * Entities with at least one active occurrence in `documentId`.
   */
  entitiesInDocument(documentId: string): NormalizedEntity[] {
    return this.list().filter(
      (entity) => activeOccurrences(entity, documentId).length > 0
    );
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Deep copy of all entities, for persistence and snapshot reads.
   */
  snapshot(): NormalizedEntity[] {
    return this.list().map(cloneEntity);
  }
}
