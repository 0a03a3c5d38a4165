/**
 * Schemas for persisted talk state. Stored files are validated on load so a
 * hand-edited or truncated table fails loudly instead of losing decisions.
 */

import { z } from "zod";
import { ENTITY_CATEGORIES } from "../types/entities";
import { REVIEW_STATUSES } from "../types/review";

export const OccurrenceSchema = z.object({
  documentId: z.string().min(1),
  documentVersion: z.string().min(1),
  start: z.number().int().nonnegative(),
  end: z.number().int().positive(),
  rawText: z.string(),
  confidence: z.number().min(0).max(1),
  superseded: z.boolean()
});

export const NormalizedEntitySchema = z.object({
  entityId: z.string().min(1),
  category: z.enum(ENTITY_CATEGORIES),
  canonicalText: z.string(),
  occurrences: z.array(OccurrenceSchema)
});

export const TalkDocumentSchema = z.object({
  documentId: z.string().min(1),
  version: z.string().min(1),
  text: z.string(),
  language: z.string().min(1),
  order: z.number().int().nonnegative(),
  scannedAt: z.string().min(1)
});

export const ReviewDecisionSchema = z.object({
  decisionId: z.string().min(1),
  sequence: z.number().int().positive(),
  entityId: z.string().min(1),
  status: z.enum(REVIEW_STATUSES),
  replacementText: z.string().optional(),
  reviewerNote: z.string().optional(),
  resolvedReplacement: z.string().optional(),
  decidedAt: z.string().min(1),
  recordedAt: z.string().min(1),
  supersedes: z.string().optional()
});

export const DocumentTableSchema = z.array(TalkDocumentSchema);
export const EntityTableSchema = z.array(NormalizedEntitySchema);
