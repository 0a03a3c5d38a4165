/**
 * Rule-based detector for structured personal data (e-mail, phone numbers,
 * identifiers, dates).
 *
 * Rules are loaded from rules.json so the set can be audited without
 * reading code. Rules are applied in file order; a match overlapping a span
 * claimed by an earlier rule is dropped.
 */

import { z } from "zod";
import {
  ENTITY_CATEGORIES,
  type DetectedSpan,
  type EntityCategory
} from "../types/entities";
import type { DetectOptions, EntityDetector } from "./types";
import rulesJson from "./rules.json";

const RuleDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  category: z.enum(ENTITY_CATEGORIES),
  confidence: z.number().min(0).max(1),
  regex: z.array(z.string().min(1)).min(1),
  description: z.string().optional(),
  enabled: z.boolean().optional()
});

const RuleSetSchema = z.object({
  version: z.string(),
  rules: z.array(RuleDefinitionSchema)
});

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;

export interface CompiledRule {
  name: string;
  category: EntityCategory;
  confidence: number;
  regex: RegExp[];
}

/**
 * Compile a rule definition. Patterns always get the global flag.
 */
export function compileRule(def: RuleDefinition): CompiledRule {
  return {
    name: def.name,
    category: def.category,
    confidence: def.confidence,
    regex: def.regex.map((source) => new RegExp(source, "g"))
  };
}

/**
 * Load and compile the bundled rule set.
 */
export function loadDefaultRules(): CompiledRule[] {
  const parsed = RuleSetSchema.parse(rulesJson);
  return parsed.rules.filter((r) => r.enabled !== false).map(compileRule);
}

function overlaps(span: DetectedSpan, claimed: DetectedSpan[]): boolean {
  return claimed.some((c) => span.start < c.end && c.start < span.end);
}

export class RuleDetector implements EntityDetector {
  readonly name = "rules";
  private readonly rules: CompiledRule[];

  constructor(rules: CompiledRule[] = loadDefaultRules()) {
    this.rules = rules;
  }

  async detect(
    text: string,
    _language: string,
    options: DetectOptions = {}
  ): Promise<DetectedSpan[]> {
    options.signal?.throwIfAborted();

    const spans: DetectedSpan[] = [];
    for (const rule of this.rules) {
      for (const regex of rule.regex) {
        // Clone regex to reset lastIndex for global patterns
        const re = new RegExp(regex.source, regex.flags);
        for (const match of text.matchAll(re)) {
          if (match.index === undefined || match[0].length === 0) continue;
          const start = match.index;
          const span: DetectedSpan = {
            start,
            end: start + match[0].length,
            category: rule.category,
            confidence: rule.confidence,
            source: rule.name
          };
          if (!overlaps(span, spans)) {
            spans.push(span);
          }
        }
      }
    }

    return spans.sort((a, b) => a.start - b.start || a.end - b.end);
  }
}
