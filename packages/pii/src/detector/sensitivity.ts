/**
 * Category profiles shown to reviewers: how sensitive a category is and
 * what to check before deciding.
 */

import type {
  EntityCategory,
  SensitivityLevel
} from "../types/entities";
import type { FindingRecord } from "../types/review";

export interface CategoryProfile {
  sensitivity: SensitivityLevel;
  description: string;
  suggestion: string;
}

export const CATEGORY_PROFILES: Record<EntityCategory, CategoryProfile> = {
  PERSON: {
    sensitivity: "medium",
    description: "Person name",
    suggestion: "Check whether this is a private individual"
  },
  ORG: {
    sensitivity: "low",
    description: "Organization",
    suggestion: "Usually public; redact if it identifies a person"
  },
  LOCATION: {
    sensitivity: "low",
    description: "Location",
    suggestion: "Check whether this is a private address"
  },
  EMAIL: {
    sensitivity: "high",
    description: "E-mail address",
    suggestion: "Check and anonymize if personal"
  },
  PHONE: {
    sensitivity: "high",
    description: "Phone number",
    suggestion: "Check and anonymize if personal"
  },
  ID_NUMBER: {
    sensitivity: "critical",
    description: "Identification or account number",
    suggestion: "Remove"
  },
  DATE: {
    sensitivity: "low",
    description: "Date",
    suggestion: "Redact if it is a birth date or otherwise personal"
  },
  MISC: {
    sensitivity: "low",
    description: "Other potentially personal data",
    suggestion: "Check context"
  }
};

/**
 * Reviewer hints for a set of findings.
 */
export function recommendationsFor(
  findings: Pick<FindingRecord, "category" | "sensitivity">[]
): string[] {
  if (findings.length === 0) {
    return ["No personal data detected"];
  }

  const recommendations: string[] = [];

  if (findings.some((f) => f.sensitivity === "critical")) {
    recommendations.push("Remove identification and account numbers");
  }
  if (findings.some((f) => f.category === "EMAIL" || f.category === "PHONE")) {
    recommendations.push("Check contact data and anonymize where personal");
  }
  if (findings.some((f) => f.category === "PERSON")) {
    recommendations.push("Check person names for relevance and anonymize where needed");
  }
  if (recommendations.length === 0) {
    recommendations.push("Review the flagged spans before publishing");
  }

  return recommendations;
}
