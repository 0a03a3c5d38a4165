import type { DetectorConfig } from "@talkguard/core";
import { CompositeDetector } from "./composite";
import { PresidioDetector } from "./presidio";
import { RuleDetector } from "./rules";
import type { EntityDetector } from "./types";

/**
 * Build the detector selected in configuration.
 *
 * `composite` pairs the Presidio analyzer (names, organizations, places)
 * with the bundled rules (structured identifiers).
 */
export function createDetector(config: DetectorConfig): EntityDetector {
  switch (config.provider) {
    case "rules":
      return new RuleDetector();
    case "presidio":
      return new PresidioDetector({ baseUrl: config.presidioUrl });
    case "composite":
      return new CompositeDetector([
        new PresidioDetector({ baseUrl: config.presidioUrl }),
        new RuleDetector()
      ]);
  }
}
