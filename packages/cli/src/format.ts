/**
 * Terminal formatting for CLI output.
 */

import pc from "picocolors";
import type { Decision, DecisionResponse, Finding, ScanResponse } from "./client";

export type Colors = ReturnType<typeof pc.createColors>;

function sensitivityColor(colors: Colors, sensitivity: Finding["sensitivity"]): (s: string) => string {
  switch (sensitivity) {
    case "critical":
      return (s) => colors.bold(colors.red(s));
    case "high":
      return colors.red;
    case "medium":
      return colors.yellow;
    case "low":
      return colors.gray;
  }
}

export function statusLabel(colors: Colors, status: Decision["status"]): string {
  switch (status) {
    case "PENDING":
      return colors.yellow(status);
    case "ACCEPTED_REDACT":
      return colors.red(status);
    case "ACCEPTED_KEEP":
      return colors.green(status);
    case "EDITED":
      return colors.cyan(status);
  }
}

export function formatScan(colors: Colors, result: ScanResponse): string[] {
  if (result.status === "detection_unavailable") {
    return [
      `${colors.red("✗")} ${result.document_id} not scanned: ${result.reason}`,
      colors.gray("  Nothing was stored; retry once the detector is available.")
    ];
  }

  const lines = [
    `${colors.green("✓")} ${result.document_id} scanned with ${result.detector} ` +
      colors.gray(`(version ${result.version})`),
    `  ${result.created.length} new, ${result.extended.length} linked to known entities, ` +
      `${colors.bold(String(result.pending_count))} pending in talk ${result.talk_id}`
  ];
  if (result.skipped_overlaps > 0) {
    lines.push(colors.yellow(`  ${result.skipped_overlaps} span(s) skipped: overlap earlier findings`));
  }
  for (const dropped of result.dropped_overlaps) {
    lines.push(
      colors.yellow(
        `  ${dropped.category} "${dropped.text}" (${dropped.start}-${dropped.end}) dropped: overlaps a stronger finding`
      )
    );
  }
  for (const ambiguous of result.ambiguous) {
    lines.push(
      colors.yellow(
        `  "${ambiguous.text}" could be ${ambiguous.entity_ids.join(" or ")}; kept apart as ${ambiguous.created_entity_id}`
      )
    );
  }
  return lines;
}

export function formatFinding(colors: Colors, finding: Finding): string {
  const color = sensitivityColor(colors, finding.sensitivity);
  return (
    `${colors.blue(finding.entity_id.padEnd(8))} ` +
    `${finding.category.padEnd(10)} ` +
    `${color(finding.sensitivity.padEnd(8))} ` +
    `"${finding.sample_occurrence_text}" ` +
    colors.gray(`x${finding.occurrence_count} (${finding.confidence.toFixed(2)})`)
  );
}

export function formatDecision(colors: Colors, decision: Decision): string {
  const replacement =
    decision.resolved_replacement !== null ? ` -> "${decision.resolved_replacement}"` : "";
  const supersedes = decision.supersedes ? colors.gray(` (supersedes ${decision.supersedes})`) : "";
  const note = decision.reviewer_note ? colors.gray(` # ${decision.reviewer_note}`) : "";
  return (
    `${colors.gray(decision.decision_id.padEnd(7))} ` +
    `${colors.gray(decision.decided_at)} ` +
    `${colors.blue(decision.entity_id)} ` +
    `${statusLabel(colors, decision.status)}${replacement}${supersedes}${note}`
  );
}

export function formatOutcome(colors: Colors, outcome: DecisionResponse): string[] {
  const lines = [formatDecision(colors, outcome.recorded)];
  if (!outcome.applied) {
    lines.push(
      colors.yellow(
        `  Kept for audit only: ${outcome.current.decision_id} has a later timestamp and stays current`
      )
    );
  }
  return lines;
}
