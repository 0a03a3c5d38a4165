/**
 * Residue check - looks for personal data that no finding covers.
 *
 * Detection has false negatives. After sanitizing, the parts of the text
 * that were neither replaced nor deliberately kept are scanned with a few
 * broad patterns so that misses are reported instead of silently published.
 */

const RESIDUE_PATTERNS: Array<{ label: string; regex: RegExp }> = [
  { label: "email-like", regex: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi },
  { label: "phone-like", regex: /\+?\d[\d /-]{7,}\d/g },
  { label: "IBAN-like", regex: /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){3,}/g }
];

/**
 * Blank out reviewed spans so that only uncovered text is checked.
 */
export function maskSpans(
  text: string,
  spans: Array<{ start: number; end: number }>
): string {
  let result = text;
  for (const span of [...spans].sort((a, b) => b.start - a.start)) {
    result =
      result.slice(0, span.start) +
      " ".repeat(span.end - span.start) +
      result.slice(span.end);
  }
  return result;
}

/**
 * Check uncovered text for residual personal data.
 *
 * @returns One warning per pattern that matched, with the match count
 */
export function residueCheck(uncoveredText: string): string[] {
  const warnings: string[] = [];
  for (const { label, regex } of RESIDUE_PATTERNS) {
    const count = [...uncoveredText.matchAll(new RegExp(regex.source, regex.flags))]
      .length;
    if (count > 0) {
      warnings.push(
        `${count} ${label} string${count === 1 ? "" : "s"} not covered by any finding. Review sanitized output.`
      );
    }
  }
  return warnings;
}
