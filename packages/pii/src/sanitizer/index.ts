export { sanitizeDocument, type SanitizeInput } from "./sanitizer";
export { maskSpans, residueCheck } from "./residue";
export { highlightSegments, type HighlightSegment } from "./highlight";
