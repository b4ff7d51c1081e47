import { DEFAULT_PATTERNS, type ParserPatterns } from "./patterns.js";

/**
 * Narrows raw text to the span most likely to hold the JSON payload: the
 * interior of the first fenced block, else the first `{` through the last
 * `}`, else the text unchanged.
 */
export function isolateCandidate(raw: string, patterns: ParserPatterns = DEFAULT_PATTERNS): string {
  const fenced = patterns.fencedBlock.exec(raw);
  if (fenced) return fenced[1] ?? "";

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start !== -1 && end > start) return raw.slice(start, end + 1);
  return raw;
}
