import { DEFAULT_PATTERNS, type ParserPatterns } from "./patterns.js";

export function replaceSmartQuotes(text: string, patterns: ParserPatterns = DEFAULT_PATTERNS): string {
  return text.replace(patterns.smartQuotes, '"');
}

/** Curly quotes to ASCII, `//` and `/* *\/` comments removed. */
export function normalizeCandidate(text: string, patterns: ParserPatterns = DEFAULT_PATTERNS): string {
  return replaceSmartQuotes(text, patterns).replace(patterns.comments, "");
}
