/**
 * Regular expressions shared by every parse. Built once per parser and
 * frozen; global patterns are only used through `replace`/`matchAll`, which
 * never leave `lastIndex` behind.
 */
export type ParserPatterns = Readonly<{
  fencedBlock: RegExp;
  comments: RegExp;
  smartQuotes: RegExp;
  numberLiteral: RegExp;
  quotedString: RegExp;
  booleanLiteral: RegExp;
  bareToken: RegExp;
  trailingPunctuation: RegExp;
}>;

export function createParserPatterns(): ParserPatterns {
  return Object.freeze({
    fencedBlock: /```(?:json)?\s*\n([\s\S]*?)\n\s*```/,
    comments: /\/\/.*?$|\/\*[\s\S]*?\*\//gm,
    smartQuotes: /[“”]/g,
    numberLiteral: /^[-+]?\d+(?:\.\d+)?/,
    quotedString: /^["'](.*?)["']/,
    booleanLiteral: /^(true|false)/i,
    bareToken: /^[^\s,}\]]+/,
    trailingPunctuation: /[.,;/\\]+$/,
  });
}

export const DEFAULT_PATTERNS = createParserPatterns();
