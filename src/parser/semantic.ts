import { replaceSmartQuotes } from "./normalize.js";
import { DEFAULT_PATTERNS, type ParserPatterns } from "./patterns.js";
import { err, ok, type Result } from "./result.js";
import type { Schema, SchemaField } from "./schema.js";
import type { KeyMatchPolicy } from "./types.js";
import { setField } from "../utils/typeGuards.js";

const DECIMAL_TEXT = /^[-+]?\d+\.\d+$/;

/** Value shapes tried in order right after a key: number, quoted, boolean, bare token. */
function captureValue(area: string, patterns: ParserPatterns): string | undefined {
  const number = patterns.numberLiteral.exec(area);
  if (number) return number[0];
  const quoted = patterns.quotedString.exec(area);
  if (quoted) return quoted[1] ?? "";
  const bool = patterns.booleanLiteral.exec(area);
  if (bool) return bool[0].toLowerCase();
  const bare = patterns.bareToken.exec(area);
  return bare ? bare[0] : undefined;
}

function extractField(
  text: string,
  field: SchemaField,
  patterns: ParserPatterns,
  policy: KeyMatchPolicy,
): string | undefined {
  let found: string | undefined;
  for (const match of text.matchAll(field.keyPattern)) {
    const start = (match.index ?? 0) + match[0].length;
    const captured = captureValue(text.slice(start).trimStart(), patterns);
    if (captured === undefined) continue;
    found = captured.replace(patterns.trailingPunctuation, "");
    if (policy === "first") break;
  }
  return found;
}

/**
 * Scrapes `key: value` style pairs straight from prose. Every value comes
 * back as a string; conversion is left to validation, except that decimal
 * captures for integer fields are rounded here.
 */
export function extractSemantic(
  raw: string,
  schema: Schema,
  opts: { patterns?: ParserPatterns; keyMatch?: KeyMatchPolicy } = {},
): Result<Record<string, string>> {
  const patterns = opts.patterns ?? DEFAULT_PATTERNS;
  const policy = opts.keyMatch ?? "first";
  const text = replaceSmartQuotes(raw, patterns);

  const extracted: Record<string, string> = {};
  for (const field of schema.fields) {
    const value = extractField(text, field, patterns, policy);
    if (value === undefined) continue;
    setField(
      extracted,
      field.name,
      field.kind === "integer" && DECIMAL_TEXT.test(value)
        ? String(Math.round(Number(value)))
        : value,
    );
  }

  if (Object.keys(extracted).length === 0) {
    return err("Semantic layer could not extract any fields (no fields extractable).");
  }
  return ok(extracted);
}
