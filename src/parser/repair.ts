import { errorMessage } from "../errors.js";
import { err, ok, type Result } from "./result.js";

const TRUNCATION_ANCHORS = "{}[]\"',0123456789";

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count += 1;
  }
  return count;
}

/**
 * Drops whatever follows the last structural character, digit or quote,
 * then closes unbalanced brackets followed by unbalanced braces. Single pass;
 * string contents are not tracked.
 */
export function repairTruncatedJson(text: string): string {
  let truncated = text;
  for (let i = text.length - 1; i >= 0; i -= 1) {
    if (TRUNCATION_ANCHORS.includes(text.charAt(i))) {
      truncated = text.slice(0, i + 1);
      break;
    }
  }

  const openBraces = countChar(truncated, "{") - countChar(truncated, "}");
  const openBrackets = countChar(truncated, "[") - countChar(truncated, "]");
  return `${truncated}${"]".repeat(Math.max(0, openBrackets))}${"}".repeat(Math.max(0, openBraces))}`;
}

export type DecodedJson = {
  value: unknown;
  /** Text that was finally decoded. */
  text: string;
  repaired: boolean;
};

function tryDecode(text: string): Result<unknown> {
  try {
    return ok(JSON.parse(text) as unknown);
  } catch (error) {
    return err(errorMessage(error));
  }
}

/** Decodes `text`, retrying once on the repaired form. */
export function decodeJson(text: string): Result<DecodedJson> {
  const direct = tryDecode(text);
  if (direct.ok) return ok({ value: direct.value, text, repaired: false });

  const repairedText = repairTruncatedJson(text);
  const repaired = tryDecode(repairedText);
  if (repaired.ok) return ok({ value: repaired.value, text: repairedText, repaired: true });
  return err(`Invalid JSON after repair: ${repaired.error}`);
}
