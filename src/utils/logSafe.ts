import { isRecord } from "./typeGuards.js";

const SECRET_KEY_FRAGMENTS = ["token", "apikey", "api_key", "secret", "password", "authorization"];

const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /sk-[A-Za-z0-9_-]{8,}/g, replacement: "sk-[redacted]" },
  { pattern: /Bearer\s+[A-Za-z0-9._-]+/gi, replacement: "Bearer [redacted]" },
  {
    pattern: /(api_key|access_token|password|secret)\s*[=:]\s*[^\s,]+/gi,
    replacement: "$1=[redacted]",
  },
];

export const MAX_LOGGED_CHARS = 500;

export function redactString(input: string): string {
  return SECRET_PATTERNS.reduce(
    (out, { pattern, replacement }) => out.replace(pattern, replacement),
    input,
  );
}

/**
 * Parsed payloads are arbitrary model output, so anything that reaches the
 * log is clipped as well as redacted.
 */
export function clipForLog(input: string, maxChars = MAX_LOGGED_CHARS): string {
  const redacted = redactString(input);
  if (redacted.length <= maxChars) return redacted;
  return `${redacted.slice(0, maxChars)}… (+${redacted.length - maxChars} chars)`;
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string") return clipForLog(value);
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (!isRecord(value)) return value;
  return sanitizeRecord(value);
}

function sanitizeRecord(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lower = key.toLowerCase();
    out[key] = SECRET_KEY_FRAGMENTS.some((frag) => lower.includes(frag))
      ? "[redacted]"
      : sanitizeValue(entry);
  }
  return out;
}

export function sanitizeMeta(
  meta?: Record<string, unknown>,
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  return sanitizeRecord(meta);
}
