import { hasField, isRecord, setField } from "../utils/typeGuards.js";
import { KIND_LABELS, type Schema } from "./schema.js";
import { err, ok, type Result } from "./result.js";
import type { FieldKind, ValidatedRecord } from "./types.js";

/** Inner keys tried, in order, when a scalar field arrives as an object. */
export const FLATTEN_KEYS = [
  "value",
  "data",
  "text",
  "result",
  "overall",
  "type",
  "sentiment",
  "name",
] as const;

const SCALAR_KINDS: ReadonlySet<FieldKind> = new Set(["string", "integer", "float", "boolean"]);
const INTEGER_FRAGMENT = /[-+]?\d+/;

function flattenNested(value: Record<string, unknown>): unknown {
  const key = FLATTEN_KEYS.find((candidate) => hasField(value, candidate));
  return key === undefined ? value : value[key];
}

function textForm(value: unknown): string {
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

function coerceInteger(value: unknown): unknown {
  const match = INTEGER_FRAGMENT.exec(textForm(value));
  if (!match) return value;
  const parsed = Number.parseInt(match[0], 10);
  return Number.isSafeInteger(parsed) ? parsed : value;
}

/**
 * Best-effort per-field repair ahead of validation. Fields the schema does
 * not declare, and declared fields that are absent, pass through untouched.
 */
export function healRecord(data: Record<string, unknown>, schema: Schema): Record<string, unknown> {
  const healed: Record<string, unknown> = { ...data };
  for (const field of schema.fields) {
    if (!hasField(healed, field.name)) continue;
    let value = healed[field.name];
    if (SCALAR_KINDS.has(field.kind) && isRecord(value)) {
      value = flattenNested(value);
    }
    if (field.kind === "integer" && !Number.isInteger(value)) {
      value = coerceInteger(value);
    }
    setField(healed, field.name, value);
  }
  return healed;
}

/** All-or-nothing: every declared field present and convertible to its kind. */
export function validateRecord(data: Record<string, unknown>, schema: Schema): Result<ValidatedRecord> {
  const record: ValidatedRecord = {};
  const problems: string[] = [];
  for (const field of schema.fields) {
    if (!hasField(data, field.name)) {
      problems.push(`${field.name} (field required)`);
      continue;
    }
    const parsed = field.validator.safeParse(data[field.name]);
    if (parsed.success) {
      setField(record, field.name, parsed.data);
    } else {
      problems.push(`${field.name} (expected ${KIND_LABELS[field.kind]})`);
    }
  }
  if (problems.length > 0) {
    return err(`Validation failed for ${problems.length} field(s): ${problems.join(", ")}`);
  }
  return ok(record);
}

/** Validates as-is first; heals and validates again only on failure. */
export function healAndValidate(data: Record<string, unknown>, schema: Schema): Result<ValidatedRecord> {
  const direct = validateRecord(data, schema);
  if (direct.ok) return direct;
  return validateRecord(healRecord(data, schema), schema);
}
