import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { hasField, isRecord } from "../utils/typeGuards.js";
import { FIELD_KINDS, type FieldKind } from "./types.js";

export type SchemaField = Readonly<{
  name: string;
  kind: FieldKind;
  /** Case-insensitive key matcher for prose extraction (flags `gi`). */
  keyPattern: RegExp;
  validator: z.ZodType<unknown>;
}>;

export type Schema = Readonly<{
  fields: readonly SchemaField[];
}>;

export type FieldDeclaration = { name: string; kind: FieldKind };

/** Type names accepted in a schema definition and the kind each maps to. */
export const TYPE_NAMES: Readonly<Record<string, FieldKind>> = Object.freeze({
  str: "string",
  int: "integer",
  float: "float",
  bool: "boolean",
  list: "list",
  dict: "dict",
  any: "any",
});

export const KIND_LABELS: Readonly<Record<FieldKind, string>> = Object.freeze({
  string: "a string",
  integer: "an integer",
  float: "a number",
  boolean: "a boolean",
  list: "a list",
  dict: "an object",
  any: "a value",
});

const INTEGER_TEXT = /^[-+]?\d+$/;
const FLOAT_TEXT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const TRUE_WORDS = new Set(["true", "t", "yes", "y", "on", "1"]);
const FALSE_WORDS = new Set(["false", "f", "no", "n", "off", "0"]);

const looseBoolean = z.union([
  z.boolean(),
  z
    .number()
    .refine((n) => n === 0 || n === 1)
    .transform((n) => n === 1),
  z.string().transform((text, ctx) => {
    const word = text.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a boolean word" });
    return z.NEVER;
  }),
]);

function validatorFor(kind: FieldKind): z.ZodType<unknown> {
  switch (kind) {
    case "string":
      return z.string();
    case "integer":
      return z.union([
        z.number().int().safe(),
        z
          .string()
          .trim()
          .regex(INTEGER_TEXT)
          .transform((text) => Number.parseInt(text, 10))
          .refine((n) => Number.isSafeInteger(n)),
      ]);
    case "float":
      return z.union([
        z.number().finite(),
        z
          .string()
          .trim()
          .regex(FLOAT_TEXT)
          .transform((text) => Number(text)),
      ]);
    case "boolean":
      return looseBoolean;
    case "list":
      return z.array(z.unknown());
    case "dict":
      return z.record(z.unknown());
    case "any":
      return z.unknown();
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `user_name`, `user-name` and `User Name` all match the same key, quoted or
 * not, followed by an optional `:` or `=`.
 */
export function buildKeyPattern(name: string): RegExp {
  const words = name.split(/[\s_-]+/).filter((word) => word.length > 0);
  const body = words.length > 0 ? words.map(escapeRegExp).join("[\\s_-]*") : escapeRegExp(name);
  return new RegExp(`["']?${body}["']?\\s*[:=]?`, "gi");
}

export function createSchema(declarations: readonly FieldDeclaration[]): Schema {
  if (declarations.length === 0) {
    throw new SchemaDefinitionError("A schema needs at least one field.");
  }
  const seen = new Set<string>();
  const fields = declarations.map(({ name, kind }) => {
    if (!name.trim()) {
      throw new SchemaDefinitionError("Field names must be non-empty.");
    }
    if (seen.has(name)) {
      throw new SchemaDefinitionError(`Duplicate field name: ${name}`);
    }
    if (!FIELD_KINDS.includes(kind)) {
      throw new SchemaDefinitionError(`Unknown field kind for ${name}: ${String(kind)}`);
    }
    seen.add(name);
    return Object.freeze({
      name,
      kind,
      keyPattern: buildKeyPattern(name),
      validator: validatorFor(kind),
    });
  });
  return Object.freeze({ fields: Object.freeze(fields) });
}

export function kindForTypeName(typeName: string): FieldKind {
  const key = typeName.trim().toLowerCase();
  return hasField(TYPE_NAMES, key) ? TYPE_NAMES[key] : "any";
}

/**
 * Reads a `{ field: typeName }` map (JSON text or an already-decoded value).
 * Unrecognized type names fall back to `any`.
 */
export function parseSchemaDefinition(definition: unknown): FieldDeclaration[] {
  let decoded = definition;
  if (typeof definition === "string") {
    try {
      decoded = JSON.parse(definition) as unknown;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaDefinitionError(`Schema definition is not valid JSON: ${message}`);
    }
  }
  if (!isRecord(decoded)) {
    throw new SchemaDefinitionError("The schema definition must be a JSON object.");
  }
  return Object.entries(decoded).map(([name, typeName]) => {
    if (typeof typeName !== "string") {
      throw new SchemaDefinitionError(
        `Type for field "${name}" must be a string such as "str" or "int".`,
      );
    }
    return { name, kind: kindForTypeName(typeName) };
  });
}

export function schemaFromDefinition(definition: unknown): Schema {
  return createSchema(parseSchemaDefinition(definition));
}

export function describeSchema(schema: Schema): Record<string, FieldKind> {
  return Object.fromEntries(schema.fields.map((field) => [field.name, field.kind]));
}
