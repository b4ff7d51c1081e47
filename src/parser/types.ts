export const FIELD_KINDS = [
  "string",
  "integer",
  "float",
  "boolean",
  "list",
  "dict",
  "any",
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

export type ScalarKind = Extract<FieldKind, "string" | "integer" | "float" | "boolean">;

/** Output of a successful parse: exactly the schema's fields, converted. */
export type ValidatedRecord = Record<string, unknown>;

export type KeyMatchPolicy = "first" | "last";

export type ParseLayer = "structural" | "semantic";

export type ParseOutcome = {
  record: ValidatedRecord;
  layer: ParseLayer;
  /** True when the structural layer only decoded after bracket repair. */
  repaired: boolean;
};
