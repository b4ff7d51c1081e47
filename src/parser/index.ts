export { RecordParser, type RecordParserOptions, type RepairReport } from "./parser.js";
export {
  createSchema,
  schemaFromDefinition,
  parseSchemaDefinition,
  describeSchema,
  kindForTypeName,
  TYPE_NAMES,
  type Schema,
  type SchemaField,
  type FieldDeclaration,
} from "./schema.js";
export { isolateCandidate } from "./isolate.js";
export { normalizeCandidate, replaceSmartQuotes } from "./normalize.js";
export { repairTruncatedJson, decodeJson, type DecodedJson } from "./repair.js";
export { healRecord, validateRecord, healAndValidate, FLATTEN_KEYS } from "./heal.js";
export { extractSemantic } from "./semantic.js";
export type { Result } from "./result.js";
export {
  FIELD_KINDS,
  type FieldKind,
  type KeyMatchPolicy,
  type ParseLayer,
  type ParseOutcome,
  type ValidatedRecord,
} from "./types.js";
export { ParsingError, EmptyInputError, SchemaDefinitionError } from "../errors.js";
