import { describe, expect, it } from "vitest";
import { SchemaDefinitionError } from "../errors.js";
import {
  buildKeyPattern,
  createSchema,
  describeSchema,
  kindForTypeName,
  schemaFromDefinition,
} from "./schema.js";

describe("schemaFromDefinition", () => {
  it("maps type names to field kinds, case-insensitively", () => {
    const schema = schemaFromDefinition('{"name": "str", "age": "INT", "score": "float", "ok": "bool"}');
    expect(describeSchema(schema)).toEqual({
      name: "string",
      age: "integer",
      score: "float",
      ok: "boolean",
    });
  });

  it("accepts an already-decoded object and keeps field order", () => {
    const schema = schemaFromDefinition({ tags: "list", meta: "dict", extra: "any" });
    expect(schema.fields.map((field) => field.name)).toEqual(["tags", "meta", "extra"]);
    expect(schema.fields.map((field) => field.kind)).toEqual(["list", "dict", "any"]);
  });

  it("treats unknown type names as any", () => {
    expect(kindForTypeName("datetime")).toBe("any");
    expect(kindForTypeName("constructor")).toBe("any");
    expect(describeSchema(schemaFromDefinition({ when: "datetime" }))).toEqual({ when: "any" });
  });

  it("rejects definitions that are not JSON objects", () => {
    expect(() => schemaFromDefinition("[1, 2]")).toThrow(
      new SchemaDefinitionError("The schema definition must be a JSON object."),
    );
    expect(() => schemaFromDefinition(42)).toThrow(SchemaDefinitionError);
  });

  it("rejects invalid JSON", () => {
    expect(() => schemaFromDefinition("{bad")).toThrow(/^Schema definition is not valid JSON: /);
  });

  it("rejects non-string type names", () => {
    expect(() => schemaFromDefinition({ a: 1 })).toThrow(
      'Type for field "a" must be a string such as "str" or "int".',
    );
  });

  it("rejects an empty map", () => {
    expect(() => schemaFromDefinition("{}")).toThrow("A schema needs at least one field.");
  });
});

describe("createSchema", () => {
  it("rejects duplicate and blank names", () => {
    expect(() =>
      createSchema([
        { name: "a", kind: "string" },
        { name: "a", kind: "integer" },
      ]),
    ).toThrow("Duplicate field name: a");
    expect(() => createSchema([{ name: "  ", kind: "string" }])).toThrow(
      "Field names must be non-empty.",
    );
  });

  it("returns a frozen schema", () => {
    const schema = createSchema([{ name: "a", kind: "string" }]);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
  });
});

describe("buildKeyPattern", () => {
  it("matches underscores, hyphens and spaces interchangeably", () => {
    const pattern = buildKeyPattern("user_name");
    expect("User-Name: x".match(pattern)?.[0]).toBe("User-Name:");
    expect("user name = 3".match(pattern)?.[0]).toBe("user name =");
    expect('{"user_name": "a"}'.match(pattern)?.[0]).toBe('"user_name":');
  });

  it("escapes regular expression characters in names", () => {
    const pattern = buildKeyPattern("price($)");
    expect("price($): 4".match(pattern)?.[0]).toBe("price($):");
    expect("priceX: 4".match(pattern)).toBeNull();
  });
});
