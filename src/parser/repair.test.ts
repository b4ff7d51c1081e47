import { describe, expect, it } from "vitest";
import { decodeJson, repairTruncatedJson } from "./repair.js";

describe("repairTruncatedJson", () => {
  it("closes an open array and object", () => {
    expect(repairTruncatedJson('{"a": 1, "b": [1,2')).toBe('{"a": 1, "b": [1,2]}');
  });

  it("closes nested objects", () => {
    expect(repairTruncatedJson('{"a": [1, 2, 3], "b": {"c": 4')).toBe(
      '{"a": [1, 2, 3], "b": {"c": 4}}',
    );
  });

  it("drops trailing text after the last anchor character", () => {
    expect(repairTruncatedJson('{"a": [1, 2 and then')).toBe('{"a": [1, 2]}');
  });

  it("appends brackets before braces", () => {
    expect(repairTruncatedJson('{"a": {"b": [')).toBe('{"a": {"b": []}}');
  });

  it("leaves text without anchors alone", () => {
    expect(repairTruncatedJson("abc")).toBe("abc");
  });

  it("does not add closers when already balanced", () => {
    expect(repairTruncatedJson('{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("decodeJson", () => {
  it("decodes valid JSON without repair", () => {
    const result = decodeJson('{"a": 1}');
    expect(result).toEqual({ ok: true, value: { value: { a: 1 }, text: '{"a": 1}', repaired: false } });
  });

  it("decodes truncated JSON after repair", () => {
    const result = decodeJson('{"a": 1, "b": [1,2');
    expect(result).toEqual({
      ok: true,
      value: { value: { a: 1, b: [1, 2] }, text: '{"a": 1, "b": [1,2]}', repaired: true },
    });
  });

  it("reports failure when repair does not help", () => {
    const result = decodeJson("not json at all");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^Invalid JSON after repair: /);
  });
});
