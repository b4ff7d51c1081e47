import { describe, expect, it } from "vitest";
import { normalizeCandidate, replaceSmartQuotes } from "./normalize.js";

describe("normalizeCandidate", () => {
  it("turns curly double quotes into ASCII quotes", () => {
    expect(replaceSmartQuotes("{“a”: “b”}")).toBe('{"a": "b"}');
    expect(normalizeCandidate("{“a”: “b”}")).toBe('{"a": "b"}');
  });

  it("removes line comments up to the end of the line", () => {
    expect(normalizeCandidate('{"a": 1, // note\n"b": 2}')).toBe('{"a": 1, \n"b": 2}');
  });

  it("removes block comments spanning lines", () => {
    expect(normalizeCandidate('{"a": /* one\ntwo */ 1}')).toBe('{"a":  1}');
  });

  it("is idempotent", () => {
    const samples = [
      '{"a": 1, // trailing\n/* block */ "b": “x”}',
      "no comments here",
      '{\n  "user": "Alice" // who\n}',
    ];
    for (const sample of samples) {
      const once = normalizeCandidate(sample);
      expect(normalizeCandidate(once)).toBe(once);
    }
  });

  it("leaves text without comments or curly quotes untouched", () => {
    expect(normalizeCandidate('{"a": "b"}')).toBe('{"a": "b"}');
  });
});
