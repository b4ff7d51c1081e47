import { describe, expect, it } from "vitest";
import { isolateCandidate } from "./isolate.js";

describe("isolateCandidate", () => {
  it("returns the interior of a json fenced block", () => {
    const raw = 'Here:\n```json\n{"a": 1}\n```\nDone.';
    expect(isolateCandidate(raw)).toBe('{"a": 1}');
  });

  it("accepts fences without a language tag", () => {
    expect(isolateCandidate('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("prefers a fenced block over bare braces earlier in the text", () => {
    const raw = 'prefix {"x":0} ```json\n{"a":1}\n```';
    expect(isolateCandidate(raw)).toBe('{"a":1}');
  });

  it("slices from the first { to the last }", () => {
    expect(isolateCandidate('Result: {"a": 1} thanks')).toBe('{"a": 1}');
    expect(isolateCandidate('x {"a": {"b": 2}} y {"c": 3} z')).toBe('{"a": {"b": 2}} y {"c": 3}');
  });

  it("passes text through when no span is found", () => {
    expect(isolateCandidate("plain text")).toBe("plain text");
    expect(isolateCandidate("} oops {")).toBe("} oops {");
    expect(isolateCandidate('{"a": [1, 2')).toBe('{"a": [1, 2');
  });
});
