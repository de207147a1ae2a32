import { describe, expect, it } from "vitest";
import { ParseError } from "../src/core/errors.js";
import { candidateSpans, extractPayload, isJsonObject } from "../src/core/response_parser.js";

describe("extractPayload", () => {
  it("parses a bare JSON document", () => {
    expect(extractPayload('{"a":1}')).toEqual({ a: 1 });
    expect(extractPayload("  [1, 2, 3]\n")).toEqual([1, 2, 3]);
  });

  it("drops code fences and the prose around them", () => {
    const text = 'Sure! Here it is:\n```json\n{"a": [1, 2]}\n```\nThanks for asking.';
    expect(extractPayload(text)).toEqual({ a: [1, 2] });
  });

  it("accepts tilde fences and a leading byte-order mark", () => {
    expect(extractPayload("~~~\n[1, 2]\n~~~")).toEqual([1, 2]);
    expect(extractPayload("\uFEFF{\"x\": true}")).toEqual({ x: true });
  });

  it("ignores delimiters inside strings", () => {
    const text = 'Result: {"text": "use } and { freely", "n": 2} done';
    expect(extractPayload(text)).toEqual({ text: "use } and { freely", n: 2 });
  });

  it("handles escaped quotes inside strings", () => {
    const text = String.raw`Answer {"q": "say \"hi\" {now}"} end`;
    expect(extractPayload(text)).toEqual({ q: 'say "hi" {now}' });
  });

  it("prefers the outermost payload", () => {
    expect(extractPayload('x {"outer": {"inner": 1}} y')).toEqual({ outer: { inner: 1 } });
  });

  it("falls back to a later span when the outer one is not JSON", () => {
    expect(extractPayload('note {not json, but {"ok": true}}')).toEqual({ ok: true });
  });

  it("throws ParseError carrying the raw text when nothing parses", () => {
    const text = "I could not produce the page this time.";
    let caught: unknown;
    try {
      extractPayload(text);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ kind: "no_structured_payload", rawText: text });
  });

  it("does not take a bare scalar for a payload", () => {
    for (const text of ["42", '"Sorry, I cannot help."', "null", "true", "```json\n7\n```"]) {
      expect(() => extractPayload(text)).toThrow(ParseError);
    }
  });

  it("keeps scanning past a scalar document for a structured span", () => {
    expect(extractPayload('"[1, 2]"')).toEqual([1, 2]);
  });

  it("rejects unbalanced payloads", () => {
    expect(() => extractPayload('{"a": 1')).toThrow(ParseError);
    expect(() => extractPayload("")).toThrow(ParseError);
  });
});

describe("candidateSpans", () => {
  it("lists balanced spans by opening position", () => {
    expect(candidateSpans('a [1] b {"c": [2]}')).toEqual(["[1]", '{"c": [2]}', "[2]"]);
  });

  it("skips spans with mismatched closers", () => {
    expect(candidateSpans("{ ] }")).toEqual([]);
  });
});

describe("isJsonObject", () => {
  it("accepts mappings only", () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject([1])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("x")).toBe(false);
    expect(isJsonObject(undefined)).toBe(false);
  });
});
