/**
 * Response Parser Tests
 *
 * Fence stripping, JSON decoding and the lenient field schemas.
 */

import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  booleanField,
  clamp,
  integerField,
  objectListField,
  parseModelJson,
  parseResponse,
  scoreField,
  stringListField,
  stripCodeFences,
  textField,
} from "@/lib/analyzer/response-parser";
import { ParseError } from "@/lib/error-classification";

describe("stripCodeFences", () => {
  it("removes a ```json fence", () => {
    expect(stripCodeFences('```json\n{"score": 0.8}\n```')).toBe('{"score": 0.8}');
  });

  it("removes a bare ``` fence", () => {
    expect(stripCodeFences('```\n{"score": 0.8}\n```')).toBe('{"score": 0.8}');
  });

  it("trims unfenced text", () => {
    expect(stripCodeFences('  {"score": 0.8}\n')).toBe('{"score": 0.8}');
  });

  it("removes fences with other language tags", () => {
    expect(stripCodeFences('```JSON\n{"score": 0.9}\n```')).toBe('{"score": 0.9}');
    expect(stripCodeFences('```javascript\n{"score": 0.9}\n```')).toBe('{"score": 0.9}');
    expect(stripCodeFences('```json \r\n{"score": 0.9}\r\n```')).toBe('{"score": 0.9}');
  });

  it("handles an opening fence without a closing one", () => {
    expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("parseModelJson", () => {
  it("decodes fenced, bare-fenced and unfenced JSON to the same object", () => {
    const expected = { score: 0.8, flags: [1, 2] };
    const body = JSON.stringify(expected);
    for (const raw of ["```json\n" + body + "\n```", "```\n" + body + "\n```", body]) {
      const parsed = parseModelJson(raw);
      expect(parsed.ok).toBe(true);
      if (parsed.ok) expect(parsed.value).toEqual(expected);
    }
  });

  it("reports invalid JSON as ParseError", () => {
    const parsed = parseModelJson("not json at all");
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error).toBeInstanceOf(ParseError);
      expect(parsed.error.message).toMatch(/^Invalid JSON: /);
    }
  });

  it.each([
    ["[1, 2]", "array"],
    ["null", "null"],
    ["42", "number"],
    ['"text"', "string"],
  ])("rejects top-level %s", (raw, kind) => {
    const parsed = parseModelJson(raw);
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) expect(parsed.error.message).toBe(`Expected a JSON object, got ${kind}`);
  });
});

describe("field schemas", () => {
  it("clamp bounds values into [0, 1] by default", () => {
    expect(clamp(1.7)).toBe(1);
    expect(clamp(-0.2)).toBe(0);
    expect(clamp(0.4)).toBe(0.4);
    expect(clamp(9, 1, 5)).toBe(5);
  });

  it("scoreField clamps, accepts numeric strings and defaults when missing", () => {
    const field = scoreField(0.5);
    expect(field.parse(1.5)).toBe(1);
    expect(field.parse(-3)).toBe(0);
    expect(field.parse("0.75")).toBe(0.75);
    expect(field.parse(undefined)).toBe(0.5);
  });

  it("scoreField maps booleans to 1/0 and clamps infinite values", () => {
    const field = scoreField(0.5);
    expect(field.parse(true)).toBe(1);
    expect(field.parse(false)).toBe(0);
    expect(field.parse(Infinity)).toBe(1);
    expect(field.parse(-Infinity)).toBe(0);
  });

  it("scoreField rejects null and non-numeric strings", () => {
    const field = scoreField(0.5);
    expect(field.safeParse(null).success).toBe(false);
    expect(field.safeParse("high").success).toBe(false);
    expect(field.safeParse("").success).toBe(false);
  });

  it("integerField truncates and clamps", () => {
    const field = integerField(1, 1, 5);
    expect(field.parse(3.9)).toBe(3);
    expect(field.parse(0)).toBe(1);
    expect(field.parse(12)).toBe(5);
    expect(field.parse(undefined)).toBe(1);
  });

  it("booleanField coerces common encodings", () => {
    const field = booleanField(false);
    expect(field.parse(true)).toBe(true);
    expect(field.parse("yes")).toBe(true);
    expect(field.parse("TRUE")).toBe(true);
    expect(field.parse("no")).toBe(false);
    expect(field.parse(1)).toBe(true);
    expect(field.parse(0)).toBe(false);
    expect(field.parse(undefined)).toBe(false);
    expect(field.parse({})).toBe(false);
    expect(booleanField(true).parse(null)).toBe(true);
  });

  it("textField stringifies scalars and defaults otherwise", () => {
    const field = textField("n/a");
    expect(field.parse("hello")).toBe("hello");
    expect(field.parse(3)).toBe("3");
    expect(field.parse({ nested: true })).toBe("n/a");
    expect(field.parse(undefined)).toBe("n/a");
  });

  it("stringListField keeps scalar entries only", () => {
    const field = stringListField();
    expect(field.parse(["a", 2, { b: 1 }, null, true])).toEqual(["a", "2", "true"]);
    expect(field.parse("not a list")).toEqual([]);
  });

  it("objectListField drops non-object, invalid and null-mapped entries", () => {
    const entry = z
      .object({ name: z.string(), keep: z.boolean() })
      .transform((e) => (e.keep ? e.name : null));
    const field = objectListField(entry);
    const parsed = field.parse([
      { name: "a", keep: true },
      "stray string",
      { name: "b", keep: false },
      { name: 7, keep: true },
      [1, 2],
      { name: "c", keep: true },
    ]);
    expect(parsed).toEqual(["a", "c"]);
    expect(field.parse(undefined)).toEqual([]);
  });
});

describe("parseResponse", () => {
  const schema = z.object({ score: scoreField(0.5), note: textField() });

  it("runs fences, JSON and schema in order", () => {
    const parsed = parseResponse('```json\n{"score": 2, "note": "ok"}\n```', schema);
    expect(parsed).toEqual({ ok: true, value: { score: 1, note: "ok" } });
  });

  it("clamps a score that overflows to Infinity in JSON", () => {
    const parsed = parseResponse('{"score": 1e400, "note": "big"}', schema);
    expect(parsed).toEqual({ ok: true, value: { score: 1, note: "big" } });
  });

  it("reports schema failures with the offending path", () => {
    const parsed = parseResponse('{"score": null}', schema);
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error).toBeInstanceOf(ParseError);
      expect(parsed.error.message).toMatch(/^Invalid field values: score: /);
    }
  });
});
