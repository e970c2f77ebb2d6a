import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  extractJsonPayload,
  parseModelJson,
  parseToolArguments,
} from "../parseModelJson.js";

const Schema = z.object({ answer: z.number() });

describe("extractJsonPayload", () => {
  it("prefers a json code fence", () => {
    const content = 'Here you go:\n```json\n{"answer": 1}\n```\nThanks';
    expect(extractJsonPayload(content)).toBe('{"answer": 1}');
  });

  it("falls back to any code fence", () => {
    expect(extractJsonPayload('```\n{"answer": 2}\n```')).toBe('{"answer": 2}');
  });

  it("slices the outermost object out of surrounding prose", () => {
    expect(extractJsonPayload('The plan is {"answer": 3} as requested.')).toBe(
      '{"answer": 3}'
    );
  });
});

describe("parseModelJson", () => {
  it("returns the validated value", () => {
    const outcome = parseModelJson('```json\n{"answer": 42}\n```', Schema, null);
    expect(outcome).toEqual({ ok: true, value: { answer: 42 } });
  });

  it("returns the fallback for text that is not JSON", () => {
    const outcome = parseModelJson("I cannot help with that", Schema, "fallback");
    expect(outcome.ok).toBe(false);
    expect(outcome.value).toBe("fallback");
    if (!outcome.ok) {
      expect(outcome.reason.startsWith("Invalid JSON:")).toBe(true);
    }
  });

  it("reports the path of a schema mismatch", () => {
    const outcome = parseModelJson('{"answer": "many"}', Schema, null);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.reason).toBe("Schema mismatch at answer: Expected number, received string");
    }
  });
});

describe("parseToolArguments", () => {
  it("decodes an object", () => {
    expect(parseToolArguments('{"expression": "1 + 1"}')).toEqual({ expression: "1 + 1" });
  });

  it.each(["", "   ", "{not json", "[1, 2]", "42", "null"])(
    "treats %j as empty arguments",
    (text) => {
      expect(parseToolArguments(text)).toEqual({});
    }
  );
});
