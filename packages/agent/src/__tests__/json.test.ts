import { describe, it, expect } from "vitest";
import {
  JsonExtractionError,
  extractJsonObject,
  flattenToText,
  parseJsonObject,
  stripCodeFences,
} from "../json.js";

describe("extractJsonObject", () => {
  it("strips markdown fences", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("takes the span from the first { to the last }", () => {
    const raw = 'Sure! Here you go: {"intent": "btc_price_info", "x": {"y": 1}} Hope that helps.';
    expect(extractJsonObject(raw)).toBe('{"intent": "btc_price_info", "x": {"y": 1}}');
  });

  it("throws when there is no object", () => {
    expect(() => extractJsonObject("no braces here")).toThrow(JsonExtractionError);
    expect(() => extractJsonObject("} backwards {")).toThrow("No JSON object found in model response");
  });
});

describe("parseJsonObject", () => {
  it("decodes a fenced object", () => {
    expect(parseJsonObject('```\n{"confidence": 0.8}\n```')).toEqual({ confidence: 0.8 });
  });

  it("rejects invalid JSON with a SyntaxError", () => {
    expect(() => parseJsonObject("{intent: btc}")).toThrow(SyntaxError);
  });
});

describe("flattenToText", () => {
  it("passes strings through", () => {
    expect(flattenToText("plain")).toBe("plain");
  });

  it("renders objects as key: value pairs", () => {
    expect(flattenToText({ trend: "up", rsi: 61 })).toBe("trend: up; rsi: 61");
  });

  it("joins arrays and nests objects", () => {
    expect(flattenToText(["a", { b: ["c", "d"] }])).toBe("a; b: c; d");
  });

  it("renders null and undefined as empty", () => {
    expect(flattenToText(null)).toBe("");
    expect(flattenToText(undefined)).toBe("");
  });
});
