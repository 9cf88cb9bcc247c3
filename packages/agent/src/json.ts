/**
 * Model replies are expected to hold one JSON object but often arrive wrapped
 * in markdown fences or surrounded by prose.
 */

export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonExtractionError";
  }
}

const FENCE = /```(?:json)?/gi;

export function stripCodeFences(raw: string): string {
  return raw.replace(FENCE, "").trim();
}

/**
 * Substring from the first `{` to the last `}` after removing fences.
 * Throws JsonExtractionError when either brace is missing.
 */
export function extractJsonObject(raw: string): string {
  const text = stripCodeFences(raw);
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) {
    throw new JsonExtractionError("No JSON object found in model response");
  }
  return text.slice(start, end + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Extract and decode; the result is always a plain object. */
export function parseJsonObject(raw: string): Record<string, unknown> {
  const decoded: unknown = JSON.parse(extractJsonObject(raw));
  if (!isRecord(decoded)) {
    throw new JsonExtractionError("Model response is not a JSON object");
  }
  return decoded;
}

/**
 * Render any JSON value as a single line of text. Objects become
 * `key: value` pairs joined by "; ", arrays are joined the same way.
 */
export function flattenToText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map(flattenToText).join("; ");
  if (isRecord(value)) {
    return Object.entries(value)
      .map(([key, v]) => `${key}: ${flattenToText(v)}`)
      .join("; ");
  }
  return String(value);
}
