/**
 * Response Parser
 *
 * Turns free-form model output into a typed dimension result:
 * strip markdown fences, decode one JSON object, then run it through a
 * lenient Zod schema that clamps ranges, fills defaults and drops malformed
 * list entries. Anything unrecoverable surfaces as ParseError, which the
 * owning agent converts into its fallback result.
 *
 * @module analyzer/response-parser
 */

import { z } from "zod";

import { ParseError } from "../error-classification";

export type JsonObject = Record<string, unknown>;

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

// ============================================================================
// FENCE STRIPPING + JSON DECODING
// ============================================================================

const OPENING_FENCE = /^```[A-Za-z0-9_-]*[ \t]*\r?\n?/;

/**
 * Remove a leading ``` fence (with or without a language tag such as json)
 * and a trailing ``` fence. Text without fences is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  let stripped = String(text ?? "").trim().replace(OPENING_FENCE, "");
  if (stripped.endsWith("```")) {
    stripped = stripped.slice(0, -3);
  }
  return stripped.trim();
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode model output into a single JSON object.
 */
export function parseModelJson(rawText: string): ParseResult<JsonObject> {
  const text = stripCodeFences(rawText);

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { ok: false, error: new ParseError(`Invalid JSON: ${reason}`, { cause: e }) };
  }

  if (!isJsonObject(decoded)) {
    const kind = Array.isArray(decoded) ? "array" : decoded === null ? "null" : typeof decoded;
    return { ok: false, error: new ParseError(`Expected a JSON object, got ${kind}`) };
  }

  return { ok: true, value: decoded };
}

// ============================================================================
// LENIENT FIELD SCHEMAS
// ============================================================================

/**
 * Clamp a value into [lo, hi]
 */
export function clamp(value: number, lo: number = 0, hi: number = 1): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * A number, a boolean (1/0), or a string holding a number. Infinite values
 * pass through for the field to clamp; null, NaN and other types fail.
 */
const numeric = z
  .union([
    z.number(),
    z.boolean().transform((b) => (b ? 1 : 0)),
    z.string().trim().min(1).transform(Number),
  ])
  .pipe(z.number());

/** Optional number clamped into [0, 1]; missing → `defaultValue`. */
export function scoreField(defaultValue: number) {
  return numeric.optional().transform((v) => clamp(v ?? defaultValue));
}

/** Optional number truncated to an integer and clamped into [lo, hi]. */
export function integerField(defaultValue: number, lo: number, hi: number) {
  return numeric.optional().transform((v) => clamp(Math.trunc(v ?? defaultValue), lo, hi));
}

/** Optional number; missing stays undefined (for derived values). Callers clamp. */
export function optionalNumberField() {
  return numeric.optional();
}

function toBoolean(value: unknown, defaultValue: boolean): boolean {
  if (value === undefined || value === null) return defaultValue;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "yes" || normalized === "1";
  }
  return false;
}

/** Booleans, "true"/"false"-style strings and numbers; anything else is false. */
export function booleanField(defaultValue: boolean = false) {
  return z.unknown().transform((v) => toBoolean(v, defaultValue));
}

/** Text; scalars are stringified, objects and null give the default. */
export function textField(defaultValue: string = "") {
  return z.unknown().transform((v) => {
    if (typeof v === "string") return v;
    if (typeof v === "number" || typeof v === "boolean") return String(v);
    return defaultValue;
  });
}

/** List of strings; a non-array gives [], non-scalar entries are dropped. */
export function stringListField() {
  return z.unknown().transform((v) => {
    if (!Array.isArray(v)) return [];
    const out: string[] = [];
    for (const entry of v) {
      if (typeof entry === "string") out.push(entry);
      else if (typeof entry === "number" || typeof entry === "boolean") out.push(String(entry));
    }
    return out;
  });
}

/**
 * List of objects validated by `entry`. A non-array gives []; entries that
 * are not objects, fail `entry`, or map to null are dropped.
 */
export function objectListField<Out>(entry: z.ZodType<Out, z.ZodTypeDef, unknown>) {
  return z.unknown().transform((v) => {
    const out: NonNullable<Out>[] = [];
    if (!Array.isArray(v)) return out;
    for (const item of v) {
      if (!isJsonObject(item)) continue;
      const parsed = entry.safeParse(item);
      if (parsed.success && parsed.data !== null && parsed.data !== undefined) out.push(parsed.data);
    }
    return out;
  });
}

// ============================================================================
// STRUCTURING
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a decoded object against a dimension schema.
 */
export function structureResponse<S extends z.ZodTypeAny>(obj: JsonObject, schema: S): ParseResult<z.output<S>> {
  const parsed = schema.safeParse(obj);
  if (!parsed.success) {
    return { ok: false, error: new ParseError(`Invalid field values: ${describeIssues(parsed.error)}`) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Full pipeline: fences → JSON → schema.
 */
export function parseResponse<S extends z.ZodTypeAny>(rawText: string, schema: S): ParseResult<z.output<S>> {
  const decoded = parseModelJson(rawText);
  if (!decoded.ok) return decoded;
  return structureResponse(decoded.value, schema);
}
