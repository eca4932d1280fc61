/**
 * Logical Fallacy Agent - detects fallacies and rates their severity.
 *
 * When the model omits a top-level score it is derived as
 * 1 - mean(severity) over the parsed fallacies (1.0 when there are none).
 *
 * @module analyzer/agents/logical-fallacy-agent
 */

import { z } from "zod";

import { getLogicalFallacyBasePrompt } from "../prompts/base/logical-fallacy-base";
import { clamp, objectListField, optionalNumberField, scoreField, textField } from "../response-parser";
import {
  isLogicalFallacyType,
  LOGICAL_FALLACY_TYPES,
  type LogicalFallacy,
  type LogicalFallacyResult,
  type LogicalFallacyType,
} from "../types";
import { AnalysisAgent } from "./base-agent";

// Scored on absence of a problem, like consistency
export const LOGICAL_FALLACY_DEFAULT_SCORE = 0.7;
export const DEFAULT_FALLACY_SEVERITY = 0.5;

// Known codes keyed by their letters only, so separators never decide a match
const FALLACY_CODES_BY_LETTERS = new Map<string, LogicalFallacyType>(
  LOGICAL_FALLACY_TYPES.map((code): [string, LogicalFallacyType] => [code.replace(/_/g, ""), code]),
);

/**
 * Normalize a model-supplied fallacy code: "Post hoc" / "post-hoc" → "post_hoc",
 * "Straw man" → "strawman". Unknown codes come back lowercased with "_" separators.
 */
export function normalizeFallacyType(raw: string): string {
  const code = raw.trim().toLowerCase().replace(/[\s_-]+/g, "_");
  return FALLACY_CODES_BY_LETTERS.get(code.replace(/_/g, "")) ?? code;
}

const LogicalFallacySchema = z
  .object({
    type: textField("overgeneralization"),
    location: textField(),
    description: textField(),
    severity: scoreField(DEFAULT_FALLACY_SEVERITY),
  })
  .transform((f): LogicalFallacy | null => {
    const type = normalizeFallacyType(f.type);
    // Unknown codes are malformed entries
    if (!isLogicalFallacyType(type)) return null;
    return { type, location: f.location, description: f.description, severity: f.severity };
  });

/**
 * Score implied by the detected fallacies alone.
 */
export function deriveFallacyScore(fallacies: readonly LogicalFallacy[]): number {
  if (fallacies.length === 0) return 1.0;
  const avgSeverity = fallacies.reduce((sum, f) => sum + f.severity, 0) / fallacies.length;
  return clamp(1.0 - avgSeverity);
}

const LogicalFallacyResponseSchema = z
  .object({
    score: optionalNumberField(),
    fallacies: objectListField(LogicalFallacySchema),
    fallacy_explanation: textField(),
  })
  .transform(
    (r): LogicalFallacyResult => ({
      score: clamp(r.score ?? deriveFallacyScore(r.fallacies)),
      fallacies: r.fallacies,
      explanation: r.fallacy_explanation,
    }),
  );

export class LogicalFallacyAgent extends AnalysisAgent<"logical_fallacies"> {
  readonly dimension = "logical_fallacies" as const;
  protected readonly logTag = "LogicalFallacyAgent";
  protected readonly responseSchema = LogicalFallacyResponseSchema;

  buildPrompt(articleText: string): string {
    return getLogicalFallacyBasePrompt({ articleText });
  }

  fallbackResult(explanation: string): LogicalFallacyResult {
    return {
      score: LOGICAL_FALLACY_DEFAULT_SCORE,
      fallacies: [],
      explanation,
    };
  }
}
