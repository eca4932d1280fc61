/**
 * Consistency Agent - looks for internal contradictions.
 *
 * @module analyzer/agents/consistency-agent
 */

import { z } from "zod";

import { getConsistencyBasePrompt } from "../prompts/base/consistency-base";
import { scoreField, stringListField, textField } from "../response-parser";
import type { ConsistencyResult } from "../types";
import { AnalysisAgent } from "./base-agent";

// Scored on absence of a problem: no evidence of contradiction is not a failure
export const CONSISTENCY_DEFAULT_SCORE = 0.7;

const ConsistencyResponseSchema = z
  .object({
    score: scoreField(CONSISTENCY_DEFAULT_SCORE),
    contradictions: stringListField(),
    consistency_explanation: textField(),
  })
  .transform(
    (r): ConsistencyResult => ({
      score: r.score,
      contradictions: r.contradictions,
      explanation: r.consistency_explanation,
    }),
  );

export class ConsistencyAgent extends AnalysisAgent<"consistency"> {
  readonly dimension = "consistency" as const;
  protected readonly logTag = "ConsistencyAgent";
  protected readonly responseSchema = ConsistencyResponseSchema;

  buildPrompt(articleText: string): string {
    return getConsistencyBasePrompt({ articleText });
  }

  fallbackResult(explanation: string): ConsistencyResult {
    return {
      score: CONSISTENCY_DEFAULT_SCORE,
      contradictions: [],
      explanation,
    };
  }
}
