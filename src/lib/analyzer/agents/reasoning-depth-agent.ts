/**
 * Reasoning Depth Agent - judges how far the article's analysis goes
 * beyond restating facts.
 *
 * @module analyzer/agents/reasoning-depth-agent
 */

import { z } from "zod";

import { getReasoningDepthBasePrompt } from "../prompts/base/reasoning-depth-base";
import { booleanField, integerField, scoreField, textField } from "../response-parser";
import type { ReasoningDepthResult } from "../types";
import { AnalysisAgent } from "./base-agent";

export const REASONING_DEPTH_DEFAULT_SCORE = 0.5;

const ReasoningDepthResponseSchema = z
  .object({
    score: scoreField(REASONING_DEPTH_DEFAULT_SCORE),
    has_causal_analysis: booleanField(false),
    has_comparative_analysis: booleanField(false),
    analysis_levels: integerField(1, 1, 5),
    depth_explanation: textField(),
  })
  .transform(
    (r): ReasoningDepthResult => ({
      score: r.score,
      hasCausalAnalysis: r.has_causal_analysis,
      hasComparativeAnalysis: r.has_comparative_analysis,
      analysisLevels: r.analysis_levels,
      explanation: r.depth_explanation,
    }),
  );

export class ReasoningDepthAgent extends AnalysisAgent<"reasoning_depth"> {
  readonly dimension = "reasoning_depth" as const;
  protected readonly logTag = "ReasoningDepthAgent";
  protected readonly responseSchema = ReasoningDepthResponseSchema;

  buildPrompt(articleText: string): string {
    return getReasoningDepthBasePrompt({ articleText });
  }

  fallbackResult(explanation: string): ReasoningDepthResult {
    return {
      score: REASONING_DEPTH_DEFAULT_SCORE,
      hasCausalAnalysis: false,
      hasComparativeAnalysis: false,
      analysisLevels: 1,
      explanation,
    };
  }
}
