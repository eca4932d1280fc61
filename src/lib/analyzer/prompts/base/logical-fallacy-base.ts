/**
 * Base prompt template for the LOGICAL FALLACY dimension
 *
 * The fallacy codes listed here must stay in sync with LOGICAL_FALLACY_TYPES;
 * entries with any other code are discarded when the response is parsed.
 */

import { LOGICAL_FALLACY_TYPES, type LogicalFallacyType } from "../../types";

const FALLACY_DESCRIPTIONS: Record<LogicalFallacyType, string> = {
  overgeneralization: "generalizing from a few cases to the whole",
  causal_reversal: "confusing the direction of cause and effect",
  false_dilemma: "reducing the issue to two options when more exist",
  slippery_slope: "claiming a small change inevitably triggers extreme consequences",
  ad_hominem: "attacking the person instead of the argument",
  circular_reasoning: "using the conclusion to prove the conclusion",
  strawman: "misrepresenting an opposing view to refute it more easily",
  hasty_generalization: "drawing a conclusion from insufficient evidence",
  post_hoc: "assuming that because one event followed another it was caused by it",
};

export function getLogicalFallacyBasePrompt(variables: { articleText: string }): string {
  const { articleText } = variables;

  const fallacyList = LOGICAL_FALLACY_TYPES.map(
    (code, i) => `${i + 1}. **${code}**: ${FALLACY_DESCRIPTIONS[code]}`,
  ).join("\n");

  return `You are a professional reviewer of financial articles. Your task is to detect LOGICAL FALLACIES in the article below.

## FALLACY TYPES (use these codes)

${fallacyList}

## ARTICLE

${articleText}

## OUTPUT FORMAT

Return the result as JSON:
{
    "score": <0.0-1.0, where 1.0 means no fallacies and 0.0 means severe fallacies>,
    "fallacies": [
        {
            "type": "<fallacy code from the list above>",
            "location": "<where in the article the fallacy occurs>",
            "description": "<detailed description of the fallacy>",
            "severity": <0.0-1.0>
        },
        ...
    ],
    "fallacy_explanation": "<overall summary of the fallacies detected>"
}

Return ONLY the JSON, nothing else.`;
}
