/**
 * Base prompt template for the REASONING DEPTH dimension
 *
 * Asks the model whether the article goes beyond listing facts:
 * multiple angles, layered analysis, causal and comparative reasoning.
 */

export function getReasoningDepthBasePrompt(variables: { articleText: string }): string {
  const { articleText } = variables;

  return `You are a professional reviewer of financial articles. Your task is to evaluate the REASONING DEPTH of the article below.

## EVALUATION CRITERIA

1. **Multiple perspectives**: Does the article examine the issue from several angles (market, policy, technology, competition, ...)?
2. **Layered analysis**: Does the analysis progress in levels (surface observation → underlying causes → potential consequences)?
3. **Causal analysis**: Does it establish clear cause-and-effect relationships?
4. **Comparative analysis**: Does it make meaningful comparisons (historical, peer, cross-market)?
5. **Depth of inference**: Does it carry the logic forward instead of merely listing facts?

## ARTICLE

${articleText}

## OUTPUT FORMAT

Return the result as JSON:
{
    "score": <0.0-1.0>,
    "has_causal_analysis": true/false,
    "has_comparative_analysis": true/false,
    "analysis_levels": <number of analysis levels detected, 1-5>,
    "depth_explanation": "<detailed explanation of the depth assessment, with concrete examples and suggestions>"
}

Return ONLY the JSON, nothing else.`;
}
