/**
 * Base prompt template for the CONSISTENCY dimension
 *
 * Score semantics: 1.0 = fully consistent, 0.0 = severe contradictions.
 */

export function getConsistencyBasePrompt(variables: { articleText: string }): string {
  const { articleText } = variables;

  return `You are a professional reviewer of financial articles. Your task is to check the INTERNAL CONSISTENCY of the article below.

## WHAT TO CHECK

1. **Contradictory statements**: Do earlier and later statements contradict each other?
2. **Contradictory data**: Are the figures and facts cited consistent throughout?
3. **Contradictory positions**: Does the article hold one consistent viewpoint and stance?
4. **Logical contradictions**: Is the reasoning self-consistent?
5. **Conclusion vs. evidence**: Does the conclusion agree with the evidence presented earlier?

## ARTICLE

${articleText}

## OUTPUT FORMAT

Return the result as JSON:
{
    "score": <0.0-1.0, where 1.0 means fully consistent and 0.0 means severely contradictory>,
    "contradictions": [
        "<description of contradiction 1>",
        "<description of contradiction 2>",
        ...
    ],
    "consistency_explanation": "<detailed explanation of the consistency check, with concrete examples>"
}

Return ONLY the JSON, nothing else.`;
}
