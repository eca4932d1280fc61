/**
 * Base prompt template for the ARGUMENT STRUCTURE dimension
 */

export function getArgumentStructureBasePrompt(variables: { articleText: string }): string {
  const { articleText } = variables;

  return `You are a professional reviewer of financial articles. Your task is to evaluate the ARGUMENT STRUCTURE of the article below.

## EVALUATION CRITERIA

1. **Logical order**: Are the parts of the article arranged in a sensible logical sequence?
2. **Paragraph transitions**: Do paragraphs connect naturally and smoothly?
3. **Claim-evidence-conclusion**: Are claims, evidence and conclusions tightly linked, and does the evidence actually support the claims?
4. **Structural clarity**: Is the overall structure clear enough for a reader to follow the argument?
5. **Completeness**: Is the chain of argument complete, from the question posed to the conclusion drawn?

## ARTICLE

${articleText}

## OUTPUT FORMAT

Return the result as JSON:
{
    "score": <0.0-1.0>,
    "has_clear_structure": true/false,
    "paragraph_coherence": <0.0-1.0 paragraph coherence score>,
    "argument_components": [
        {"type": "claim/evidence/reasoning/conclusion", "content": "<summary>", "location": "<where in the article>"},
        ...
    ],
    "structure_explanation": "<detailed explanation of the structure assessment, with concrete examples and suggestions>"
}

Return ONLY the JSON, nothing else.`;
}
