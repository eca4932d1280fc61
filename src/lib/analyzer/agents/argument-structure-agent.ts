/**
 * Argument Structure Agent - evaluates ordering, paragraph coherence and
 * the claim → evidence → conclusion chain.
 *
 * @module analyzer/agents/argument-structure-agent
 */

import { z } from "zod";

import { getArgumentStructureBasePrompt } from "../prompts/base/argument-structure-base";
import { booleanField, objectListField, scoreField, textField } from "../response-parser";
import type { ArgumentComponent, ArgumentStructureResult } from "../types";
import { AnalysisAgent } from "./base-agent";

export const ARGUMENT_STRUCTURE_DEFAULT_SCORE = 0.5;
export const DEFAULT_PARAGRAPH_COHERENCE = 0.5;

const ArgumentComponentSchema = z
  .object({
    type: textField("unknown"),
    content: textField(),
    location: textField(),
  })
  .transform((c): ArgumentComponent => ({ type: c.type, content: c.content, location: c.location }));

const ArgumentStructureResponseSchema = z
  .object({
    score: scoreField(ARGUMENT_STRUCTURE_DEFAULT_SCORE),
    has_clear_structure: booleanField(false),
    paragraph_coherence: scoreField(DEFAULT_PARAGRAPH_COHERENCE),
    argument_components: objectListField(ArgumentComponentSchema),
    structure_explanation: textField(),
  })
  .transform(
    (r): ArgumentStructureResult => ({
      score: r.score,
      hasClearStructure: r.has_clear_structure,
      paragraphCoherence: r.paragraph_coherence,
      components: r.argument_components,
      explanation: r.structure_explanation,
    }),
  );

export class ArgumentStructureAgent extends AnalysisAgent<"argument_structure"> {
  readonly dimension = "argument_structure" as const;
  protected readonly logTag = "ArgumentStructureAgent";
  protected readonly responseSchema = ArgumentStructureResponseSchema;

  buildPrompt(articleText: string): string {
    return getArgumentStructureBasePrompt({ articleText });
  }

  fallbackResult(explanation: string): ArgumentStructureResult {
    return {
      score: ARGUMENT_STRUCTURE_DEFAULT_SCORE,
      hasClearStructure: false,
      paragraphCoherence: DEFAULT_PARAGRAPH_COHERENCE,
      components: [],
      explanation,
    };
  }
}
