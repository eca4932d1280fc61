/**
 * Evaluation aggregation rules
 *
 * Combines the four dimension results into the overall score and derives
 * strengths, weaknesses and recommendations from fixed thresholds.
 *
 * Thresholds are constants, not configuration: the `min*Score` options in
 * EvaluatorConfig are advisory and are NOT consulted here.
 *
 * Argument structure uses an asymmetric coherence rule: a strength needs
 * coherence >= 0.7, a weakness needs coherence < 0.6, so [0.6, 0.7) yields
 * neither.
 *
 * @module analyzer/aggregation
 */

import type { DimensionResults } from "./types";

// ============================================================================
// WEIGHTS + THRESHOLDS
// ============================================================================

/** Dimension weights for the overall score; they sum to 1.0 */
export const DIMENSION_WEIGHTS = {
  reasoning_depth: 0.3,
  argument_structure: 0.3,
  consistency: 0.25,
  logical_fallacies: 0.15,
} as const satisfies Record<keyof DimensionResults, number>;

export const THRESHOLDS = {
  reasoningDepthStrength: 0.7,
  analysisLevelsStrength: 3,
  analysisLevelsWeakness: 2,
  argumentStructureStrength: 0.7,
  coherenceStrength: 0.7,
  coherenceWeakness: 0.6,
  consistencyStrength: 0.8,
  fallacyStrength: 0.8,
} as const;

/** Fallacy recommendations are limited to the first N detected */
export const MAX_FALLACY_RECOMMENDATIONS = 2;

// ============================================================================
// OVERALL SCORE
// ============================================================================

/**
 * Round to 3 decimal places.
 */
export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Weighted sum of the dimension scores, rounded to 3 decimals.
 */
export function calculateOverallScore(results: DimensionResults): number {
  const overall =
    results.reasoning_depth.score * DIMENSION_WEIGHTS.reasoning_depth +
    results.argument_structure.score * DIMENSION_WEIGHTS.argument_structure +
    results.consistency.score * DIMENSION_WEIGHTS.consistency +
    results.logical_fallacies.score * DIMENSION_WEIGHTS.logical_fallacies;

  return round3(overall);
}

// ============================================================================
// STRENGTHS + WEAKNESSES
// ============================================================================

export interface StrengthsWeaknesses {
  strengths: string[];
  weaknesses: string[];
}

export function identifyStrengthsWeaknesses(results: DimensionResults): StrengthsWeaknesses {
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  const depth = results.reasoning_depth;
  if (depth.score >= THRESHOLDS.reasoningDepthStrength) {
    if (depth.hasCausalAnalysis) strengths.push("Contains clear causal analysis");
    if (depth.hasComparativeAnalysis) strengths.push("Makes effective comparisons");
    if (depth.analysisLevels >= THRESHOLDS.analysisLevelsStrength) {
      strengths.push(`Analysis goes ${depth.analysisLevels} levels deep`);
    }
  } else {
    if (!depth.hasCausalAnalysis) weaknesses.push("Lacks cause-and-effect analysis");
    if (!depth.hasComparativeAnalysis) weaknesses.push("Lacks comparative analysis");
    if (depth.analysisLevels < THRESHOLDS.analysisLevelsWeakness) {
      weaknesses.push("Analysis stays at the surface level");
    }
  }

  const structure = results.argument_structure;
  if (structure.score >= THRESHOLDS.argumentStructureStrength) {
    if (structure.hasClearStructure) strengths.push("Argument is clearly structured");
    if (structure.paragraphCoherence >= THRESHOLDS.coherenceStrength) {
      strengths.push("Paragraphs flow naturally");
    }
  } else {
    if (!structure.hasClearStructure) weaknesses.push("Argument structure is unclear");
    if (structure.paragraphCoherence < THRESHOLDS.coherenceWeakness) {
      weaknesses.push("Paragraph transitions need work");
    }
  }

  const consistency = results.consistency;
  if (consistency.score >= THRESHOLDS.consistencyStrength) {
    strengths.push("Internally consistent, no obvious contradictions");
  } else if (consistency.contradictions.length > 0) {
    weaknesses.push(`Contains ${consistency.contradictions.length} internal contradiction(s)`);
  }

  const fallacies = results.logical_fallacies;
  if (fallacies.score >= THRESHOLDS.fallacyStrength) {
    strengths.push("Rigorous argument, no obvious logical fallacies");
  } else if (fallacies.fallacies.length > 0) {
    weaknesses.push(`Detected ${fallacies.fallacies.length} logical fallacy(ies)`);
  }

  return { strengths, weaknesses };
}

// ============================================================================
// RECOMMENDATIONS
// ============================================================================

export function generateRecommendations(results: DimensionResults): string[] {
  const recommendations: string[] = [];

  const depth = results.reasoning_depth;
  if (depth.score < THRESHOLDS.reasoningDepthStrength) {
    if (!depth.hasCausalAnalysis) {
      recommendations.push("Add cause-and-effect analysis that explains the drivers and consequences behind the figures");
    }
    if (!depth.hasComparativeAnalysis) {
      recommendations.push("Add comparisons, such as against prior periods or industry peers");
    }
    if (depth.analysisLevels < THRESHOLDS.analysisLevelsWeakness) {
      recommendations.push("Deepen the analysis from surface observations to underlying causes and potential impact");
    }
  }

  const structure = results.argument_structure;
  if (structure.score < THRESHOLDS.argumentStructureStrength) {
    if (!structure.hasClearStructure) {
      recommendations.push("Reorganize the article so claims, evidence and conclusions follow a clear logical order");
    }
    if (structure.paragraphCoherence < THRESHOLDS.coherenceWeakness) {
      recommendations.push("Improve transitions between paragraphs so the argument reads smoothly");
    }
  }

  const consistency = results.consistency;
  if (consistency.score < THRESHOLDS.consistencyStrength && consistency.contradictions.length > 0) {
    recommendations.push("Review and resolve the internal contradictions so statements agree throughout");
  }

  for (const fallacy of results.logical_fallacies.fallacies.slice(0, MAX_FALLACY_RECOMMENDATIONS)) {
    recommendations.push(`Fix logical fallacy: ${fallacy.description}`);
  }

  return recommendations;
}
