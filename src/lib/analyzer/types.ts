/**
 * Reasoning & Logic Evaluator - Type Definitions
 *
 * Result shapes for the four analysis dimensions and the aggregate
 * evaluation record. Every record is built once per `evaluate` call and
 * never mutated afterwards.
 *
 * @module analyzer/types
 */

// ============================================================================
// DIMENSIONS
// ============================================================================

/** Analysis dimensions (one agent each) */
export type Dimension =
  | "reasoning_depth"
  | "argument_structure"
  | "consistency"
  | "logical_fallacies";

export const DIMENSIONS: readonly Dimension[] = [
  "reasoning_depth",
  "argument_structure",
  "consistency",
  "logical_fallacies",
] as const;

// ============================================================================
// REASONING DEPTH
// ============================================================================

export interface ReasoningDepthResult {
  readonly score: number;
  readonly hasCausalAnalysis: boolean;
  readonly hasComparativeAnalysis: boolean;
  /** Number of analysis levels detected (1-5) */
  readonly analysisLevels: number;
  readonly explanation: string;
}

// ============================================================================
// ARGUMENT STRUCTURE
// ============================================================================

/**
 * One identified piece of the argument.
 * `type` is usually claim/evidence/reasoning/conclusion but the model is free
 * to return anything, so it stays a plain string.
 */
export interface ArgumentComponent {
  readonly type: string;
  readonly content: string;
  readonly location: string;
}

export interface ArgumentStructureResult {
  readonly score: number;
  readonly hasClearStructure: boolean;
  readonly paragraphCoherence: number;
  readonly components: readonly ArgumentComponent[];
  readonly explanation: string;
}

// ============================================================================
// CONSISTENCY
// ============================================================================

export interface ConsistencyResult {
  readonly score: number;
  readonly contradictions: readonly string[];
  readonly explanation: string;
}

// ============================================================================
// LOGICAL FALLACIES
// ============================================================================

export const LOGICAL_FALLACY_TYPES = [
  "overgeneralization",
  "causal_reversal",
  "false_dilemma",
  "slippery_slope",
  "ad_hominem",
  "circular_reasoning",
  "strawman",
  "hasty_generalization",
  "post_hoc",
] as const;

export type LogicalFallacyType = (typeof LOGICAL_FALLACY_TYPES)[number];

export function isLogicalFallacyType(value: string): value is LogicalFallacyType {
  return (LOGICAL_FALLACY_TYPES as readonly string[]).includes(value);
}

export interface LogicalFallacy {
  readonly type: LogicalFallacyType;
  readonly location: string;
  readonly description: string;
  /** 0 = cosmetic, 1 = invalidates the argument */
  readonly severity: number;
}

export interface LogicalFallacyResult {
  readonly score: number;
  readonly fallacies: readonly LogicalFallacy[];
  readonly explanation: string;
}

// ============================================================================
// AGGREGATE
// ============================================================================

/** Maps each dimension to its result type */
export interface DimensionResults {
  reasoning_depth: ReasoningDepthResult;
  argument_structure: ArgumentStructureResult;
  consistency: ConsistencyResult;
  logical_fallacies: LogicalFallacyResult;
}

export interface ReasoningLogicEvaluation {
  readonly articleTitle?: string;
  readonly overallScore: number;

  readonly reasoningDepth: ReasoningDepthResult;
  readonly argumentStructure: ArgumentStructureResult;
  readonly consistency: ConsistencyResult;
  readonly logicalFallacies: LogicalFallacyResult;

  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly recommendations: readonly string[];
}
