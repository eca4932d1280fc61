/**
 * Evaluation Report Formatter
 * Renders evaluation records as plain-text reports for the console
 */

import { truncateText } from "../text-utils";
import type { ReasoningLogicEvaluation } from "./types";

const RULE_WIDTH = 50;
const EXPLANATION_MAX_LENGTH = 200;

function formatScore(score: number): string {
  return score.toFixed(2);
}

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

/**
 * Human-readable summary: title block, overall score, component scores,
 * then strengths, weaknesses and recommendations. Empty lists are omitted.
 */
export function formatEvaluationSummary(evaluation: ReasoningLogicEvaluation): string {
  const lines: string[] = [];

  lines.push("Reasoning & Logic Evaluation Summary");
  lines.push("=".repeat(RULE_WIDTH));
  if (evaluation.articleTitle) {
    lines.push(`Article: ${evaluation.articleTitle}`);
    lines.push("");
  }

  lines.push(`Overall Score: ${formatScore(evaluation.overallScore)}/1.00`);
  lines.push("");
  lines.push("Component Scores:");
  lines.push(`  - Reasoning Depth: ${formatScore(evaluation.reasoningDepth.score)}`);
  lines.push(`  - Argument Structure: ${formatScore(evaluation.argumentStructure.score)}`);
  lines.push(`  - Consistency: ${formatScore(evaluation.consistency.score)}`);
  lines.push(`  - Logical Soundness: ${formatScore(evaluation.logicalFallacies.score)}`);

  if (evaluation.strengths.length > 0) {
    lines.push("");
    lines.push("Strengths:");
    evaluation.strengths.forEach((s) => lines.push(`  ✓ ${s}`));
  }

  if (evaluation.weaknesses.length > 0) {
    lines.push("");
    lines.push("Weaknesses:");
    evaluation.weaknesses.forEach((w) => lines.push(`  ✗ ${w}`));
  }

  if (evaluation.recommendations.length > 0) {
    lines.push("");
    lines.push("Recommendations:");
    evaluation.recommendations.forEach((r, i) => lines.push(`  ${i + 1}. ${r}`));
  }

  return lines.join("\n") + "\n";
}

/**
 * Per-dimension details, with explanations cut to 200 characters.
 */
export function formatComponentDetails(evaluation: ReasoningLogicEvaluation): string {
  const { reasoningDepth, argumentStructure, consistency, logicalFallacies } = evaluation;
  const lines: string[] = [];

  lines.push("1. Reasoning Depth Analysis:");
  lines.push(`   Score: ${formatScore(reasoningDepth.score)}`);
  lines.push(`   Has Causal Analysis: ${yesNo(reasoningDepth.hasCausalAnalysis)}`);
  lines.push(`   Has Comparative Analysis: ${yesNo(reasoningDepth.hasComparativeAnalysis)}`);
  lines.push(`   Analysis Levels: ${reasoningDepth.analysisLevels}`);
  lines.push(`   Explanation: ${truncateText(reasoningDepth.explanation, EXPLANATION_MAX_LENGTH)}`);
  lines.push("");

  lines.push("2. Argument Structure Analysis:");
  lines.push(`   Score: ${formatScore(argumentStructure.score)}`);
  lines.push(`   Clear Structure: ${yesNo(argumentStructure.hasClearStructure)}`);
  lines.push(`   Paragraph Coherence: ${formatScore(argumentStructure.paragraphCoherence)}`);
  lines.push(`   Components Identified: ${argumentStructure.components.length}`);
  lines.push(`   Explanation: ${truncateText(argumentStructure.explanation, EXPLANATION_MAX_LENGTH)}`);
  lines.push("");

  lines.push("3. Consistency Analysis:");
  lines.push(`   Score: ${formatScore(consistency.score)}`);
  lines.push(`   Contradictions Found: ${consistency.contradictions.length}`);
  consistency.contradictions.forEach((c, i) => lines.push(`     ${i + 1}. ${c}`));
  lines.push(`   Explanation: ${truncateText(consistency.explanation, EXPLANATION_MAX_LENGTH)}`);
  lines.push("");

  lines.push("4. Logical Fallacy Detection:");
  lines.push(`   Score: ${formatScore(logicalFallacies.score)}`);
  lines.push(`   Fallacies Found: ${logicalFallacies.fallacies.length}`);
  logicalFallacies.fallacies.forEach((f, i) => {
    lines.push(`     ${i + 1}. Type: ${f.type}`);
    lines.push(`        Location: ${f.location}`);
    lines.push(`        Severity: ${formatScore(f.severity)}`);
    lines.push(`        Description: ${f.description}`);
  });
  lines.push(`   Explanation: ${truncateText(logicalFallacies.explanation, EXPLANATION_MAX_LENGTH)}`);

  return lines.join("\n") + "\n";
}

/**
 * One block per article with the overall score and list counts.
 */
export function formatComparisonSummary(results: Record<string, ReasoningLogicEvaluation>): string {
  const lines: string[] = [];

  lines.push("Comparison Summary");
  lines.push("=".repeat(RULE_WIDTH));

  for (const [title, evaluation] of Object.entries(results)) {
    lines.push("");
    lines.push(`${title}:`);
    lines.push(`  Overall: ${formatScore(evaluation.overallScore)}`);
    lines.push(`  Strengths: ${evaluation.strengths.length} identified`);
    lines.push(`  Weaknesses: ${evaluation.weaknesses.length} identified`);
    lines.push(`  Fallacies: ${evaluation.logicalFallacies.fallacies.length} detected`);
  }

  return lines.join("\n") + "\n";
}
