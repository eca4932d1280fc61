/**
 * Reasoning & Logic Evaluator
 *
 * Runs the four dimension agents on one article and aggregates their results
 * into a ReasoningLogicEvaluation. The evaluator only holds immutable
 * configuration; every call builds its result from scratch and `evaluate`
 * always resolves with a complete report.
 *
 * @module analyzer/evaluator
 */

import {
  resolveEvaluatorConfig,
  validateEvaluatorConfig,
  type EvaluatorConfig,
} from "../config-schemas";
import {
  ArgumentStructureAgent,
  ConsistencyAgent,
  LogicalFallacyAgent,
  ReasoningDepthAgent,
  type AnalyzeOptions,
} from "./agents";
import { calculateOverallScore, generateRecommendations, identifyStrengthsWeaknesses } from "./aggregation";
import { debugLog } from "./debug";
import { AiSdkInvoker, type LLMInvoker } from "./invoker";
import type { DimensionResults, ReasoningLogicEvaluation } from "./types";

export interface EvaluatorDependencies {
  /** Replaces the AI SDK invoker (tests, custom transports) */
  invoker?: LLMInvoker;
}

export type EvaluateOptions = AnalyzeOptions;

export class ReasoningLogicEvaluator {
  readonly config: Readonly<EvaluatorConfig>;

  private readonly reasoningDepthAgent: ReasoningDepthAgent;
  private readonly argumentStructureAgent: ArgumentStructureAgent;
  private readonly logicalFallacyAgent: LogicalFallacyAgent;
  private readonly consistencyAgent: ConsistencyAgent;

  /**
   * @param config - overrides merged over DEFAULT_EVALUATOR_CONFIG
   * @throws ConfigValidationError when the merged config is invalid
   */
  constructor(config: Partial<EvaluatorConfig> = {}, deps: EvaluatorDependencies = {}) {
    this.config = Object.freeze(resolveEvaluatorConfig(config));

    for (const warning of validateEvaluatorConfig(this.config).warnings) {
      console.warn(`[Evaluator] ${warning}`);
    }

    const invoker = deps.invoker ?? new AiSdkInvoker(this.config);
    this.reasoningDepthAgent = new ReasoningDepthAgent(invoker);
    this.argumentStructureAgent = new ArgumentStructureAgent(invoker);
    this.logicalFallacyAgent = new LogicalFallacyAgent(invoker);
    this.consistencyAgent = new ConsistencyAgent(invoker);
  }

  /**
   * Evaluate an article's reasoning and logic quality.
   */
  async evaluate(
    articleText: string,
    articleTitle?: string,
    options: EvaluateOptions = {},
  ): Promise<ReasoningLogicEvaluation> {
    const startTime = Date.now();

    // The dimensions are independent; run all four model calls at once
    const [reasoningDepth, argumentStructure, logicalFallacies, consistency] = await Promise.all([
      this.reasoningDepthAgent.analyze(articleText, options),
      this.argumentStructureAgent.analyze(articleText, options),
      this.logicalFallacyAgent.analyze(articleText, options),
      this.consistencyAgent.analyze(articleText, options),
    ]);

    const results: DimensionResults = {
      reasoning_depth: reasoningDepth,
      argument_structure: argumentStructure,
      consistency,
      logical_fallacies: logicalFallacies,
    };

    const overallScore = calculateOverallScore(results);
    const { strengths, weaknesses } = identifyStrengthsWeaknesses(results);
    const recommendations = generateRecommendations(results);

    debugLog("[Evaluator] evaluation complete", {
      articleTitle: articleTitle ?? null,
      overallScore,
      scores: {
        reasoningDepth: reasoningDepth.score,
        argumentStructure: argumentStructure.score,
        consistency: consistency.score,
        logicalFallacies: logicalFallacies.score,
      },
      elapsedMs: Date.now() - startTime,
    });

    return {
      ...(articleTitle !== undefined ? { articleTitle } : {}),
      overallScore,
      reasoningDepth,
      argumentStructure,
      consistency,
      logicalFallacies,
      strengths,
      weaknesses,
      recommendations,
    };
  }

  /**
   * Evaluate several articles keyed by title.
   * Articles are processed one after another so at most four model calls
   * are in flight at a time.
   */
  async evaluateMany(
    articles: Record<string, string>,
    options: EvaluateOptions = {},
  ): Promise<Record<string, ReasoningLogicEvaluation>> {
    const results: Record<string, ReasoningLogicEvaluation> = {};
    for (const [title, text] of Object.entries(articles)) {
      console.log(`[Evaluator] Evaluating "${title}"`);
      results[title] = await this.evaluate(text, title, options);
    }
    return results;
  }
}
