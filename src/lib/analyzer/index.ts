/**
 * Reasoning & Logic Evaluator - public entry point
 *
 * @module analyzer
 */

export { ReasoningLogicEvaluator, type EvaluateOptions, type EvaluatorDependencies } from "./evaluator";
export { formatEvaluationSummary, formatComponentDetails, formatComparisonSummary } from "./format-report";
export {
  calculateOverallScore,
  identifyStrengthsWeaknesses,
  generateRecommendations,
  DIMENSION_WEIGHTS,
  THRESHOLDS,
} from "./aggregation";
export {
  AnalysisAgent,
  ReasoningDepthAgent,
  ArgumentStructureAgent,
  ConsistencyAgent,
  LogicalFallacyAgent,
  type AnalyzeOptions,
} from "./agents";
export { AiSdkInvoker, type LLMInvoker, type InvokeOptions } from "./invoker";
export { getModel, type ModelInfo } from "./llm";
export { parseResponse, stripCodeFences, type ParseResult } from "./response-parser";
export * from "./types";

export {
  DEFAULT_EVALUATOR_CONFIG,
  EvaluatorConfigSchema,
  ConfigValidationError,
  validateEvaluatorConfig,
  type EvaluatorConfig,
  type LLMProvider,
} from "../config-schemas";
export { loadEvaluatorConfig, configFromEnv } from "../config-loader";
export { InvocationError, ParseError, classifyError, type InvocationErrorCategory } from "../error-classification";
export { extractArticleSections, truncateText } from "../text-utils";
export { loadEnvFile } from "../env-file";
