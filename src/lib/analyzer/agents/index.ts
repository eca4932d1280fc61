export { AnalysisAgent, type AnalyzeOptions } from "./base-agent";
export { ReasoningDepthAgent, REASONING_DEPTH_DEFAULT_SCORE } from "./reasoning-depth-agent";
export {
  ArgumentStructureAgent,
  ARGUMENT_STRUCTURE_DEFAULT_SCORE,
  DEFAULT_PARAGRAPH_COHERENCE,
} from "./argument-structure-agent";
export { ConsistencyAgent, CONSISTENCY_DEFAULT_SCORE } from "./consistency-agent";
export {
  LogicalFallacyAgent,
  LOGICAL_FALLACY_DEFAULT_SCORE,
  DEFAULT_FALLACY_SEVERITY,
  deriveFallacyScore,
  normalizeFallacyType,
} from "./logical-fallacy-agent";
