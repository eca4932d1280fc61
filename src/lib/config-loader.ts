/**
 * Config Loader
 *
 * Builds an EvaluatorConfig from environment variables and explicit overrides.
 * Overrides win over the environment; the environment wins over defaults.
 *
 * Environment variables:
 *   OPENAI_API_KEY                  - credential for the OpenAI provider
 *   OPENAI_MODEL                    - model name
 *   RLE_LLM_PROVIDER                - openai | anthropic | google | mistral
 *   RLE_TEMPERATURE                 - float
 *   RLE_MAX_RETRIES                 - int
 *   RLE_TIMEOUT_SECONDS             - int
 *   RLE_MIN_REASONING_DEPTH_SCORE   - float (advisory)
 *   RLE_MIN_STRUCTURE_SCORE         - float (advisory)
 *   RLE_MIN_CONSISTENCY_SCORE       - float (advisory)
 *
 * @module config-loader
 */

import {
  LLM_PROVIDERS,
  resolveEvaluatorConfig,
  type EvaluatorConfig,
  type LLMProvider,
} from "./config-schemas";

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string, integer = false): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  const value = integer ? Number.parseInt(raw, 10) : Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[Config] Ignoring ${key}="${raw}": not a number`);
    return undefined;
  }
  return value;
}

function readProvider(env: Env): LLMProvider | undefined {
  const raw = readString(env, "RLE_LLM_PROVIDER")?.toLowerCase();
  if (raw === undefined) return undefined;
  const match = LLM_PROVIDERS.find((p) => p === raw);
  if (!match) {
    console.warn(`[Config] Ignoring RLE_LLM_PROVIDER="${raw}": expected one of ${LLM_PROVIDERS.join(", ")}`);
  }
  return match;
}

/**
 * Read the evaluator config from the environment.
 * Only variables that are set are applied (no undefined overrides).
 */
export function configFromEnv(env: Env = process.env): Partial<EvaluatorConfig> {
  const cfg: Partial<EvaluatorConfig> = {};

  const openaiApiKey = readString(env, "OPENAI_API_KEY");
  if (openaiApiKey) cfg.openaiApiKey = openaiApiKey;

  const modelName = readString(env, "OPENAI_MODEL");
  if (modelName) cfg.modelName = modelName;

  const llmProvider = readProvider(env);
  if (llmProvider) cfg.llmProvider = llmProvider;

  const temperature = readNumber(env, "RLE_TEMPERATURE");
  if (temperature !== undefined) cfg.temperature = temperature;

  const maxRetries = readNumber(env, "RLE_MAX_RETRIES", true);
  if (maxRetries !== undefined) cfg.maxRetries = maxRetries;

  const timeout = readNumber(env, "RLE_TIMEOUT_SECONDS", true);
  if (timeout !== undefined) cfg.timeout = timeout;

  const minReasoningDepthScore = readNumber(env, "RLE_MIN_REASONING_DEPTH_SCORE");
  if (minReasoningDepthScore !== undefined) cfg.minReasoningDepthScore = minReasoningDepthScore;

  const minStructureScore = readNumber(env, "RLE_MIN_STRUCTURE_SCORE");
  if (minStructureScore !== undefined) cfg.minStructureScore = minStructureScore;

  const minConsistencyScore = readNumber(env, "RLE_MIN_CONSISTENCY_SCORE");
  if (minConsistencyScore !== undefined) cfg.minConsistencyScore = minConsistencyScore;

  return cfg;
}

/**
 * Load and validate the evaluator config.
 * @throws ConfigValidationError when the merged config is out of range
 */
export function loadEvaluatorConfig(
  env: Env = process.env,
  overrides: Partial<EvaluatorConfig> = {},
): EvaluatorConfig {
  return resolveEvaluatorConfig({ ...configFromEnv(env), ...overrides });
}
