/**
 * Configuration Schemas
 *
 * Zod schema, defaults and validation for the evaluator configuration.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export const LLM_PROVIDERS = ["openai", "anthropic", "google", "mistral"] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// EVALUATOR CONFIG SCHEMA
// ============================================================================

export const EvaluatorConfigSchema = z.object({
  // === Model Selection ===
  openaiApiKey: z.string().min(1).optional().describe("OpenAI API key"),
  llmProvider: z.enum(LLM_PROVIDERS).optional().describe("Provider override; inferred from modelName when absent"),
  modelName: z.string().min(1).describe("LLM model to use"),
  temperature: z.number().min(0).max(2).describe("Temperature for LLM generation"),

  // === Advisory thresholds ===
  // Documented minimums; the strength/weakness rules use fixed thresholds instead.
  minReasoningDepthScore: z.number().min(0).max(1).describe("Minimum acceptable reasoning depth score"),
  minStructureScore: z.number().min(0).max(1).describe("Minimum acceptable structure score"),
  minConsistencyScore: z.number().min(0).max(1).describe("Minimum acceptable consistency score"),

  // === Invocation ===
  maxRetries: z.number().int().min(0).max(10).describe("Maximum retries for agent calls"),
  timeout: z.number().int().min(1).max(600).describe("Timeout for agent calls in seconds"),
});

export type EvaluatorConfig = z.infer<typeof EvaluatorConfigSchema>;

export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = {
  modelName: "gpt-4-turbo-preview",
  temperature: 0.3,
  minReasoningDepthScore: 0.6,
  minStructureScore: 0.6,
  minConsistencyScore: 0.7,
  maxRetries: 3,
  timeout: 60,
};

// ============================================================================
// VALIDATION
// ============================================================================

const ADVISORY_FIELDS = [
  "minReasoningDepthScore",
  "minStructureScore",
  "minConsistencyScore",
] as const;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".") || "root";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a (partial) config merged over the defaults.
 * Non-default advisory thresholds produce a warning, since nothing enforces them.
 */
export function validateEvaluatorConfig(input: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (input === null || typeof input !== "object" || Array.isArray(input)) {
    return { valid: false, errors: ["root: Expected object"], warnings };
  }

  const parsed = EvaluatorConfigSchema.safeParse({ ...DEFAULT_EVALUATOR_CONFIG, ...input });
  if (!parsed.success) {
    errors.push(...formatIssues(parsed.error));
    return { valid: false, errors, warnings };
  }

  for (const field of ADVISORY_FIELDS) {
    if (parsed.data[field] !== DEFAULT_EVALUATOR_CONFIG[field]) {
      warnings.push(`${field}: advisory only, not used when deriving strengths and weaknesses`);
    }
  }

  if (parsed.data.llmProvider && parsed.data.llmProvider !== "openai" && parsed.data.openaiApiKey) {
    warnings.push(`openaiApiKey: ignored for provider "${parsed.data.llmProvider}"`);
  }

  return { valid: true, errors, warnings };
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid evaluator config: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/**
 * Merge a partial config over the defaults and parse it.
 * @throws ConfigValidationError listing every schema issue
 */
export function resolveEvaluatorConfig(input: Partial<EvaluatorConfig> = {}): EvaluatorConfig {
  const parsed = EvaluatorConfigSchema.safeParse({ ...DEFAULT_EVALUATOR_CONFIG, ...input });
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}
