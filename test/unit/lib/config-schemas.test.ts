/**
 * Config Schema Tests
 */

import { describe, expect, it } from "vitest";

import {
  ConfigValidationError,
  DEFAULT_EVALUATOR_CONFIG,
  EvaluatorConfigSchema,
  resolveEvaluatorConfig,
  validateEvaluatorConfig,
} from "@/lib/config-schemas";

describe("EvaluatorConfigSchema", () => {
  it("accepts the defaults", () => {
    expect(EvaluatorConfigSchema.safeParse(DEFAULT_EVALUATOR_CONFIG).success).toBe(true);
  });

  it("has the documented defaults", () => {
    expect(DEFAULT_EVALUATOR_CONFIG).toEqual({
      modelName: "gpt-4-turbo-preview",
      temperature: 0.3,
      minReasoningDepthScore: 0.6,
      minStructureScore: 0.6,
      minConsistencyScore: 0.7,
      maxRetries: 3,
      timeout: 60,
    });
  });
});

describe("validateEvaluatorConfig", () => {
  it("accepts an empty object", () => {
    expect(validateEvaluatorConfig({})).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects non-objects", () => {
    expect(validateEvaluatorConfig("nope")).toEqual({ valid: false, errors: ["root: Expected object"], warnings: [] });
  });

  it("reports out-of-range values by path", () => {
    const result = validateEvaluatorConfig({ temperature: 3, timeout: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toMatch(/^temperature: /);
    expect(result.errors[1]).toMatch(/^timeout: /);
  });

  it("warns about advisory thresholds that differ from the defaults", () => {
    const result = validateEvaluatorConfig({ minConsistencyScore: 0.9 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "minConsistencyScore: advisory only, not used when deriving strengths and weaknesses",
    ]);
  });

  it("warns when an OpenAI key is given for another provider", () => {
    const result = validateEvaluatorConfig({ llmProvider: "anthropic", openaiApiKey: "test-key" });
    expect(result.warnings).toEqual(['openaiApiKey: ignored for provider "anthropic"']);
  });
});

describe("resolveEvaluatorConfig", () => {
  it("merges overrides over the defaults", () => {
    expect(resolveEvaluatorConfig({ modelName: "gpt-4o-mini", maxRetries: 0 })).toEqual({
      ...DEFAULT_EVALUATOR_CONFIG,
      modelName: "gpt-4o-mini",
      maxRetries: 0,
    });
  });

  it("throws ConfigValidationError listing every issue", () => {
    try {
      resolveEvaluatorConfig({ maxRetries: 2.5, temperature: -1 });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.issues).toHaveLength(2);
        expect(err.message).toMatch(/^Invalid evaluator config: /);
      }
    }
  });
});
