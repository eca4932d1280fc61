/**
 * Evaluator - LLM Provider Selection
 *
 * Resolves the configured model name to an AI SDK language model.
 *
 * @module analyzer/llm
 */

import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createMistral } from "@ai-sdk/mistral";
import type { LanguageModel } from "ai";

import type { EvaluatorConfig, LLMProvider } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LLMProvider;
  modelName: string;
  model: LanguageModel;
}

export function normalizeProvider(raw: string): LLMProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

export function detectProviderFromModelName(modelName: string): LLMProvider | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

/**
 * Explicit provider first, then whatever the model name implies, then OpenAI.
 */
export function resolveProvider(
  config: Pick<EvaluatorConfig, "llmProvider" | "modelName">,
): LLMProvider {
  if (config.llmProvider) return normalizeProvider(config.llmProvider);
  return detectProviderFromModelName(config.modelName) ?? "openai";
}

/**
 * Build the AI SDK model for the configured provider.
 * Only the OpenAI provider takes a key from the config; the others read
 * their standard environment variables (ANTHROPIC_API_KEY, ...).
 */
export function getModel(config: Pick<EvaluatorConfig, "llmProvider" | "modelName" | "openaiApiKey">): ModelInfo {
  const provider = resolveProvider(config);
  const modelName = config.modelName;

  if (provider === "anthropic") {
    return { provider, modelName, model: createAnthropic()(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: createGoogleGenerativeAI()(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: createMistral()(modelName) };
  }

  const openai = config.openaiApiKey ? createOpenAI({ apiKey: config.openaiApiKey }) : createOpenAI();
  return { provider: "openai", modelName, model: openai(modelName) };
}
