/**
 * LLM Invocation Capability
 *
 * The single boundary between the agents and the model: submit a prompt,
 * receive text. Retries on transient provider errors are delegated to the
 * AI SDK (`maxRetries`); a per-call timeout aborts the request.
 *
 * @module analyzer/invoker
 */

import { generateText } from "ai";
import { createHash } from "node:crypto";

import type { EvaluatorConfig } from "../config-schemas";
import { InvocationError, toInvocationError } from "../error-classification";
import { getModel, type ModelInfo } from "./llm";

export interface InvokeOptions {
  /** Abandons the call when the surrounding evaluation is cancelled */
  signal?: AbortSignal;
}

/**
 * Anything that can answer a prompt with text.
 * Implementations reject with InvocationError.
 */
export interface LLMInvoker {
  invoke(prompt: string, options?: InvokeOptions): Promise<string>;
}

/** Short content hash used to correlate prompts in debug logs */
export function hashPrompt(prompt: string): string {
  return createHash("sha256").update(prompt).digest("hex").substring(0, 8);
}

/**
 * LLMInvoker backed by the AI SDK `generateText` call.
 */
export class AiSdkInvoker implements LLMInvoker {
  private readonly modelInfo: ModelInfo;
  private readonly temperature: number;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;

  constructor(
    config: Pick<EvaluatorConfig, "llmProvider" | "modelName" | "openaiApiKey" | "temperature" | "maxRetries" | "timeout">,
    modelInfo: ModelInfo = getModel(config),
  ) {
    this.modelInfo = modelInfo;
    this.temperature = config.temperature;
    this.maxRetries = config.maxRetries;
    this.timeoutMs = config.timeout * 1000;
  }

  get modelName(): string {
    return this.modelInfo.modelName;
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new InvocationError("Evaluation was cancelled before the model call", "aborted");
    }

    const controller = new AbortController();
    let timedOut = false;
    const tid = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const result = await generateText({
        model: this.modelInfo.model,
        prompt,
        temperature: this.temperature,
        maxRetries: this.maxRetries,
        abortSignal: controller.signal,
      });

      const text = result.text;
      if (typeof text !== "string" || text.trim() === "") {
        throw new InvocationError(
          `Empty response from ${this.modelInfo.provider}/${this.modelInfo.modelName}`,
          "malformed_response",
        );
      }
      return text;
    } catch (error) {
      if (timedOut) {
        throw new InvocationError(`Model call timed out after ${this.timeoutMs}ms`, "timeout", { cause: error });
      }
      if (signal?.aborted) {
        throw new InvocationError("Evaluation was cancelled during the model call", "aborted", { cause: error });
      }
      throw toInvocationError(error);
    } finally {
      clearTimeout(tid);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
