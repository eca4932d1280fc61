/**
 * Analysis Agent Base
 *
 * One agent owns one evaluation dimension: it builds the dimension prompt,
 * invokes the model once, parses the answer, and falls back to a documented
 * default when either step fails. `analyze` never rejects.
 *
 * @module analyzer/agents/base-agent
 */

import type { z } from "zod";

import { classifyError, ParseError } from "../../error-classification";
import { truncateText } from "../../text-utils";
import { debugLog } from "../debug";
import { hashPrompt, type InvokeOptions, type LLMInvoker } from "../invoker";
import { parseResponse } from "../response-parser";
import type { Dimension, DimensionResults } from "../types";

export interface AnalyzeOptions {
  /** Cancels the model call; the agent then returns its fallback */
  signal?: AbortSignal;
}

export abstract class AnalysisAgent<D extends Dimension> {
  abstract readonly dimension: D;

  /** Tag used in log lines, e.g. "ReasoningDepthAgent" */
  protected abstract readonly logTag: string;

  protected readonly invoker: LLMInvoker;

  constructor(invoker: LLMInvoker) {
    this.invoker = invoker;
  }

  /** Build the full instruction text with the article embedded verbatim */
  abstract buildPrompt(articleText: string): string;

  /** Lenient schema mapping the decoded JSON object to the dimension result */
  protected abstract readonly responseSchema: z.ZodType<DimensionResults[D], z.ZodTypeDef, unknown>;

  /** Default result carrying `explanation` as the failure reason */
  abstract fallbackResult(explanation: string): DimensionResults[D];

  /**
   * Parse raw model text into the dimension result.
   * @throws ParseError when the text is not a usable JSON object
   */
  parse(rawText: string): DimensionResults[D] {
    const parsed = parseResponse(rawText, this.responseSchema);
    if (!parsed.ok) throw parsed.error;
    return parsed.value;
  }

  async analyze(articleText: string, options: AnalyzeOptions = {}): Promise<DimensionResults[D]> {
    const prompt = this.buildPrompt(articleText);
    const startTime = Date.now();
    const invokeOptions: InvokeOptions = options.signal ? { signal: options.signal } : {};

    let responseText: string;
    try {
      responseText = await this.invoker.invoke(prompt, invokeOptions);
    } catch (error) {
      const classified = classifyError(error);
      console.warn(
        `[${this.logTag}] Model call failed (${classified.category}): ${classified.message}; using fallback result`,
      );
      return this.fallbackResult(`Error during analysis: ${classified.message}`);
    }

    try {
      const result = this.parse(responseText);
      debugLog(`[${this.logTag}] analyzed`, {
        promptHash: hashPrompt(prompt),
        latencyMs: Date.now() - startTime,
        score: result.score,
      });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const kind = error instanceof ParseError ? "parse_error" : "unexpected";
      console.warn(`[${this.logTag}] Could not parse model output (${kind}): ${message}`);
      debugLog(`[${this.logTag}] unparsable response`, truncateText(responseText, 500));
      return this.fallbackResult(`Failed to parse analysis result: ${message}`);
    }
  }
}
