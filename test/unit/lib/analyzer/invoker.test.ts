/**
 * AI SDK Invoker Tests
 *
 * generateText is mocked; no provider is contacted.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

interface GenerateTextCall {
  prompt?: string;
  temperature?: number;
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

const { mockGenerateText } = vi.hoisted(() => ({
  mockGenerateText: vi.fn<(options: GenerateTextCall) => Promise<{ text: string }>>(),
}));

vi.mock("ai", () => ({
  generateText: mockGenerateText,
}));

import { AiSdkInvoker, hashPrompt } from "@/lib/analyzer/invoker";
import { getModel } from "@/lib/analyzer/llm";
import { DEFAULT_EVALUATOR_CONFIG, type EvaluatorConfig } from "@/lib/config-schemas";
import { InvocationError } from "@/lib/error-classification";

const CONFIG: EvaluatorConfig = {
  ...DEFAULT_EVALUATOR_CONFIG,
  modelName: "gpt-4o-mini",
  openaiApiKey: "test-key",
  temperature: 0.2,
  maxRetries: 1,
  timeout: 2,
};

function createInvoker(): AiSdkInvoker {
  return new AiSdkInvoker(CONFIG, getModel(CONFIG));
}

/** Never settles until its abort signal fires */
function hangUntilAborted(options: GenerateTextCall): Promise<{ text: string }> {
  return new Promise((_, reject) => {
    options.abortSignal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
  });
}

describe("AiSdkInvoker", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("passes model settings to generateText and returns the text", async () => {
    mockGenerateText.mockResolvedValueOnce({ text: '{"score": 0.8}' });
    const invoker = createInvoker();

    await expect(invoker.invoke("prompt text")).resolves.toBe('{"score": 0.8}');

    expect(mockGenerateText).toHaveBeenCalledTimes(1);
    const call = mockGenerateText.mock.calls[0][0];
    expect(call.prompt).toBe("prompt text");
    expect(call.temperature).toBe(0.2);
    expect(call.maxRetries).toBe(1);
    expect(call.abortSignal).toBeInstanceOf(AbortSignal);
    expect(invoker.modelName).toBe("gpt-4o-mini");
  });

  it("rejects an empty response as malformed", async () => {
    mockGenerateText.mockResolvedValueOnce({ text: "   " });
    await expect(createInvoker().invoke("p")).rejects.toMatchObject({
      name: "InvocationError",
      category: "malformed_response",
      message: "Empty response from openai/gpt-4o-mini",
    });
  });

  it("wraps provider errors with their classification", async () => {
    mockGenerateText.mockRejectedValueOnce(Object.assign(new Error("Too many requests"), { statusCode: 429 }));
    const error = await createInvoker()
      .invoke("p")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvocationError);
    expect(error).toMatchObject({ category: "rate_limit", status: 429 });
  });

  it("times out after the configured number of seconds", async () => {
    vi.useFakeTimers();
    mockGenerateText.mockImplementationOnce(hangUntilAborted);

    const pending = createInvoker().invoke("p");
    const assertion = expect(pending).rejects.toMatchObject({
      category: "timeout",
      message: "Model call timed out after 2000ms",
    });
    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
  });

  it("reports a caller abort as aborted", async () => {
    mockGenerateText.mockImplementationOnce(hangUntilAborted);
    const controller = new AbortController();

    const pending = createInvoker().invoke("p", { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ category: "aborted" });
  });

  it("does not call the model when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createInvoker().invoke("p", { signal: controller.signal })).rejects.toMatchObject({
      category: "aborted",
    });
    expect(mockGenerateText).not.toHaveBeenCalled();
  });
});

describe("hashPrompt", () => {
  it("returns 8 hex characters and is stable", () => {
    expect(hashPrompt("abc")).toMatch(/^[0-9a-f]{8}$/);
    expect(hashPrompt("abc")).toBe(hashPrompt("abc"));
    expect(hashPrompt("abc")).not.toBe(hashPrompt("abd"));
  });
});
