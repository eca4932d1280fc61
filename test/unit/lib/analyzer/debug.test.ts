/**
 * Debug Logging Tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import { debugLog, formatDebugLine } from "@/lib/analyzer/debug";

const NOW = new Date("2026-01-15T10:00:00.000Z");

describe("formatDebugLine", () => {
  it("prefixes the timestamp", () => {
    expect(formatDebugLine("[Agent] done", undefined, NOW)).toBe("[2026-01-15T10:00:00.000Z] [Agent] done");
  });

  it("appends string payloads as-is and objects as JSON", () => {
    expect(formatDebugLine("msg", "raw", NOW)).toBe("[2026-01-15T10:00:00.000Z] msg | raw");
    expect(formatDebugLine("msg", { score: 0.5 }, NOW)).toBe('[2026-01-15T10:00:00.000Z] msg | {\n  "score": 0.5\n}');
  });

  it("truncates long payloads", () => {
    const line = formatDebugLine("msg", "z".repeat(9000), NOW);
    expect(line).toBe(`[2026-01-15T10:00:00.000Z] msg | ${"z".repeat(8000)}…[truncated]`);
  });

  it("survives unserializable payloads", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(formatDebugLine("msg", cyclic, NOW)).toBe("[2026-01-15T10:00:00.000Z] msg | [unserializable]");
  });
});

describe("debugLog", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("echoes to the console when RLE_DEBUG is true", () => {
    vi.stubEnv("RLE_DEBUG", "true");
    vi.stubEnv("RLE_DEBUG_LOG_FILE", "false");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    debugLog("[Evaluator] hello");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[Evaluator\] hello$/);
  });

  it("is silent when both outputs are off", () => {
    vi.stubEnv("RLE_DEBUG", "false");
    vi.stubEnv("RLE_DEBUG_LOG_FILE", "false");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    debugLog("quiet");

    expect(log).not.toHaveBeenCalled();
  });
});
