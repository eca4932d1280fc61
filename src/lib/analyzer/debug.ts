/**
 * Debug logging utilities for the evaluator
 *
 * Provides file-based and console logging for debugging evaluation runs.
 * Configured via environment variables:
 *   RLE_DEBUG_LOG_PATH            - log file (default ./debug-evaluator.log)
 *   RLE_DEBUG_LOG_FILE            - "true" to append to the log file
 *   RLE_DEBUG_LOG_CLEAR_ON_START  - "true" to truncate the file in clearDebugLog()
 *   RLE_DEBUG                     - "true" to echo debug lines to the console
 *
 * @module analyzer/debug
 */

import * as fs from "node:fs";
import * as path from "node:path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

interface DebugSettings {
  logPath: string;
  fileEnabled: boolean;
  clearOnStart: boolean;
  consoleEnabled: boolean;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  return (value ?? String(fallback)).toLowerCase() === "true";
}

// Re-read on every call; env changes apply immediately.
function readSettings(): DebugSettings {
  return {
    logPath: process.env.RLE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-evaluator.log"),
    fileEnabled: flag(process.env.RLE_DEBUG_LOG_FILE, false),
    clearOnStart: flag(process.env.RLE_DEBUG_LOG_CLEAR_ON_START, false),
    consoleEnabled: flag(process.env.RLE_DEBUG, false),
  };
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Format one debug line: `[timestamp] message | payload`.
 */
export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }

  return logLine;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const settings = readSettings();
  if (!settings.fileEnabled && !settings.consoleEnabled) return;

  const logLine = formatDebugLine(message, data);

  // Fire-and-forget append; write failures are reported, not thrown
  if (settings.fileEnabled) {
    fs.promises.appendFile(settings.logPath, logLine + "\n").catch((err: unknown) => {
      console.error(`[Debug] Failed to write ${settings.logPath}: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  if (settings.consoleEnabled) {
    console.log(logLine);
  }
}

/**
 * Clear the debug log file at startup
 */
export async function clearDebugLog(): Promise<void> {
  const settings = readSettings();
  if (!settings.fileEnabled || !settings.clearOnStart) return;

  await fs.promises.writeFile(
    settings.logPath,
    `=== Evaluator Debug Log Started at ${new Date().toISOString()} ===\n`,
  );
}
