/**
 * Error Classification
 *
 * Error types raised inside an analysis agent, and a classifier that maps
 * whatever the LLM provider layer throws onto a small set of categories.
 * Agents use the category for logging; the failure itself is always folded
 * into the dimension's fallback result.
 *
 * @module error-classification
 */

export type InvocationErrorCategory =
  | "timeout"
  | "rate_limit"
  | "provider_outage"
  | "malformed_response"
  | "aborted"
  | "unknown";

export type ClassifiedError = {
  category: InvocationErrorCategory;
  status: number | null;
  message: string;
  retriable: boolean;
};

/**
 * The LLM call failed: transport/provider error, timeout, rate limit,
 * or a response envelope without usable text.
 */
export class InvocationError extends Error {
  readonly category: InvocationErrorCategory;
  readonly status: number | null;
  readonly retriable: boolean;

  constructor(
    message: string,
    category: InvocationErrorCategory = "unknown",
    options: { status?: number | null; retriable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "InvocationError";
    this.category = category;
    this.status = options.status ?? null;
    this.retriable = options.retriable ?? (category === "timeout" || category === "rate_limit");
  }
}

/**
 * The model answered, but the answer could not be turned into a typed result
 * (JSON syntax error, non-object payload, wrong type for a numeric field).
 */
export class ParseError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ParseError";
  }
}

/** Patterns indicating LLM provider rate limiting or overload */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

/**
 * Read an HTTP status from an error object.
 * The AI SDK's APICallError carries `statusCode`; fetch-style errors use `status`.
 */
function readStatus(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return null;
}

/**
 * Classify an error thrown while invoking the model.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof InvocationError) {
    return {
      category: error.category,
      status: error.status,
      message: error.message,
      retriable: error.retriable,
    };
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  const status = readStatus(error);

  if (name === "AbortError") {
    return { category: "aborted", status, message: msg, retriable: false };
  }

  if (name === "TimeoutError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", status, message: msg, retriable: true };
  }

  if (status !== null) {
    if (status === 429 || status === 529 || status === 503) {
      return { category: "rate_limit", status, message: msg, retriable: true };
    }
    if (status === 401 || status === 403 || status >= 500) {
      return { category: "provider_outage", status, message: msg, retriable: status >= 500 };
    }
  }

  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", status, message: msg, retriable: false };
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", status, message: msg, retriable: true };
  }

  return { category: "unknown", status, message: msg, retriable: false };
}

/**
 * Wrap any thrown value into an InvocationError, keeping its classification.
 */
export function toInvocationError(error: unknown): InvocationError {
  if (error instanceof InvocationError) return error;
  const classified = classifyError(error);
  return new InvocationError(classified.message, classified.category, {
    status: classified.status,
    retriable: classified.retriable,
    cause: error,
  });
}
