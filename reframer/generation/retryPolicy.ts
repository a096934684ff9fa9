import { errorMessage } from "../../logging/redactSecrets.js";
import type { LlmError, LlmErrorType } from "../../llm/types.js";

export type RetryDecision = { shouldRetry: boolean; backoffMs: number };

export const MAX_ATTEMPTS = 3;

const RETRYABLE = new Set<LlmErrorType>(["rate_limited", "timeout", "network"]);
const BACKOFFS_MS = [2_000, 10_000];

// Transports report failures as values; this covers anything they throw anyway.
export function classifyLlmError(e: unknown): LlmErrorType {
  const message = errorMessage(e).toLowerCase();

  if (message.includes("429") || message.includes("rate limit")) return "rate_limited";
  if (message.includes("timeout") || message.includes("timed out") || message.includes("abort")) return "timeout";
  if (message.includes("fetch") || message.includes("network") || message.includes("econn")) return "network";
  return "provider_error";
}

export function decideRetry(params: { attempt: number; error_type: LlmErrorType }): RetryDecision {
  if (params.attempt >= MAX_ATTEMPTS) return { shouldRetry: false, backoffMs: 0 };
  if (!RETRYABLE.has(params.error_type)) return { shouldRetry: false, backoffMs: 0 };

  return { shouldRetry: true, backoffMs: BACKOFFS_MS[Math.min(params.attempt - 1, BACKOFFS_MS.length - 1)] };
}

export async function sleep(ms: number) {
  await new Promise((r) => setTimeout(r, ms));
}

export function isLlmError(result: { status: "ok" } | LlmError): result is LlmError {
  return result.status === "error";
}

export type RetryOptions = {
  sleep?: (ms: number) => Promise<void>;
  label?: string;
};

export async function invokeWithRetries<Ok extends { status: "ok" }>(
  call: () => Promise<Ok | LlmError>,
  options: RetryOptions = {}
): Promise<{ result: Ok | LlmError; attempts: number }> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    let result: Ok | LlmError;
    try {
      result = await call();
    } catch (e) {
      result = { status: "error", error_type: classifyLlmError(e), message: errorMessage(e) };
    }

    if (!isLlmError(result)) return { result, attempts: attempt };

    const decision = decideRetry({ attempt, error_type: result.error_type });
    if (!decision.shouldRetry) return { result, attempts: attempt };

    console.warn("[reframe] retrying LLM call", {
      label: options.label ?? "llm",
      attempt,
      error_type: result.error_type,
      backoff_ms: decision.backoffMs,
    });
    await wait(decision.backoffMs);
  }
}
