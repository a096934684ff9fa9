import { z } from "zod";
import { errorMessage } from "../logging/redactSecrets.js";
import type { LlmError } from "./types.js";

export type JsonResponse = { status: "ok"; body: unknown } | LlmError;

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

function providerMessage(text: string): string | null {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.error.message : null;
  } catch {
    return null;
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  return providerMessage(text) ?? (text || response.statusText || "Unknown provider error");
}

export async function postJson(params: {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
}): Promise<JsonResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

  try {
    const response = await fetch(params.url, {
      method: "POST",
      signal: controller.signal,
      headers: { "Content-Type": "application/json", ...params.headers },
      body: JSON.stringify(params.body),
    });

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      return {
        status: "error",
        error_type: response.status === 429 ? "rate_limited" : "provider_error",
        message: `${params.provider} error ${response.status}: ${detail}`,
      };
    }

    const body: unknown = await response.json();
    return { status: "ok", body };
  } catch (e) {
    if (controller.signal.aborted) {
      return { status: "error", error_type: "timeout", message: "LLM invocation timed out" };
    }
    if (e instanceof SyntaxError) {
      return { status: "error", error_type: "invalid_response", message: `${params.provider} returned invalid JSON` };
    }
    return {
      status: "error",
      error_type: "network",
      message: `${params.provider} request failed: ${errorMessage(e)}`,
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function toBase64(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}
