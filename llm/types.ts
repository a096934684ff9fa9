import type { LlmProviderName } from "../reframer/config/loadConfig.js";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "pdf"; filename: string; data: Uint8Array };

export type LlmErrorType = "timeout" | "rate_limited" | "network" | "provider_error" | "invalid_response";

export type LlmError = {
  status: "error";
  error_type: LlmErrorType;
  message: string;
};

export type TextGenerationResult =
  | {
      status: "ok";
      text: string;
      model: string;
      usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
      };
    }
  | LlmError;

export type GeneratedImage = {
  bytes: Uint8Array;
  mime_type: string;
};

export type ImageGenerationResult = { status: "ok"; images: GeneratedImage[]; model: string } | LlmError;

export type ImageRequest = {
  prompt: string;
  count: number;
};

/**
 * Transports never throw for provider-side failures. Callers branch on
 * `status` and decide about retries from `error_type`.
 */
export interface LlmProvider {
  readonly name: LlmProviderName;
  readonly model: string;
  generateText(parts: ContentPart[]): Promise<TextGenerationResult>;
  generateImages(request: ImageRequest): Promise<ImageGenerationResult>;
}

export type ProviderOptions = {
  apiKey: string;
  model: string;
  imageModel: string;
  timeoutMs: number;
  baseUrl?: string;
};
