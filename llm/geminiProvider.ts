import { z } from "zod";
import { postJson, toBase64 } from "./postJson.js";
import type {
  ContentPart,
  GeneratedImage,
  ImageGenerationResult,
  ImageRequest,
  LlmProvider,
  ProviderOptions,
  TextGenerationResult,
} from "./types.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  inlineData: z.object({ mimeType: z.string(), data: z.string() }).optional(),
                })
              )
              .default([]),
          })
          .optional(),
      })
    )
    .default([]),
  modelVersion: z.string().optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

function toGeminiPart(part: ContentPart): GeminiPart {
  if (part.type === "text") return { text: part.text };
  return { inlineData: { mimeType: "application/pdf", data: toBase64(part.data) } };
}

export class GeminiProvider implements LlmProvider {
  readonly name = "gemini" as const;
  readonly model: string;
  private readonly baseUrl: string;

  constructor(private readonly options: ProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? GEMINI_BASE_URL;
  }

  private generateContent(model: string, body: unknown) {
    return postJson({
      provider: "Gemini",
      url: `${this.baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
      headers: { "x-goog-api-key": this.options.apiKey },
      body,
      timeoutMs: this.options.timeoutMs,
    });
  }

  async generateText(parts: ContentPart[]): Promise<TextGenerationResult> {
    const response = await this.generateContent(this.model, {
      contents: [{ role: "user", parts: parts.map(toGeminiPart) }],
    });
    if (response.status === "error") return response;

    const parsed = GenerateContentResponseSchema.safeParse(response.body);
    const candidateParts = parsed.success ? parsed.data.candidates[0]?.content?.parts ?? [] : [];
    const text = candidateParts
      .map((p) => p.text ?? "")
      .join("")
      .trim();

    if (!parsed.success || text.length === 0) {
      return { status: "error", error_type: "invalid_response", message: "Gemini returned empty content" };
    }

    const usage = parsed.data.usageMetadata;
    return {
      status: "ok",
      text,
      model: parsed.data.modelVersion ?? this.model,
      usage: usage
        ? {
            prompt_tokens: usage.promptTokenCount,
            completion_tokens: usage.candidatesTokenCount,
            total_tokens: usage.totalTokenCount,
          }
        : undefined,
    };
  }

  // The image model returns at most one picture per call.
  async generateImages(request: ImageRequest): Promise<ImageGenerationResult> {
    const images: GeneratedImage[] = [];

    for (let i = 0; i < request.count; i++) {
      const response = await this.generateContent(this.options.imageModel, {
        contents: [{ role: "user", parts: [{ text: request.prompt }] }],
        generationConfig: { responseModalities: ["TEXT", "IMAGE"] },
      });
      if (response.status === "error") return response;

      const parsed = GenerateContentResponseSchema.safeParse(response.body);
      if (!parsed.success) continue;
      for (const candidate of parsed.data.candidates) {
        for (const part of candidate.content?.parts ?? []) {
          if (part.inlineData && part.inlineData.mimeType.startsWith("image/")) {
            images.push({
              bytes: new Uint8Array(Buffer.from(part.inlineData.data, "base64")),
              mime_type: part.inlineData.mimeType,
            });
          }
        }
      }
    }

    if (images.length === 0) {
      return { status: "error", error_type: "invalid_response", message: "Gemini returned no images" };
    }
    return { status: "ok", images: images.slice(0, request.count), model: this.options.imageModel };
  }
}
