import { z } from "zod";
import { postJson, toBase64 } from "./postJson.js";
import type {
  ContentPart,
  ImageGenerationResult,
  ImageRequest,
  LlmProvider,
  ProviderOptions,
  TextGenerationResult,
} from "./types.js";

const OPENAI_BASE_URL = "https://api.openai.com/v1";

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const ImagesResponseSchema = z.object({
  data: z.array(z.object({ b64_json: z.string().optional() })),
});

type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "file"; file: { filename: string; file_data: string } };

function toChatPart(part: ContentPart): ChatContentPart {
  if (part.type === "text") return { type: "text", text: part.text };
  return {
    type: "file",
    file: { filename: part.filename, file_data: `data:application/pdf;base64,${toBase64(part.data)}` },
  };
}

export class OpenAiProvider implements LlmProvider {
  readonly name = "openai" as const;
  readonly model: string;
  private readonly baseUrl: string;

  constructor(private readonly options: ProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? OPENAI_BASE_URL;
  }

  private post(path: string, body: unknown) {
    return postJson({
      provider: "OpenAI",
      url: `${this.baseUrl}${path}`,
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body,
      timeoutMs: this.options.timeoutMs,
    });
  }

  async generateText(parts: ContentPart[]): Promise<TextGenerationResult> {
    const response = await this.post("/chat/completions", {
      model: this.model,
      messages: [{ role: "user", content: parts.map(toChatPart) }],
      stream: false,
    });
    if (response.status === "error") return response;

    const parsed = ChatCompletionSchema.safeParse(response.body);
    const content = parsed.success ? parsed.data.choices[0].message.content : null;
    if (!parsed.success || content === null || content.trim() === "") {
      return { status: "error", error_type: "invalid_response", message: "OpenAI returned empty content" };
    }

    return {
      status: "ok",
      text: content.trim(),
      model: parsed.data.model ?? this.model,
      usage: parsed.data.usage,
    };
  }

  async generateImages(request: ImageRequest): Promise<ImageGenerationResult> {
    const response = await this.post("/images/generations", {
      model: this.options.imageModel,
      prompt: request.prompt,
      n: request.count,
      size: "1024x1024",
    });
    if (response.status === "error") return response;

    const parsed = ImagesResponseSchema.safeParse(response.body);
    const images = parsed.success
      ? parsed.data.data.flatMap((item) =>
          item.b64_json ? [{ bytes: new Uint8Array(Buffer.from(item.b64_json, "base64")), mime_type: "image/png" }] : []
        )
      : [];

    if (images.length === 0) {
      return { status: "error", error_type: "invalid_response", message: "OpenAI returned no images" };
    }
    return { status: "ok", images, model: this.options.imageModel };
  }
}
