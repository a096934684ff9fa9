import type { ReframerConfig } from "../reframer/config/loadConfig.js";
import { ConfigError } from "../reframer/errors.js";
import { GeminiProvider } from "./geminiProvider.js";
import { OpenAiProvider } from "./openaiProvider.js";
import type { LlmProvider } from "./types.js";

// API keys are checked here rather than at startup so the server runs without one.
export function createProvider(config: ReframerConfig): LlmProvider {
  const { provider, timeoutMs, gemini, openai } = config.llm;

  if (provider === "openai") {
    if (!openai.apiKey) throw new ConfigError("OPENAI_API_KEY is not set");
    return new OpenAiProvider({ apiKey: openai.apiKey, model: openai.model, imageModel: openai.imageModel, timeoutMs });
  }

  if (!gemini.apiKey) throw new ConfigError("GEMINI_API_KEY is not set");
  return new GeminiProvider({ apiKey: gemini.apiKey, model: gemini.model, imageModel: gemini.imageModel, timeoutMs });
}
