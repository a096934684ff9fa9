import type { ContentPart, LlmProvider, TextGenerationResult } from "../../llm/types.js";
import { invokeWithRetries, type RetryOptions } from "./retryPolicy.js";

export async function rewriteArticles(
  provider: LlmProvider,
  parts: ContentPart[],
  options: RetryOptions = {}
): Promise<{ result: TextGenerationResult; attempts: number }> {
  return invokeWithRetries(() => provider.generateText(parts), { label: "rewrite", ...options });
}
