import type { LlmError, LlmProvider } from "../../llm/types.js";
import { generatedImagePath, uploadGeneratedImage } from "../storage/outputStorage.js";
import { buildImagePrompt } from "./buildImagePrompt.js";
import { invokeWithRetries, isLlmError, type RetryOptions } from "./retryPolicy.js";

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

/**
 * Asks the provider for `count` illustrations and stores them in the output
 * bucket as `<user_id>/<task_id>/image<i>.<ext>`, numbered from 1.
 * Storage failures throw.
 */
export async function generateArticleImages(
  params: {
    provider: LlmProvider;
    user_id: string;
    task_id: string;
    title: string;
    article: string;
    count: number;
  },
  options: RetryOptions = {}
): Promise<{ status: "ok"; image_paths: string[] } | LlmError> {
  if (params.count <= 0) return { status: "ok", image_paths: [] };

  const prompt = buildImagePrompt(params.title, params.article);
  const { result } = await invokeWithRetries(
    () => params.provider.generateImages({ prompt, count: params.count }),
    { label: "images", ...options }
  );
  if (isLlmError(result)) return result;

  const image_paths: string[] = [];
  for (const [i, image] of result.images.slice(0, params.count).entries()) {
    const path = generatedImagePath({
      user_id: params.user_id,
      task_id: params.task_id,
      index: i + 1,
      ext: EXTENSIONS[image.mime_type] ?? "png",
    });
    await uploadGeneratedImage({ path, bytes: image.bytes, contentType: image.mime_type });
    image_paths.push(path);
  }

  return { status: "ok", image_paths };
}
