import { reframeLogHelpers } from "../../logging/reframeLog.js";
import { errorMessage, safeRedact } from "../../logging/redactSecrets.js";
import { createProvider } from "../../llm/createProvider.js";
import type { LlmErrorType, LlmProvider } from "../../llm/types.js";
import { loadArticleContent, type LoadedArticle } from "../articles/loadArticleContent.js";
import { getConfig } from "../config/loadConfig.js";
import { TaskAlreadyProcessingError, TaskNotFoundError } from "../errors.js";
import { buildRewritePrompt } from "../generation/buildRewritePrompt.js";
import { generateArticleImages } from "../generation/generateArticleImages.js";
import { loadPromptTemplate } from "../generation/loadPromptTemplate.js";
import type { RetryOptions } from "../generation/retryPolicy.js";
import { rewriteArticles } from "../generation/rewriteArticles.js";
import { getPresetContent } from "../instructions/loadPresets.js";
import { claimTaskForProcessing, completeTask, failTask, getTaskForUser } from "./taskStore.js";
import type { TaskRecord } from "./taskTypes.js";

export type ProcessTaskOptions = RetryOptions & {
  provider?: LlmProvider;
};

class RewriteFailedError extends Error {
  constructor(message: string, readonly error_type: LlmErrorType, readonly attempts: number) {
    super(message);
    this.name = "RewriteFailedError";
  }
}

async function resolveInstruction(task: TaskRecord): Promise<string> {
  if (task.instruction.length > 0) return task.instruction;
  if (task.preset_id) return (await getPresetContent(task.preset_id)) ?? "";
  return "";
}

async function renderImages(params: {
  provider: LlmProvider;
  task: TaskRecord;
  article: string;
  count: number;
  retry: RetryOptions;
}): Promise<{ image_paths: string[]; image_error: string | null }> {
  const { task } = params;
  try {
    const images = await generateArticleImages(
      {
        provider: params.provider,
        user_id: task.user_id,
        task_id: task.task_id,
        title: task.title,
        article: params.article,
        count: params.count,
      },
      params.retry
    );

    if (images.status === "error") {
      const message = safeRedact(images.message);
      reframeLogHelpers.imagesFailed({
        user_id: task.user_id,
        task_id: task.task_id,
        error_type: images.error_type,
        error_message: message,
      });
      return { image_paths: [], image_error: message };
    }

    reframeLogHelpers.imagesSucceeded({ user_id: task.user_id, task_id: task.task_id, count: images.image_paths.length });
    return { image_paths: images.image_paths, image_error: null };
  } catch (e) {
    const message = safeRedact(errorMessage(e));
    reframeLogHelpers.imagesFailed({
      user_id: task.user_id,
      task_id: task.task_id,
      error_type: "storage_error",
      error_message: message,
    });
    return { image_paths: [], image_error: message };
  }
}

/**
 * Runs one task end to end and returns it in its terminal state. Only a
 * missing task or a task that is already being processed throws; every other
 * failure is stored on the task.
 */
export async function processTask(
  task_id: string,
  user_id: string,
  options: ProcessTaskOptions = {}
): Promise<TaskRecord> {
  const config = getConfig();

  const existing = await getTaskForUser(task_id, user_id);
  if (!existing) throw new TaskNotFoundError(task_id);

  const staleCutoff = new Date(Date.now() - config.staleProcessingMs);
  const task = await claimTaskForProcessing(task_id, user_id, staleCutoff);
  if (!task) throw new TaskAlreadyProcessingError(task_id);

  const retry: RetryOptions = { sleep: options.sleep };
  const startedAt = Date.now();
  reframeLogHelpers.processStarted({ user_id, task_id, article_count: task.articles.length });

  try {
    const template = await loadPromptTemplate(config.promptsDir);
    const instruction = await resolveInstruction(task);

    const loaded: LoadedArticle[] = [];
    for (const article of task.articles) {
      const content = await loadArticleContent(article);
      if (content) loaded.push(content);
    }
    if (loaded.length === 0) throw new Error("No articles found to process");

    const provider = options.provider ?? createProvider(config);
    const parts = buildRewritePrompt({ template, articles: loaded, instruction });
    const { result, attempts } = await rewriteArticles(provider, parts, retry);
    if (result.status === "error") {
      throw new RewriteFailedError(result.message, result.error_type, attempts);
    }

    const count = Math.min(task.image_count, config.maxImagesPerTask);
    const images =
      count > 0
        ? await renderImages({ provider, task, article: result.text, count, retry })
        : { image_paths: [], image_error: null };

    const completed = await completeTask(task_id, { result: result.text, model: result.model, ...images });
    reframeLogHelpers.processSucceeded({
      user_id,
      task_id,
      model: result.model,
      attempt: attempts,
      duration_ms: Date.now() - startedAt,
    });
    return completed;
  } catch (e) {
    const message = safeRedact(errorMessage(e));
    reframeLogHelpers.processFailed({
      user_id,
      task_id,
      error_type: e instanceof RewriteFailedError ? e.error_type : "task_error",
      error_message: message,
      attempt: e instanceof RewriteFailedError ? e.attempts : undefined,
    });
    return failTask(task_id, message);
  }
}
