import { zValidator } from "@hono/zod-validator";
import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { z } from "zod";
import { reframeLogHelpers } from "../../logging/reframeLog.js";
import { errorMessage, safeRedact } from "../../logging/redactSecrets.js";
import type { ArticleRecord } from "../articles/articleTypes.js";
import { removeArticleFile } from "../articles/loadArticleContent.js";
import { savePdfArticle, saveTextArticle, saveUrlArticle } from "../articles/saveArticle.js";
import { getConfig, type ReframerConfig } from "../config/loadConfig.js";
import { applyDraftInstruction, type InstructionChange } from "../drafts/applyDraftInstruction.js";
import { discardDraft } from "../drafts/discardDraft.js";
import {
  addDraftArticle,
  hasDraftData,
  removeDraftArticle,
  setDraftImageCount,
  setDraftTitle,
  summarizeDraft,
} from "../drafts/draftOperations.js";
import { loadDraft, updateDraft } from "../drafts/draftStore.js";
import type { DraftRecord } from "../drafts/draftTypes.js";
import { ArticleInputError, ArticleNotFoundError, ReframerError, TaskNotFoundError } from "../errors.js";
import { getPresetInstructions } from "../instructions/loadPresets.js";
import { createImageUrl } from "../storage/outputStorage.js";
import { createTaskFromDraft } from "../tasks/createTaskFromDraft.js";
import { processTask } from "../tasks/processTask.js";
import { getTaskForUser, listTasksForUser } from "../tasks/taskStore.js";
import { userSession, type SessionEnv } from "./session.js";

const TitleBody = z.object({ title: z.string() });
const TextArticleBody = z.object({ text: z.string() });
const UrlArticleBody = z.object({ url: z.string() });
const InstructionBody = z.object({
  preset: z.string().nullish(),
  instruction: z.string().nullish(),
});
const ImagesBody = z.object({ image_count: z.number().int().min(0) });
const CreateTaskBody = z.object({ title: z.string().optional() });
const TaskParams = z.object({ taskId: z.string().uuid() });
const ArticleParams = z.object({ articleId: z.string().min(1) });

type ValidationResult = { success: true } | { success: false; error: z.ZodError };

function rejectInvalid(result: ValidationResult, c: Context<SessionEnv>) {
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    return c.json({ error: "Invalid request", details: detail }, 400);
  }
}

function draftView(draft: DraftRecord) {
  return { draft, summary: summarizeDraft(draft), has_data: hasDraftData(draft) };
}

async function addArticleToDraft(user_id: string, article: ArticleRecord): Promise<DraftRecord> {
  let draft: DraftRecord;
  try {
    draft = await updateDraft(user_id, (current) => addDraftArticle(current, article));
  } catch (e) {
    // No draft entry refers to the stored file.
    await removeArticleFile(article.storage_path);
    throw e;
  }
  reframeLogHelpers.articleAdded({
    user_id,
    article_id: article.id,
    article_type: article.type,
    filename: article.filename,
  });
  return draft;
}

async function requireTask(task_id: string, user_id: string) {
  const task = await getTaskForUser(task_id, user_id);
  if (!task) throw new TaskNotFoundError(task_id);
  return task;
}

export function createApp(config: ReframerConfig = getConfig()) {
  const app = new Hono<SessionEnv>();

  app.use("*", logger());
  app.use("*", secureHeaders());
  app.use(
    "*",
    bodyLimit({
      maxSize: config.maxUploadBytes,
      onError: (c) => c.json({ error: "File too large." }, 413),
    })
  );

  app.get("/health", (c) => c.json({ ok: true, service: "reframer" }));

  // Registered after /health, so health checks get no session cookie.
  app.use("*", userSession(config.secretKey));

  app.get("/task/new", async (c) => {
    return c.json(draftView(await loadDraft(c.get("user_id"))));
  });

  app.delete("/task/new", async (c) => {
    const result = await discardDraft(c.get("user_id"));
    return c.json({ discarded: true, ...result });
  });

  app.post("/task/new/title", zValidator("json", TitleBody, rejectInvalid), async (c) => {
    const { title } = c.req.valid("json");
    const draft = await updateDraft(c.get("user_id"), (current) => setDraftTitle(current, title));
    return c.json(draftView(draft));
  });

  app.post("/task/new/articles/text", zValidator("json", TextArticleBody, rejectInvalid), async (c) => {
    const user_id = c.get("user_id");
    const article = await saveTextArticle(user_id, c.req.valid("json").text);
    const draft = await addArticleToDraft(user_id, article);
    return c.json({ article, summary: summarizeDraft(draft) }, 201);
  });

  app.post("/task/new/articles/pdf", async (c) => {
    const user_id = c.get("user_id");
    const body = await c.req.parseBody();
    const file = body["pdf_file"];
    if (!(file instanceof File)) {
      throw new ArticleInputError("No PDF file selected.");
    }

    const article = await savePdfArticle(user_id, {
      filename: file.name,
      bytes: new Uint8Array(await file.arrayBuffer()),
    });
    const draft = await addArticleToDraft(user_id, article);
    return c.json({ article, summary: summarizeDraft(draft) }, 201);
  });

  app.post("/task/new/articles/url", zValidator("json", UrlArticleBody, rejectInvalid), async (c) => {
    const user_id = c.get("user_id");
    const article = await saveUrlArticle(user_id, c.req.valid("json").url);
    const draft = await addArticleToDraft(user_id, article);
    return c.json({ article, summary: summarizeDraft(draft) }, 201);
  });

  app.delete("/task/new/articles/:articleId", zValidator("param", ArticleParams, rejectInvalid), async (c) => {
    const user_id = c.get("user_id");
    const { articleId } = c.req.valid("param");

    const last: { removed: ArticleRecord | null } = { removed: null };
    const saved = await updateDraft(user_id, (current) => {
      const outcome = removeDraftArticle(current, articleId);
      if (!outcome.removed) throw new ArticleNotFoundError(articleId);
      last.removed = outcome.removed;
      return outcome.draft;
    });
    const removed = last.removed;
    if (!removed) throw new ArticleNotFoundError(articleId);

    const file_deleted = await removeArticleFile(removed.storage_path);
    reframeLogHelpers.articleRemoved({ user_id, article_id: removed.id });
    return c.json({ removed, file_deleted, summary: summarizeDraft(saved) });
  });

  app.get("/task/presets", async (c) => {
    return c.json({ presets: await getPresetInstructions(config.promptsDir) });
  });

  app.put("/task/new/instruction", zValidator("json", InstructionBody, rejectInvalid), async (c) => {
    const user_id = c.get("user_id");
    const presets = await getPresetInstructions(config.promptsDir);
    const known = new Set(presets.map((p) => p.name));
    const last: { change: InstructionChange | null } = { change: null };
    const draft = await updateDraft(user_id, (current) => {
      const outcome = applyDraftInstruction(current, c.req.valid("json"), known);
      last.change = outcome.change;
      return outcome.draft;
    });
    return c.json({ change: last.change, ...draftView(draft) });
  });

  app.put("/task/new/images", zValidator("json", ImagesBody, rejectInvalid), async (c) => {
    const user_id = c.get("user_id");
    const { image_count } = c.req.valid("json");
    const draft = await updateDraft(user_id, (current) =>
      setDraftImageCount(current, image_count, config.maxImagesPerTask)
    );
    return c.json(draftView(draft));
  });

  app.post("/task/new/create", zValidator("json", CreateTaskBody, rejectInvalid), async (c) => {
    const task = await createTaskFromDraft(c.get("user_id"), c.req.valid("json"));
    return c.json({ task_id: task.task_id, task }, 201);
  });

  app.get("/task", async (c) => {
    return c.json({ tasks: await listTasksForUser(c.get("user_id")) });
  });

  app.get("/task/:taskId", zValidator("param", TaskParams, rejectInvalid), async (c) => {
    return c.json({ task: await requireTask(c.req.valid("param").taskId, c.get("user_id")) });
  });

  app.post("/task/:taskId/process", zValidator("param", TaskParams, rejectInvalid), async (c) => {
    const task = await processTask(c.req.valid("param").taskId, c.get("user_id"));
    return c.json({ task });
  });

  app.get("/task/:taskId/images", zValidator("param", TaskParams, rejectInvalid), async (c) => {
    const task = await requireTask(c.req.valid("param").taskId, c.get("user_id"));
    const images = await Promise.all(
      task.image_paths.map(async (path) => ({ path, url: await createImageUrl(path) }))
    );
    return c.json({ task_id: task.task_id, images, image_error: task.image_error });
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof ReframerError) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    console.error("[reframe-server] unhandled error", {
      method: c.req.method,
      path: c.req.path,
      msg: safeRedact(errorMessage(err)),
    });
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
