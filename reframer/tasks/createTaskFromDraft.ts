import { randomUUID } from "node:crypto";
import { reframeLogHelpers } from "../../logging/reframeLog.js";
import { isDraftReady, setDraftTitle } from "../drafts/draftOperations.js";
import { deleteDraft, loadDraft } from "../drafts/draftStore.js";
import { DraftNotReadyError } from "../errors.js";
import { insertTask } from "./taskStore.js";
import type { TaskRecord } from "./taskTypes.js";

/**
 * Turns the user's draft into a pending task. The draft row is cleared but
 * the article files stay in place: the task still reads them.
 */
export async function createTaskFromDraft(user_id: string, input: { title?: string } = {}): Promise<TaskRecord> {
  let draft = await loadDraft(user_id);
  if (input.title !== undefined && input.title.trim().length > 0) {
    draft = setDraftTitle(draft, input.title);
  }
  if (!isDraftReady(draft)) throw new DraftNotReadyError();

  const task = await insertTask({
    task_id: randomUUID(),
    user_id,
    title: draft.title,
    articles: draft.articles,
    instruction: draft.instruction,
    preset_id: draft.preset_id,
    image_count: draft.image_count,
    status: "pending",
    result: null,
    error: null,
    model: null,
    image_paths: [],
    image_error: null,
    created_at: new Date().toISOString(),
    processing_started_at: null,
    completed_at: null,
  });

  await deleteDraft(user_id);
  reframeLogHelpers.taskCreated({ user_id, task_id: task.task_id, article_count: task.articles.length });
  return task;
}
