import type { ArticleRecord } from "../articles/articleTypes.js";
import { DraftInputError } from "../errors.js";
import type { DraftRecord, DraftSummary } from "./draftTypes.js";

// Drafts are treated as values: every operation returns a new record.

export function setDraftTitle(draft: DraftRecord, rawTitle: string): DraftRecord {
  const title = rawTitle.trim();
  if (title.length === 0) {
    throw new DraftInputError("Please enter a title.");
  }
  return { ...draft, title };
}

export function addDraftArticle(draft: DraftRecord, article: ArticleRecord): DraftRecord {
  return { ...draft, articles: [...draft.articles, article] };
}

export function removeDraftArticle(
  draft: DraftRecord,
  articleId: string
): { draft: DraftRecord; removed: ArticleRecord | null } {
  const removed = draft.articles.find((a) => a.id === articleId) ?? null;
  if (!removed) return { draft, removed: null };
  return {
    draft: { ...draft, articles: draft.articles.filter((a) => a.id !== articleId) },
    removed,
  };
}

export function setDraftImageCount(draft: DraftRecord, count: number, max: number): DraftRecord {
  if (!Number.isInteger(count) || count < 0 || count > max) {
    throw new DraftInputError(`Image count must be a whole number between 0 and ${max}.`);
  }
  return { ...draft, image_count: count };
}

export function isDraftReady(draft: DraftRecord): boolean {
  return draft.title.trim().length > 0 && draft.articles.length > 0;
}

export function summarizeDraft(draft: DraftRecord): DraftSummary {
  return {
    title: draft.title,
    article_count: draft.articles.length,
    has_instruction: draft.instruction.length > 0 || draft.preset_id !== null,
    is_ready: isDraftReady(draft),
    image_count: draft.image_count,
  };
}

export function hasDraftData(draft: DraftRecord): boolean {
  return (
    draft.title.length > 0 ||
    draft.articles.length > 0 ||
    draft.instruction.length > 0 ||
    draft.preset_id !== null
  );
}
