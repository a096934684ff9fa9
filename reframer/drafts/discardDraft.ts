import { reframeLogHelpers } from "../../logging/reframeLog.js";
import { removeArticleFile } from "../articles/loadArticleContent.js";
import { deleteDraft, loadDraft } from "./draftStore.js";

/**
 * Throws the draft away together with the files its articles point at.
 * Files that fail to delete are logged and left behind.
 */
export async function discardDraft(user_id: string): Promise<{ removed_articles: number; failed_files: number }> {
  const draft = await loadDraft(user_id);
  await deleteDraft(user_id);

  let failed_files = 0;
  for (const article of draft.articles) {
    const ok = await removeArticleFile(article.storage_path);
    if (ok) {
      reframeLogHelpers.articleRemoved({ user_id, article_id: article.id });
    } else {
      failed_files++;
    }
  }

  return { removed_articles: draft.articles.length, failed_files };
}
