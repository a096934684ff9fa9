import { errorMessage } from "../../logging/redactSecrets.js";
import { downloadStoredFile, removeStoredFile } from "../storage/inputStorage.js";
import type { ArticleRecord } from "./articleTypes.js";

export type LoadedArticle =
  | { kind: "text"; article_id: string; text: string }
  | { kind: "pdf"; article_id: string; filename: string; data: Uint8Array };

/**
 * Reads a stored article back. Empty or unreadable files yield null and are
 * left out of the rewrite.
 */
export async function loadArticleContent(article: ArticleRecord): Promise<LoadedArticle | null> {
  let bytes: Uint8Array;
  try {
    bytes = await downloadStoredFile(article.storage_path);
  } catch (e) {
    console.warn("[reframe] could not load article", {
      article_id: article.id,
      storage_path: article.storage_path,
      msg: errorMessage(e),
    });
    return null;
  }

  if (article.filename.toLowerCase().endsWith(".pdf")) {
    if (bytes.byteLength === 0) return null;
    return { kind: "pdf", article_id: article.id, filename: article.filename, data: bytes };
  }

  const text = new TextDecoder("utf-8").decode(bytes).trim();
  if (text.length === 0) return null;
  return { kind: "text", article_id: article.id, text };
}

export async function removeArticleFile(storage_path: string): Promise<boolean> {
  try {
    await removeStoredFile(storage_path);
    return true;
  } catch (e) {
    console.warn("[reframe] could not delete article file", { storage_path, msg: errorMessage(e) });
    return false;
  }
}
