import type { ContentPart } from "../../llm/types.js";
import type { LoadedArticle } from "../articles/loadArticleContent.js";

const NO_INSTRUCTION = "No specific instruction provided. Use your best judgment for rewriting.";

/**
 * One text part carrying the template, every text article and the guideline,
 * followed by one part per PDF in article order.
 */
export function buildRewritePrompt(params: {
  template: string;
  articles: LoadedArticle[];
  instruction: string;
}): ContentPart[] {
  const texts: string[] = [];
  const pdfs: ContentPart[] = [];
  for (const article of params.articles) {
    if (article.kind === "text") {
      texts.push(article.text);
    } else {
      pdfs.push({ type: "pdf", filename: article.filename, data: article.data });
    }
  }

  let prompt = `${params.template}\n\n`;

  if (texts.length > 0) {
    prompt += "TEXT ARTICLES TO PROCESS:\n";
    texts.forEach((text, i) => {
      prompt += `\n--- Text Article ${i + 1} ---\n${text}\n`;
    });
  }

  prompt += params.instruction
    ? `\nGUIDELINE/INSTRUCTION:\n${params.instruction}\n`
    : `\nGUIDELINE/INSTRUCTION: ${NO_INSTRUCTION}\n`;

  if (pdfs.length > 0) {
    prompt += `\nI'm also providing ${pdfs.length} PDF file(s) for you to process along with the text articles.`;
  }

  prompt +=
    "\nPlease process all the articles (both text and PDF) according to the guideline and generate a new, comprehensive article.";

  return [{ type: "text", text: prompt }, ...pdfs];
}
