export const IMAGE_PROMPT_ARTICLE_CHARS = 1500;

export function buildImagePrompt(title: string, article: string): string {
  const excerpt = article.trim().slice(0, IMAGE_PROMPT_ARTICLE_CHARS);
  return [
    "Create an editorial illustration to accompany a news article.",
    `Headline: ${title.trim()}`,
    "Article excerpt:",
    excerpt,
    "Depict the main subject of the story in a realistic, documentary style suitable for a news website.",
    "Do not include any text, captions, logos or watermarks in the image.",
  ].join("\n\n");
}
