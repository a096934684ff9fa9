const PREVIEW_LENGTH = 50;

// Counted in code points, so an emoji is never split.
export function buildArticlePreview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join("")}...` : text;
}
