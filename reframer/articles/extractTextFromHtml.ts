import * as cheerio from "cheerio";

export type ExtractedHtml = {
  title: string | null;
  text: string;
};

// Page chrome that never belongs to the article body.
const CHROME_SELECTORS = [
  "script",
  "style",
  "noscript",
  "template",
  "iframe",
  "svg",
  "nav",
  "header",
  "footer",
  "aside",
  "form",
  "figure",
  "button",
  '[role="banner"]',
  '[role="navigation"]',
  '[role="complementary"]',
  ".ad",
  ".advert",
  ".advertisement",
  ".related-links",
  ".comments",
  ".social-links",
  ".share-buttons",
  ".cookie-banner",
  ".subscription-prompt",
  ".author-bio",
  "#sidebar",
].join(", ");

const BLOCK_SELECTORS = "h1, h2, h3, h4, p, li, blockquote";

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function extractTextFromHtml(html: string): ExtractedHtml {
  const $ = cheerio.load(html);

  const title =
    collapse($('meta[property="og:title"]').attr("content") ?? "") ||
    collapse($("title").first().text()) ||
    collapse($("h1").first().text());

  $(CHROME_SELECTORS).remove();

  const article = $("article").first();
  const main = $("main").first();
  const root = article.length > 0 ? article : main.length > 0 ? main : $("body");

  const blocks: string[] = [];
  root.find(BLOCK_SELECTORS).each((_, el) => {
    const node = $(el);
    // Containers are represented by their inner blocks.
    if (node.find(BLOCK_SELECTORS).length > 0) return;
    const text = collapse(node.text());
    if (text) blocks.push(text);
  });

  return {
    title: title || null,
    text: blocks.length > 0 ? blocks.join("\n\n") : collapse(root.text()),
  };
}
