import axios, { type AxiosResponse } from "axios";
import { ArticleInputError } from "../errors.js";
import { extractTextFromHtml } from "./extractTextFromHtml.js";
import { looksLikePdf } from "./isAllowedUpload.js";

export type FetchedArticle =
  | { kind: "html"; url: string; title: string | null; text: string }
  | { kind: "pdf"; url: string; bytes: Uint8Array };

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export function parseArticleUrl(raw: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new ArticleInputError("Please enter a valid URL.");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ArticleInputError("Only http and https URLs are supported.");
  }
  return parsed;
}

export async function fetchArticleFromUrl(
  rawUrl: string,
  options: { timeoutMs: number; maxBytes: number }
): Promise<FetchedArticle> {
  const url = parseArticleUrl(rawUrl).href;

  let response: AxiosResponse<ArrayBuffer>;
  try {
    response = await axios.get<ArrayBuffer>(url, {
      responseType: "arraybuffer",
      timeout: options.timeoutMs,
      maxContentLength: options.maxBytes,
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8",
      },
      validateStatus: () => true,
    });
  } catch (e) {
    const reason = axios.isAxiosError(e) ? e.code ?? e.message : String(e);
    throw new ArticleInputError(`Could not fetch ${url}: ${reason}`);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new ArticleInputError(`Could not fetch ${url}: HTTP ${response.status}`);
  }

  const contentType = String(response.headers["content-type"] ?? "").toLowerCase();
  const bytes = new Uint8Array(response.data);

  if (contentType.includes("application/pdf") || looksLikePdf(bytes)) {
    return { kind: "pdf", url, bytes };
  }

  if (contentType === "" || contentType.includes("html") || contentType.startsWith("text/")) {
    const { title, text } = extractTextFromHtml(new TextDecoder("utf-8").decode(bytes));
    if (text.length === 0) {
      throw new ArticleInputError("No readable article text found at the URL.");
    }
    return { kind: "html", url, title, text };
  }

  throw new ArticleInputError(`Unsupported content type at URL: ${contentType}`);
}
