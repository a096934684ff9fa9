import { randomUUID } from "node:crypto";
import { errorMessage } from "../../logging/redactSecrets.js";
import { getConfig } from "../config/loadConfig.js";
import { ArticleInputError, UploadTooLargeError } from "../errors.js";
import { listInputFileNames, uploadInputFile } from "../storage/inputStorage.js";
import type { ArticleRecord, ArticleType } from "./articleTypes.js";
import { buildArticlePreview } from "./buildArticlePreview.js";
import { fetchArticleFromUrl } from "./fetchArticleFromUrl.js";
import { getNextInputNumber } from "./getNextInputNumber.js";
import { looksLikePdf, uploadExtension } from "./isAllowedUpload.js";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const PDF_CONTENT_TYPE = "application/pdf";
const MAX_NUMBERING_ATTEMPTS = 3;

export type UploadedFile = {
  filename: string;
  bytes: Uint8Array;
};

function isAlreadyExists(e: unknown): boolean {
  return /already exists|duplicate/i.test(errorMessage(e));
}

/**
 * Stores bytes as the user's next `input<N>.<ext>`. A concurrent upload that
 * took the same number makes us re-read the folder and try the next one.
 */
async function storeNextInput(params: {
  user_id: string;
  ext: "txt" | "pdf";
  bytes: Uint8Array;
  contentType: string;
}): Promise<{ filename: string; storage_path: string }> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= MAX_NUMBERING_ATTEMPTS; attempt++) {
    const names = await listInputFileNames(params.user_id);
    const filename = `input${getNextInputNumber(names)}.${params.ext}`;
    try {
      const storage_path = await uploadInputFile({
        user_id: params.user_id,
        filename,
        bytes: params.bytes,
        contentType: params.contentType,
      });
      return { filename, storage_path };
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
      lastError = e;
    }
  }
  throw lastError;
}

function buildRecord(params: {
  type: ArticleType;
  filename: string;
  storage_path: string;
  source: string;
  preview: string;
}): ArticleRecord {
  return {
    id: randomUUID(),
    added_at: new Date().toISOString(),
    ...params,
  };
}

export async function saveTextArticle(
  user_id: string,
  rawText: string,
  source = "Text Input"
): Promise<ArticleRecord> {
  const text = rawText.trim();
  if (text.length === 0) {
    throw new ArticleInputError("Please enter article text.");
  }

  const stored = await storeNextInput({
    user_id,
    ext: "txt",
    bytes: new TextEncoder().encode(text),
    contentType: TEXT_CONTENT_TYPE,
  });

  return buildRecord({
    type: "text",
    ...stored,
    source,
    preview: buildArticlePreview(text),
  });
}

export async function savePdfArticle(user_id: string, upload: UploadedFile): Promise<ArticleRecord> {
  const filename = upload.filename.trim();
  if (filename.length === 0) {
    throw new ArticleInputError("No PDF file selected.");
  }

  const ext = uploadExtension(filename);
  if (!ext) {
    throw new ArticleInputError("Please upload a valid PDF file.");
  }

  const { maxUploadBytes } = getConfig();
  if (upload.bytes.byteLength > maxUploadBytes) {
    throw new UploadTooLargeError(upload.bytes.byteLength, maxUploadBytes);
  }
  if (upload.bytes.byteLength === 0) {
    throw new ArticleInputError("The uploaded file is empty.");
  }

  if (ext === "txt") {
    return saveTextArticle(user_id, new TextDecoder("utf-8").decode(upload.bytes), "Text Upload");
  }

  if (!looksLikePdf(upload.bytes)) {
    throw new ArticleInputError("Please upload a valid PDF file.");
  }

  const stored = await storeNextInput({
    user_id,
    ext: "pdf",
    bytes: upload.bytes,
    contentType: PDF_CONTENT_TYPE,
  });

  return buildRecord({
    type: "pdf",
    ...stored,
    source: "PDF Upload",
    preview: `PDF file: ${stored.filename}`,
  });
}

export async function saveUrlArticle(user_id: string, url: string): Promise<ArticleRecord> {
  const config = getConfig();
  const fetched = await fetchArticleFromUrl(url, {
    timeoutMs: config.urlFetchTimeoutMs,
    maxBytes: config.maxUploadBytes,
  });

  if (fetched.kind === "pdf") {
    const stored = await storeNextInput({
      user_id,
      ext: "pdf",
      bytes: fetched.bytes,
      contentType: PDF_CONTENT_TYPE,
    });
    return buildRecord({
      type: "url",
      ...stored,
      source: fetched.url,
      preview: `PDF file: ${stored.filename}`,
    });
  }

  const content = fetched.title ? `${fetched.title}\n\n${fetched.text}` : fetched.text;
  const stored = await storeNextInput({
    user_id,
    ext: "txt",
    bytes: new TextEncoder().encode(content),
    contentType: TEXT_CONTENT_TYPE,
  });

  return buildRecord({
    type: "url",
    ...stored,
    source: fetched.url,
    preview: buildArticlePreview(content),
  });
}
