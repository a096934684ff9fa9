import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadArticleContent, removeArticleFile } from "../loadArticleContent.js";
import { downloadStoredFile, removeStoredFile } from "../../storage/inputStorage.js";
import type { ArticleRecord } from "../articleTypes.js";

vi.mock("../../storage/inputStorage.js");

function article(overrides: Partial<ArticleRecord>): ArticleRecord {
  return {
    id: "0b8f3f0e-1f6c-4c1c-8c1a-3f7d2b1a9e10",
    type: "text",
    storage_path: "user/input1.txt",
    filename: "input1.txt",
    source: "Text Input",
    preview: "",
    added_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("loadArticleContent", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns trimmed text for text files", async () => {
    vi.mocked(downloadStoredFile).mockResolvedValueOnce(new TextEncoder().encode("  Story body \n"));

    expect(await loadArticleContent(article({}))).toEqual({
      kind: "text",
      article_id: "0b8f3f0e-1f6c-4c1c-8c1a-3f7d2b1a9e10",
      text: "Story body",
    });
  });

  it("returns bytes for PDFs", async () => {
    const bytes = new TextEncoder().encode("%PDF-1.7");
    vi.mocked(downloadStoredFile).mockResolvedValueOnce(bytes);

    const loaded = await loadArticleContent(article({ type: "pdf", filename: "input2.pdf", storage_path: "user/input2.pdf" }));

    expect(loaded).toEqual({
      kind: "pdf",
      article_id: "0b8f3f0e-1f6c-4c1c-8c1a-3f7d2b1a9e10",
      filename: "input2.pdf",
      data: bytes,
    });
  });

  it("skips empty and unreadable files", async () => {
    vi.mocked(downloadStoredFile).mockResolvedValueOnce(new TextEncoder().encode("   "));
    expect(await loadArticleContent(article({}))).toBeNull();

    vi.mocked(downloadStoredFile).mockRejectedValueOnce(new Error("Object not found"));
    expect(await loadArticleContent(article({}))).toBeNull();
    expect(console.warn).toHaveBeenCalledWith("[reframe] could not load article", {
      article_id: "0b8f3f0e-1f6c-4c1c-8c1a-3f7d2b1a9e10",
      storage_path: "user/input1.txt",
      msg: "Object not found",
    });
  });
});

describe("removeArticleFile", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports whether the delete succeeded", async () => {
    vi.mocked(removeStoredFile).mockResolvedValueOnce(undefined);
    expect(await removeArticleFile("user/input1.txt")).toBe(true);

    vi.mocked(removeStoredFile).mockRejectedValueOnce(new Error("denied"));
    expect(await removeArticleFile("user/input1.txt")).toBe(false);
  });
});
