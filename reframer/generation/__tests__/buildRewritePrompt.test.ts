import { describe, expect, it } from "vitest";
import { buildRewritePrompt } from "../buildRewritePrompt.js";

const CLOSING =
  "\nPlease process all the articles (both text and PDF) according to the guideline and generate a new, comprehensive article.";

describe("buildRewritePrompt", () => {
  it("numbers text articles and appends PDFs as separate parts", () => {
    const pdf = new TextEncoder().encode("%PDF-1.4 report");

    const parts = buildRewritePrompt({
      template: "TEMPLATE",
      instruction: "Be neutral.",
      articles: [
        { kind: "text", article_id: "a1", text: "First story" },
        { kind: "pdf", article_id: "a2", filename: "input2.pdf", data: pdf },
        { kind: "text", article_id: "a3", text: "Second story" },
      ],
    });

    expect(parts).toEqual([
      {
        type: "text",
        text:
          "TEMPLATE\n\n" +
          "TEXT ARTICLES TO PROCESS:\n" +
          "\n--- Text Article 1 ---\nFirst story\n" +
          "\n--- Text Article 2 ---\nSecond story\n" +
          "\nGUIDELINE/INSTRUCTION:\nBe neutral.\n" +
          "\nI'm also providing 1 PDF file(s) for you to process along with the text articles." +
          CLOSING,
      },
      { type: "pdf", filename: "input2.pdf", data: pdf },
    ]);
  });

  it("falls back to the default guideline and omits empty sections", () => {
    const parts = buildRewritePrompt({
      template: "TEMPLATE",
      instruction: "",
      articles: [{ kind: "text", article_id: "a1", text: "Only story" }],
    });

    expect(parts).toEqual([
      {
        type: "text",
        text:
          "TEMPLATE\n\n" +
          "TEXT ARTICLES TO PROCESS:\n" +
          "\n--- Text Article 1 ---\nOnly story\n" +
          "\nGUIDELINE/INSTRUCTION: No specific instruction provided. Use your best judgment for rewriting.\n" +
          CLOSING,
      },
    ]);
  });

  it("leaves out the text article header when only PDFs are given", () => {
    const a = new TextEncoder().encode("%PDF-a");
    const b = new TextEncoder().encode("%PDF-b");

    const parts = buildRewritePrompt({
      template: "T",
      instruction: "Summarise.",
      articles: [
        { kind: "pdf", article_id: "a1", filename: "input1.pdf", data: a },
        { kind: "pdf", article_id: "a2", filename: "input2.pdf", data: b },
      ],
    });

    expect(parts).toHaveLength(3);
    expect(parts[0]).toEqual({
      type: "text",
      text:
        "T\n\n\nGUIDELINE/INSTRUCTION:\nSummarise.\n" +
        "\nI'm also providing 2 PDF file(s) for you to process along with the text articles." +
        CLOSING,
    });
    expect(parts.slice(1).map((p) => (p.type === "pdf" ? p.filename : null))).toEqual(["input1.pdf", "input2.pdf"]);
  });
});
