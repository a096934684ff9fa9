import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiProvider } from "../geminiProvider.js";

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function base64(text: string): string {
  return Buffer.from(text).toString("base64");
}

const provider = new GeminiProvider({
  apiKey: "test-key",
  model: "gemini-test",
  imageModel: "gemini-image-test",
  timeoutMs: 1000,
});

describe("GeminiProvider", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("generateText", () => {
    it("sends text and inline PDFs and joins candidate text", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          candidates: [{ content: { parts: [{ text: "Headline\n" }, { text: "Body. " }] } }],
          modelVersion: "gemini-test-001",
          usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 5, totalTokenCount: 15 },
        })
      );

      const result = await provider.generateText([
        { type: "text", text: "Prompt" },
        { type: "pdf", filename: "input2.pdf", data: new TextEncoder().encode("%PDF-1.4") },
      ]);

      expect(result).toEqual({
        status: "ok",
        text: "Headline\nBody.",
        model: "gemini-test-001",
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent");
      expect(init?.headers).toMatchObject({ "x-goog-api-key": "test-key" });
      expect(JSON.parse(String(init?.body))).toEqual({
        contents: [
          {
            role: "user",
            parts: [{ text: "Prompt" }, { inlineData: { mimeType: "application/pdf", data: base64("%PDF-1.4") } }],
          },
        ],
      });
    });

    it("maps 429 to rate_limited with the provider message", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: "Resource exhausted" } }, 429));

      expect(await provider.generateText([{ type: "text", text: "x" }])).toEqual({
        status: "error",
        error_type: "rate_limited",
        message: "Gemini error 429: Resource exhausted",
      });
    });

    it("maps other HTTP failures to provider_error", async () => {
      fetchMock.mockResolvedValueOnce(new Response("upstream down", { status: 503 }));

      expect(await provider.generateText([{ type: "text", text: "x" }])).toEqual({
        status: "error",
        error_type: "provider_error",
        message: "Gemini error 503: upstream down",
      });
    });

    it("treats an empty candidate list as invalid_response", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ candidates: [] }));

      expect(await provider.generateText([{ type: "text", text: "x" }])).toEqual({
        status: "error",
        error_type: "invalid_response",
        message: "Gemini returned empty content",
      });
    });

    it("reports network failures", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      expect(await provider.generateText([{ type: "text", text: "x" }])).toEqual({
        status: "error",
        error_type: "network",
        message: "Gemini request failed: fetch failed",
      });
    });

    it("reports a timeout when the request is aborted", async () => {
      const slow = new GeminiProvider({ apiKey: "test-key", model: "m", imageModel: "i", timeoutMs: 5 });
      fetchMock.mockImplementationOnce(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          })
      );

      expect(await slow.generateText([{ type: "text", text: "x" }])).toEqual({
        status: "error",
        error_type: "timeout",
        message: "LLM invocation timed out",
      });
    });
  });

  describe("generateImages", () => {
    it("calls the image model once per image and collects inline images", async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse({
            candidates: [
              {
                content: {
                  parts: [{ text: "Here you go" }, { inlineData: { mimeType: "image/png", data: base64("img1") } }],
                },
              },
            ],
          })
        )
        .mockResolvedValueOnce(
          jsonResponse({
            candidates: [{ content: { parts: [{ inlineData: { mimeType: "image/jpeg", data: base64("img2") } }] } }],
          })
        );

      const result = await provider.generateImages({ prompt: "Harbour at dawn", count: 2 });

      expect(result).toEqual({
        status: "ok",
        model: "gemini-image-test",
        images: [
          { bytes: new TextEncoder().encode("img1"), mime_type: "image/png" },
          { bytes: new TextEncoder().encode("img2"), mime_type: "image/jpeg" },
        ],
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      const [url, init] = fetchMock.mock.calls[1];
      expect(url).toBe("https://generativelanguage.googleapis.com/v1beta/models/gemini-image-test:generateContent");
      expect(JSON.parse(String(init?.body))).toEqual({
        contents: [{ role: "user", parts: [{ text: "Harbour at dawn" }] }],
        generationConfig: { responseModalities: ["TEXT", "IMAGE"] },
      });
    });

    it("fails when no image came back", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ candidates: [{ content: { parts: [{ text: "Sorry" }] } }] }));

      expect(await provider.generateImages({ prompt: "p", count: 1 })).toEqual({
        status: "error",
        error_type: "invalid_response",
        message: "Gemini returned no images",
      });
    });

    it("stops at the first failed call", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: "quota" } }, 429));

      const result = await provider.generateImages({ prompt: "p", count: 3 });

      expect(result).toMatchObject({ status: "error", error_type: "rate_limited" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
