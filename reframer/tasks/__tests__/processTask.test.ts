import { beforeEach, describe, expect, it, vi } from "vitest";
import type { LlmProvider, TextGenerationResult } from "../../../llm/types.js";
import { loadArticleContent } from "../../articles/loadArticleContent.js";
import { TaskAlreadyProcessingError, TaskNotFoundError } from "../../errors.js";
import { generateArticleImages } from "../../generation/generateArticleImages.js";
import { loadPromptTemplate } from "../../generation/loadPromptTemplate.js";
import { getPresetContent } from "../../instructions/loadPresets.js";
import { processTask } from "../processTask.js";
import { claimTaskForProcessing, completeTask, failTask, getTaskForUser } from "../taskStore.js";
import type { TaskRecord } from "../taskTypes.js";

vi.mock("../taskStore.js");
vi.mock("../../articles/loadArticleContent.js");
vi.mock("../../generation/loadPromptTemplate.js");
vi.mock("../../generation/generateArticleImages.js");
vi.mock("../../instructions/loadPresets.js");

const USER = "0e5a1d2c-3b4f-4a6e-8c7d-9f0a1b2c3d4e";
const TASK_ID = "b7c1d2e3-f4a5-4b6c-8d7e-9f0a1b2c3d4e";

function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    task_id: TASK_ID,
    user_id: USER,
    title: "Harbour reopens",
    articles: [
      {
        id: "8f14e45f-ceea-4e67-a5a3-0c2b1d6f8a01",
        type: "text",
        storage_path: `${USER}/input1.txt`,
        filename: "input1.txt",
        source: "Text Input",
        preview: "Ships...",
        added_at: "2026-03-01T10:00:00.000Z",
      },
    ],
    instruction: "",
    preset_id: null,
    image_count: 0,
    status: "pending",
    result: null,
    error: null,
    model: null,
    image_paths: [],
    image_error: null,
    created_at: "2026-03-01T10:05:00.000Z",
    processing_started_at: null,
    completed_at: null,
    ...overrides,
  };
}

function fakeProvider(result: TextGenerationResult) {
  const generateText = vi.fn(async () => result);
  const provider: LlmProvider = {
    name: "gemini",
    model: "fake-model",
    generateText,
    generateImages: vi.fn(),
  };
  return { provider, generateText };
}

const noWait = async () => undefined;

describe("processTask", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.mocked(loadPromptTemplate).mockResolvedValue("TEMPLATE");
    vi.mocked(loadArticleContent).mockResolvedValue({
      kind: "text",
      article_id: "8f14e45f-ceea-4e67-a5a3-0c2b1d6f8a01",
      text: "Ships returned on Monday.",
    });
    vi.mocked(completeTask).mockImplementation(async (task_id, outcome) =>
      makeTask({ task_id, status: "completed", ...outcome })
    );
    vi.mocked(failTask).mockImplementation(async (task_id, error) => makeTask({ task_id, status: "failed", error }));
  });

  it("throws when the task does not belong to the user", async () => {
    vi.mocked(getTaskForUser).mockResolvedValue(null);

    await expect(processTask(TASK_ID, USER)).rejects.toBeInstanceOf(TaskNotFoundError);
    expect(claimTaskForProcessing).not.toHaveBeenCalled();
  });

  it("throws when another run holds the task", async () => {
    vi.mocked(getTaskForUser).mockResolvedValue(makeTask({ status: "processing" }));
    vi.mocked(claimTaskForProcessing).mockResolvedValue(null);

    await expect(processTask(TASK_ID, USER)).rejects.toBeInstanceOf(TaskAlreadyProcessingError);
  });

  it("rewrites with the preset guideline and stores images", async () => {
    const task = makeTask({ preset_id: "news", image_count: 2 });
    vi.mocked(getTaskForUser).mockResolvedValue(task);
    vi.mocked(claimTaskForProcessing).mockResolvedValue({ ...task, status: "processing" });
    vi.mocked(getPresetContent).mockResolvedValue("Use the inverted pyramid.");
    vi.mocked(generateArticleImages).mockResolvedValue({
      status: "ok",
      image_paths: [`${USER}/${TASK_ID}/image1.png`, `${USER}/${TASK_ID}/image2.png`],
    });
    const { provider, generateText } = fakeProvider({ status: "ok", text: "New article", model: "gemini-x" });

    const result = await processTask(TASK_ID, USER, { provider, sleep: noWait });

    expect(getPresetContent).toHaveBeenCalledWith("news");
    expect(generateText).toHaveBeenCalledWith([
      {
        type: "text",
        text:
          "TEMPLATE\n\nTEXT ARTICLES TO PROCESS:\n\n--- Text Article 1 ---\nShips returned on Monday.\n" +
          "\nGUIDELINE/INSTRUCTION:\nUse the inverted pyramid.\n" +
          "\nPlease process all the articles (both text and PDF) according to the guideline and generate a new, comprehensive article.",
      },
    ]);
    expect(generateArticleImages).toHaveBeenCalledWith(
      { provider, user_id: USER, task_id: TASK_ID, title: "Harbour reopens", article: "New article", count: 2 },
      { sleep: noWait }
    );
    expect(completeTask).toHaveBeenCalledWith(TASK_ID, {
      result: "New article",
      model: "gemini-x",
      image_paths: [`${USER}/${TASK_ID}/image1.png`, `${USER}/${TASK_ID}/image2.png`],
      image_error: null,
    });
    expect(result.status).toBe("completed");
    expect(failTask).not.toHaveBeenCalled();
  });

  it("prefers the custom instruction and skips images when none are requested", async () => {
    const task = makeTask({ instruction: "Write for commuters." });
    vi.mocked(getTaskForUser).mockResolvedValue(task);
    vi.mocked(claimTaskForProcessing).mockResolvedValue(task);
    const { provider, generateText } = fakeProvider({ status: "ok", text: "Article", model: "m" });

    await processTask(TASK_ID, USER, { provider, sleep: noWait });

    expect(getPresetContent).not.toHaveBeenCalled();
    expect(generateText.mock.calls[0]).toEqual([
      [expect.objectContaining({ text: expect.stringContaining("\nGUIDELINE/INSTRUCTION:\nWrite for commuters.\n") })],
    ]);
    expect(generateArticleImages).not.toHaveBeenCalled();
  });

  it("fails the task when no article can be loaded", async () => {
    const task = makeTask();
    vi.mocked(getTaskForUser).mockResolvedValue(task);
    vi.mocked(claimTaskForProcessing).mockResolvedValue(task);
    vi.mocked(loadArticleContent).mockResolvedValue(null);
    const { provider, generateText } = fakeProvider({ status: "ok", text: "x", model: "m" });

    const result = await processTask(TASK_ID, USER, { provider, sleep: noWait });

    expect(failTask).toHaveBeenCalledWith(TASK_ID, "No articles found to process");
    expect(generateText).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: "failed", error: "No articles found to process" });
  });

  it("stores a redacted provider error", async () => {
    const task = makeTask();
    vi.mocked(getTaskForUser).mockResolvedValue(task);
    vi.mocked(claimTaskForProcessing).mockResolvedValue(task);
    const { provider } = fakeProvider({
      status: "error",
      error_type: "provider_error",
      message: "Gemini error 400: request to /v1?key=test-secret rejected",
    });

    const result = await processTask(TASK_ID, USER, { provider, sleep: noWait });

    expect(failTask).toHaveBeenCalledWith(TASK_ID, "Gemini error 400: request to /v1?key=***REDACTED*** rejected");
    expect(result.status).toBe("failed");
    expect(completeTask).not.toHaveBeenCalled();
  });

  it("keeps the article when image generation fails", async () => {
    const task = makeTask({ image_count: 1 });
    vi.mocked(getTaskForUser).mockResolvedValue(task);
    vi.mocked(claimTaskForProcessing).mockResolvedValue(task);
    vi.mocked(generateArticleImages).mockResolvedValue({
      status: "error",
      error_type: "invalid_response",
      message: "Gemini returned no images",
    });
    const { provider } = fakeProvider({ status: "ok", text: "Article", model: "m" });

    const result = await processTask(TASK_ID, USER, { provider, sleep: noWait });

    expect(completeTask).toHaveBeenCalledWith(TASK_ID, {
      result: "Article",
      model: "m",
      image_paths: [],
      image_error: "Gemini returned no images",
    });
    expect(result.status).toBe("completed");
  });
});
