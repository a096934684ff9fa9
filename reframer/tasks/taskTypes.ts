import { z } from "zod";
import { ArticleRecordSchema } from "../articles/articleTypes.js";

export const TaskStatusSchema = z.enum(["pending", "processing", "completed", "failed"]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskRecordSchema = z.object({
  task_id: z.string().uuid(),
  user_id: z.string().min(1),
  title: z.string(),
  articles: z.array(ArticleRecordSchema),
  instruction: z.string(),
  preset_id: z.string().nullable(),
  image_count: z.number().int().min(0),
  status: TaskStatusSchema,
  result: z.string().nullable(),
  error: z.string().nullable(),
  model: z.string().nullable(),
  image_paths: z.array(z.string()),
  image_error: z.string().nullable(),
  created_at: z.string(),
  processing_started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});

export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const TASK_COLUMNS =
  "task_id, user_id, title, articles, instruction, preset_id, image_count, status, result, error, model, image_paths, image_error, created_at, processing_started_at, completed_at";
