import { z } from "zod";

export const ArticleTypeSchema = z.enum(["text", "pdf", "url"]);
export type ArticleType = z.infer<typeof ArticleTypeSchema>;

export const ArticleRecordSchema = z.object({
  id: z.string().uuid(),
  type: ArticleTypeSchema,
  storage_path: z.string().min(1),
  filename: z.string().min(1),
  source: z.string(),
  preview: z.string(),
  added_at: z.string(),
});

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;
