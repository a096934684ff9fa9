import { z } from "zod";
import { ArticleRecordSchema } from "../articles/articleTypes.js";

export const DraftRecordSchema = z.object({
  user_id: z.string().min(1),
  title: z.string(),
  articles: z.array(ArticleRecordSchema),
  instruction: z.string(),
  preset_id: z.string().nullable(),
  image_count: z.number().int().min(0),
  updated_at: z.string(),
});

export type DraftRecord = z.infer<typeof DraftRecordSchema>;

export type DraftSummary = {
  title: string;
  article_count: number;
  has_instruction: boolean;
  is_ready: boolean;
  image_count: number;
};

export function emptyDraft(user_id: string): DraftRecord {
  return {
    user_id,
    title: "",
    articles: [],
    instruction: "",
    preset_id: null,
    image_count: 0,
    updated_at: new Date().toISOString(),
  };
}
