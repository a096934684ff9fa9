import { getSupabase } from "../lib/supabaseClient.js";
import { DraftConflictError } from "../errors.js";
import { DraftRecordSchema, emptyDraft, type DraftRecord } from "./draftTypes.js";

const DRAFTS_TABLE = "reframe_drafts";
const DRAFT_COLUMNS = "user_id, title, articles, instruction, preset_id, image_count, updated_at";
const UNIQUE_VIOLATION = "23505";
export const MAX_DRAFT_WRITE_ATTEMPTS = 5;

async function fetchDraftRow(user_id: string): Promise<DraftRecord | null> {
  const { data, error } = await getSupabase()
    .from(DRAFTS_TABLE)
    .select(DRAFT_COLUMNS)
    .eq("user_id", user_id)
    .maybeSingle();

  if (error) throw error;
  return data ? DraftRecordSchema.parse(data) : null;
}

export async function loadDraft(user_id: string): Promise<DraftRecord> {
  return (await fetchDraftRow(user_id)) ?? emptyDraft(user_id);
}

// Strictly after the version being replaced, so two writes in the same
// millisecond still leave distinct versions.
function nextVersion(previous: DraftRecord | null): string {
  const now = Date.now();
  if (!previous) return new Date(now).toISOString();
  const prev = Date.parse(previous.updated_at);
  return new Date(Number.isNaN(prev) ? now : Math.max(now, prev + 1)).toISOString();
}

async function insertIfAbsent(row: DraftRecord): Promise<boolean> {
  const { error } = await getSupabase().from(DRAFTS_TABLE).insert(row);

  if (error && error.code === UNIQUE_VIOLATION) return false;
  if (error) throw error;
  return true;
}

async function replaceIfUnchanged(row: DraftRecord, previousVersion: string): Promise<boolean> {
  const { data, error } = await getSupabase()
    .from(DRAFTS_TABLE)
    .update(row)
    .eq("user_id", row.user_id)
    .eq("updated_at", previousVersion)
    .select("user_id");

  if (error) throw error;
  return (data ?? []).length > 0;
}

/**
 * Applies `change` to the stored draft and writes the result only if nobody
 * wrote the row in between. On a lost race the draft is reloaded and the
 * change applied again, up to MAX_DRAFT_WRITE_ATTEMPTS times.
 */
export async function updateDraft(
  user_id: string,
  change: (draft: DraftRecord) => DraftRecord,
  attempts = MAX_DRAFT_WRITE_ATTEMPTS
): Promise<DraftRecord> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const current = await fetchDraftRow(user_id);
    const row: DraftRecord = {
      ...change(current ?? emptyDraft(user_id)),
      user_id,
      updated_at: nextVersion(current),
    };

    const written = current ? await replaceIfUnchanged(row, current.updated_at) : await insertIfAbsent(row);
    if (written) return row;

    console.warn("[drafts] draft changed during update, retrying", { user_id, attempt });
  }
  throw new DraftConflictError();
}

export async function deleteDraft(user_id: string): Promise<void> {
  const { error } = await getSupabase().from(DRAFTS_TABLE).delete().eq("user_id", user_id);

  if (error) throw error;
}
