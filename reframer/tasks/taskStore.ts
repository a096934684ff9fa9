import { getSupabase } from "../lib/supabaseClient.js";
import { TASK_COLUMNS, TaskRecordSchema, type TaskRecord } from "./taskTypes.js";

const TASKS_TABLE = "reframe_tasks";
export const MAX_TASK_LIST = 50;

export async function insertTask(task: TaskRecord): Promise<TaskRecord> {
  const { data, error } = await getSupabase().from(TASKS_TABLE).insert(task).select(TASK_COLUMNS).single();

  if (error) throw error;
  return TaskRecordSchema.parse(data);
}

export async function getTaskForUser(task_id: string, user_id: string): Promise<TaskRecord | null> {
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .select(TASK_COLUMNS)
    .eq("task_id", task_id)
    .eq("user_id", user_id)
    .maybeSingle();

  if (error) throw error;
  return data ? TaskRecordSchema.parse(data) : null;
}

export async function listTasksForUser(user_id: string, limit = MAX_TASK_LIST): Promise<TaskRecord[]> {
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .select(TASK_COLUMNS)
    .eq("user_id", user_id)
    .order("created_at", { ascending: false })
    .limit(Math.min(Math.max(1, limit), MAX_TASK_LIST));

  if (error) throw error;
  return (data ?? []).map((row) => TaskRecordSchema.parse(row));
}

/**
 * Moves the task to processing in one conditional update. A task that is
 * already processing is only taken over once it started before the cutoff.
 * Output of an earlier run is cleared.
 */
export async function claimTaskForProcessing(
  task_id: string,
  user_id: string,
  staleCutoff: Date
): Promise<TaskRecord | null> {
  const cutoff = staleCutoff.toISOString();
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .update({
      status: "processing",
      processing_started_at: new Date().toISOString(),
      completed_at: null,
      error: null,
      result: null,
      model: null,
      image_paths: [],
      image_error: null,
    })
    .eq("task_id", task_id)
    .eq("user_id", user_id)
    .or(`status.neq.processing,processing_started_at.is.null,processing_started_at.lt.${cutoff}`)
    .select(TASK_COLUMNS)
    .maybeSingle();

  if (error) throw error;
  return data ? TaskRecordSchema.parse(data) : null;
}

export async function completeTask(
  task_id: string,
  outcome: { result: string; model: string; image_paths: string[]; image_error: string | null }
): Promise<TaskRecord> {
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .update({
      status: "completed",
      completed_at: new Date().toISOString(),
      error: null,
      ...outcome,
    })
    .eq("task_id", task_id)
    .select(TASK_COLUMNS)
    .single();

  if (error) throw error;
  return TaskRecordSchema.parse(data);
}

export async function failTask(task_id: string, message: string): Promise<TaskRecord> {
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .update({
      status: "failed",
      completed_at: new Date().toISOString(),
      error: message,
    })
    .eq("task_id", task_id)
    .select(TASK_COLUMNS)
    .single();

  if (error) throw error;
  return TaskRecordSchema.parse(data);
}

export async function markStaleTasksFailed(staleCutoff: Date): Promise<string[]> {
  const cutoff = staleCutoff.toISOString();
  const { data, error } = await getSupabase()
    .from(TASKS_TABLE)
    .update({
      status: "failed",
      completed_at: new Date().toISOString(),
      error: "Timed out",
    })
    .eq("status", "processing")
    .or(`processing_started_at.is.null,processing_started_at.lt.${cutoff}`)
    .select("task_id");

  if (error) throw error;
  return (data ?? []).map((row) => String(row.task_id));
}
