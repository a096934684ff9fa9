import { getConfig } from "../config/loadConfig.js";
import { getSupabase } from "../lib/supabaseClient.js";

// Every user's inputs live under `<user_id>/` in the input bucket.
export function inputPath(user_id: string, filename: string): string {
  return `${user_id}/${filename}`;
}

export async function uploadInputFile(params: {
  user_id: string;
  filename: string;
  bytes: Uint8Array;
  contentType: string;
}): Promise<string> {
  const path = inputPath(params.user_id, params.filename);
  const { error } = await getSupabase()
    .storage.from(getConfig().inputBucket)
    .upload(path, params.bytes, {
      contentType: params.contentType,
      upsert: false,
    });

  if (error) throw error;
  return path;
}

export async function listInputFileNames(user_id: string): Promise<string[]> {
  const { data, error } = await getSupabase()
    .storage.from(getConfig().inputBucket)
    .list(user_id, { limit: 1000 });

  if (error) throw error;
  return (data ?? []).map((file) => file.name);
}

export async function downloadStoredFile(path: string): Promise<Uint8Array> {
  const { data, error } = await getSupabase().storage.from(getConfig().inputBucket).download(path);

  if (error) throw error;
  return new Uint8Array(await data.arrayBuffer());
}

export async function removeStoredFile(path: string): Promise<void> {
  const { error } = await getSupabase().storage.from(getConfig().inputBucket).remove([path]);

  if (error) throw error;
}
