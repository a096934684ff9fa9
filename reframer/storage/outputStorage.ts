import { getConfig } from "../config/loadConfig.js";
import { getSupabase } from "../lib/supabaseClient.js";

const SIGNED_URL_TTL_SECONDS = 60 * 60;

export function generatedImagePath(params: {
  user_id: string;
  task_id: string;
  index: number;
  ext: string;
}): string {
  return `${params.user_id}/${params.task_id}/image${params.index}.${params.ext}`;
}

export async function uploadGeneratedImage(params: {
  path: string;
  bytes: Uint8Array;
  contentType: string;
}): Promise<void> {
  const { error } = await getSupabase()
    .storage.from(getConfig().outputBucket)
    .upload(params.path, params.bytes, {
      contentType: params.contentType,
      upsert: true, // deterministic path per task and index
    });

  if (error) throw error;
}

export async function createImageUrl(path: string): Promise<string> {
  const { data, error } = await getSupabase()
    .storage.from(getConfig().outputBucket)
    .createSignedUrl(path, SIGNED_URL_TTL_SECONDS);

  if (error) throw error;
  return data.signedUrl;
}
