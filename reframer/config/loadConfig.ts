import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";

const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

// Blank env values behave as if unset.
const blankAsUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());

function stringWithDefault(fallback: string) {
  return z.preprocess(blankAsUndefined, z.string().trim().default(fallback));
}

function positiveInt(fallback: number) {
  return z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));
}

export const LlmProviderNameSchema = z.enum(["gemini", "openai"]);
export type LlmProviderName = z.infer<typeof LlmProviderNameSchema>;

const EnvSchema = z.object({
  PORT: positiveInt(8080),
  SECRET_KEY: stringWithDefault("dev"),

  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_ANON_KEY: optionalString,

  LLM_PROVIDER: z.preprocess(
    (v) => (typeof v === "string" ? blankAsUndefined(v.trim().toLowerCase()) : v),
    LlmProviderNameSchema.default("gemini")
  ),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: stringWithDefault("gemini-2.0-flash"),
  GEMINI_IMAGE_MODEL: stringWithDefault("gemini-2.0-flash-preview-image-generation"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: stringWithDefault("gpt-4.1-mini"),
  OPENAI_IMAGE_MODEL: stringWithDefault("gpt-image-1"),

  LLM_TIMEOUT_MS: positiveInt(120_000),
  URL_FETCH_TIMEOUT_MS: positiveInt(20_000),
  MAX_UPLOAD_BYTES: positiveInt(DEFAULT_MAX_UPLOAD_BYTES),
  MAX_IMAGES_PER_TASK: positiveInt(4),

  REFRAME_INPUT_BUCKET: stringWithDefault("reframe-inputs"),
  REFRAME_OUTPUT_BUCKET: stringWithDefault("reframe-outputs"),
  REFRAME_STALE_PROCESSING_MINUTES: positiveInt(15),
  PROMPTS_DIR: optionalString,
});

export type ReframerConfig = {
  port: number;
  secretKey: string;
  supabase: {
    url: string | undefined;
    key: string | undefined;
  };
  llm: {
    provider: LlmProviderName;
    timeoutMs: number;
    gemini: { apiKey: string | undefined; model: string; imageModel: string };
    openai: { apiKey: string | undefined; model: string; imageModel: string };
  };
  urlFetchTimeoutMs: number;
  maxUploadBytes: number;
  maxImagesPerTask: number;
  inputBucket: string;
  outputBucket: string;
  staleProcessingMs: number;
  promptsDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv): ReframerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(`Invalid configuration: ${[...new Set(keys)].join(", ")}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    secretKey: e.SECRET_KEY,
    supabase: {
      url: e.SUPABASE_URL,
      key: e.SUPABASE_SERVICE_ROLE_KEY ?? e.SUPABASE_ANON_KEY,
    },
    llm: {
      provider: e.LLM_PROVIDER,
      timeoutMs: e.LLM_TIMEOUT_MS,
      gemini: { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, imageModel: e.GEMINI_IMAGE_MODEL },
      openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, imageModel: e.OPENAI_IMAGE_MODEL },
    },
    urlFetchTimeoutMs: e.URL_FETCH_TIMEOUT_MS,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    maxImagesPerTask: e.MAX_IMAGES_PER_TASK,
    inputBucket: e.REFRAME_INPUT_BUCKET,
    outputBucket: e.REFRAME_OUTPUT_BUCKET,
    staleProcessingMs: e.REFRAME_STALE_PROCESSING_MINUTES * 60 * 1000,
    promptsDir: path.resolve(e.PROMPTS_DIR ?? path.join(process.cwd(), "prompts")),
  };
}

let cached: ReframerConfig | null = null;

export function getConfig(): ReframerConfig {
  if (!cached) cached = loadConfig(process.env);
  return cached;
}
