/**
 * Structured logging for reframing task events.
 *
 * One JSON object per line on stdout, with a timestamp and a closed set of
 * event names.
 */
import { safeRedact } from "./redactSecrets.js";

export type ReframeLogEvent =
  | "article.added"
  | "article.removed"
  | "task.created"
  | "task.process.started"
  | "task.process.succeeded"
  | "task.process.failed"
  | "images.generate.succeeded"
  | "images.generate.failed"
  | "task.stale.swept";

export type ReframeLogData = {
  event: ReframeLogEvent;
  user_id?: string;
  task_id?: string;
  article_id?: string;
  article_type?: string;
  attempt?: number;
  model?: string;
  duration_ms?: number;
  error_type?: string;
  error_message?: string;
  [key: string]: unknown;
};

export function reframeLog(data: ReframeLogData): void {
  const entry = {
    timestamp: new Date().toISOString(),
    ...data,
    ...(data.error_message !== undefined ? { error_message: safeRedact(data.error_message) } : {}),
  };
  console.log(JSON.stringify(entry));
}

export const reframeLogHelpers = {
  articleAdded(params: { user_id: string; article_id: string; article_type: string; filename: string }): void {
    reframeLog({ event: "article.added", ...params });
  },

  articleRemoved(params: { user_id: string; article_id: string }): void {
    reframeLog({ event: "article.removed", ...params });
  },

  taskCreated(params: { user_id: string; task_id: string; article_count: number }): void {
    reframeLog({ event: "task.created", ...params });
  },

  processStarted(params: { user_id: string; task_id: string; article_count: number }): void {
    reframeLog({ event: "task.process.started", ...params });
  },

  processSucceeded(params: {
    user_id: string;
    task_id: string;
    model: string;
    attempt: number;
    duration_ms: number;
  }): void {
    reframeLog({ event: "task.process.succeeded", ...params });
  },

  processFailed(params: {
    user_id: string;
    task_id: string;
    error_type: string;
    error_message: string;
    attempt?: number;
  }): void {
    reframeLog({ event: "task.process.failed", ...params });
  },

  imagesSucceeded(params: { user_id: string; task_id: string; count: number }): void {
    reframeLog({ event: "images.generate.succeeded", ...params });
  },

  imagesFailed(params: { user_id: string; task_id: string; error_type: string; error_message: string }): void {
    reframeLog({ event: "images.generate.failed", ...params });
  },

  staleSwept(params: { count: number; task_ids: string[] }): void {
    reframeLog({ event: "task.stale.swept", ...params });
  },
};
