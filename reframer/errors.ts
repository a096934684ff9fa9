/**
 * Domain errors. Each carries the HTTP status the API answers with.
 */

export type ErrorStatus = 400 | 404 | 409 | 413 | 500;

export class ReframerError extends Error {
  constructor(message: string, public readonly status: ErrorStatus) {
    super(message);
    this.name = "ReframerError";
  }
}

export class ConfigError extends ReframerError {
  constructor(message: string) {
    super(message, 500);
    this.name = "ConfigError";
  }
}

export class ArticleInputError extends ReframerError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ArticleInputError";
  }
}

export class UploadTooLargeError extends ReframerError {
  constructor(public readonly size: number, public readonly limit: number) {
    super(`Upload of ${size} bytes exceeds the ${limit} byte limit`, 413);
    this.name = "UploadTooLargeError";
  }
}

export class DraftInputError extends ReframerError {
  constructor(message: string) {
    super(message, 400);
    this.name = "DraftInputError";
  }
}

export class DraftNotReadyError extends ReframerError {
  constructor() {
    super("Please provide a title and at least one article.", 400);
    this.name = "DraftNotReadyError";
  }
}

export class PresetNotFoundError extends ReframerError {
  constructor(public readonly preset: string) {
    super(`Preset not found: ${preset}`, 404);
    this.name = "PresetNotFoundError";
  }
}

export class ArticleNotFoundError extends ReframerError {
  constructor(public readonly articleId: string) {
    super(`Article not found: ${articleId}`, 404);
    this.name = "ArticleNotFoundError";
  }
}

export class TaskNotFoundError extends ReframerError {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`, 404);
    this.name = "TaskNotFoundError";
  }
}

export class TaskAlreadyProcessingError extends ReframerError {
  constructor(public readonly taskId: string) {
    super("Task is already being processed.", 409);
    this.name = "TaskAlreadyProcessingError";
  }
}

export class DraftConflictError extends ReframerError {
  constructor() {
    super("The draft was changed by another request. Please try again.", 409);
    this.name = "DraftConflictError";
  }
}
