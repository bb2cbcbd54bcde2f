/** Base error carrying the HTTP status the error middleware responds with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly extra?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PlanNotFoundError extends HttpError {
  constructor(planId: string) {
    super(404, "plan_not_found", `Plan with ID '${planId}' not found`);
  }
}

export class TaskNotFoundError extends HttpError {
  constructor(taskId: number, planId: string) {
    super(404, "task_not_found", `Task ${taskId} not found in plan '${planId}'`);
  }
}

export class CommentNotFoundError extends HttpError {
  constructor(commentId: number) {
    super(404, "comment_not_found", `Comment ${commentId} not found`);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, "validation_error", message, details === undefined ? undefined : { details });
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, "bad_request", message);
  }
}

export class TimeframeViolationError extends HttpError {
  constructor(message: string, readonly suggestions: string[]) {
    super(422, "timeframe_violation", message, { suggestions });
  }
}

export class RateLimitError extends HttpError {
  constructor(limit: number) {
    super(429, "rate_limit_exceeded", `Rate limit exceeded. Maximum ${limit} requests per minute.`);
  }
}

export class LLMGenerationError extends HttpError {
  constructor(message: string) {
    super(500, "llm_generation_failed", message);
  }
}

export class OllamaConnectionError extends HttpError {
  constructor(message = "Unable to connect to Ollama. Make sure it is running (ollama serve).") {
    super(503, "ollama_unavailable", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
