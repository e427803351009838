import {
  ConfigurationError,
  FlashcardNotFoundError,
  GENERATION_RETRY_SECONDS,
  GenerationError,
  HierarchyValidationError,
  InvalidContentError,
  PrerequisiteCycleError,
  SessionBusyError,
  StudySessionNotFoundError,
  TopicNotFoundError,
  WorkflowTransitionError,
} from "@/lib/study-errors";

export class UnauthenticatedError extends Error {
  constructor() {
    super("Not authenticated");
    this.name = "UnauthenticatedError";
  }
}

export class InvalidRequestError extends Error {
  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export type ErrorBody = { error: string; details?: unknown };

export function errorStatus(err: unknown): { status: number; body: ErrorBody; retryAfter?: number } {
  if (err instanceof UnauthenticatedError) return { status: 401, body: { error: err.message } };
  if (err instanceof InvalidRequestError) return { status: 400, body: { error: err.message, details: err.details } };
  if (err instanceof InvalidContentError || err instanceof RangeError) return { status: 400, body: { error: err.message } };
  if (
    err instanceof StudySessionNotFoundError ||
    err instanceof TopicNotFoundError ||
    err instanceof FlashcardNotFoundError
  ) {
    return { status: 404, body: { error: err.message } };
  }
  if (err instanceof WorkflowTransitionError) {
    return { status: 409, body: { error: err.message, details: { from: err.from, to: err.to } } };
  }
  if (err instanceof GenerationError || err instanceof SessionBusyError) {
    return { status: 503, body: { error: err.message }, retryAfter: err.retryAfterSeconds };
  }
  if (err instanceof HierarchyValidationError) {
    return { status: 503, body: { error: "Could not build a usable topic outline; try again" }, retryAfter: GENERATION_RETRY_SECONDS };
  }
  if (err instanceof PrerequisiteCycleError) return { status: 500, body: { error: err.message } };
  if (err instanceof ConfigurationError) return { status: 500, body: { error: "Study generation is not configured" } };
  return { status: 500, body: { error: "Internal server error" } };
}
