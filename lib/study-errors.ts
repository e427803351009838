import type { WorkflowStage } from "@/lib/study-types";

export const GENERATION_RETRY_SECONDS = 20;
export const SESSION_BUSY_RETRY_SECONDS = 5;

export type HierarchyIssueKind =
  | "too_deep"
  | "not_question_worthy"
  | "duplicate_sibling"
  | "prerequisite_cycle";

export type HierarchyIssue = {
  kind: HierarchyIssueKind;
  path: string;
  message: string;
};

export class HierarchyValidationError extends Error {
  readonly issues: HierarchyIssue[];

  constructor(issues: HierarchyIssue[]) {
    super(`Topic hierarchy failed validation (${issues.length} issue${issues.length === 1 ? "" : "s"})`);
    this.name = "HierarchyValidationError";
    this.issues = issues;
  }
}

export class PrerequisiteCycleError extends Error {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Prerequisites form a cycle: ${cycle.join(" -> ")}`);
    this.name = "PrerequisiteCycleError";
    this.cycle = cycle;
  }
}

export type GenerationAttemptFailure = {
  backend: string;
  reason: "transport" | "truncated" | "parse" | "schema";
  message: string;
};

export class GenerationError extends Error {
  readonly attempts: GenerationAttemptFailure[];
  readonly retryable = true;
  readonly retryAfterSeconds: number;

  constructor(message: string, attempts: GenerationAttemptFailure[], retryAfterSeconds = GENERATION_RETRY_SECONDS) {
    super(message);
    this.name = "GenerationError";
    this.attempts = attempts;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class CacheUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CacheUnavailableError";
  }
}

export class SessionBusyError extends Error {
  readonly retryAfterSeconds: number;

  constructor(message: string, retryAfterSeconds = SESSION_BUSY_RETRY_SECONDS) {
    super(message);
    this.name = "SessionBusyError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class WorkflowTransitionError extends Error {
  readonly from: WorkflowStage;
  readonly to: WorkflowStage;

  constructor(from: WorkflowStage, to: WorkflowStage, detail?: string) {
    super(detail ? `Cannot move topic from ${from} to ${to}: ${detail}` : `Cannot move topic from ${from} to ${to}`);
    this.name = "WorkflowTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class StudySessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super("Study session not found");
    this.name = "StudySessionNotFoundError";
  }
}

export class TopicNotFoundError extends Error {
  constructor(readonly topicId: string) {
    super("Topic not found");
    this.name = "TopicNotFoundError";
  }
}

export class FlashcardNotFoundError extends Error {
  constructor(readonly flashcardId: string) {
    super("Flashcard not found");
    this.name = "FlashcardNotFoundError";
  }
}

export class InvalidContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidContentError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : String(err ?? "");
}
