/**
 * Per-topic mastery workflow: locked -> quiz_available -> flashcard_review -> completed.
 *
 * Stages only move one step forward. Completing a topic re-evaluates every topic that lists
 * it as a prerequisite within the same change set, so the unlock is committed together with
 * the completion.
 */

import type {
  FlashcardSchedule,
  QuizState,
  StudySession,
  StudyTopic,
  UnlockPolicy,
  WorkflowStage,
} from "@/lib/study-types";
import type { TopicStatePatch } from "@/lib/study-store";
import { TopicNotFoundError, WorkflowTransitionError } from "@/lib/study-errors";
import { sessionProgress } from "@/lib/session-progress";

export type WorkflowPolicy = {
  unlockPolicy: UnlockPolicy;
  quizPassPercent: number;
};

export const DEFAULT_WORKFLOW_POLICY: WorkflowPolicy = {
  unlockPolicy: "sequential",
  quizPassPercent: 70,
};

const STAGE_RANK: Record<WorkflowStage, number> = {
  locked: 0,
  quiz_available: 1,
  flashcard_review: 2,
  completed: 3,
};

export function canTransition(from: WorkflowStage, to: WorkflowStage): boolean {
  return STAGE_RANK[to] === STAGE_RANK[from] + 1;
}

type LeafView = Pick<StudyTopic, "id" | "isCategory" | "prerequisiteTopicIds">;

/**
 * Starting stages for a new tree (pre-order). With the sequential policy only the first leaf
 * without prerequisites opens; with the parallel policy every leaf without prerequisites opens.
 */
export function initialWorkflowStages(topics: LeafView[], policy: WorkflowPolicy): Map<string, WorkflowStage> {
  const stages = new Map<string, WorkflowStage>();
  let opened = false;
  for (const topic of topics) {
    const free = !topic.isCategory && topic.prerequisiteTopicIds.length === 0;
    const open = free && (policy.unlockPolicy === "parallel" || !opened);
    if (open) opened = true;
    stages.set(topic.id, open ? "quiz_available" : "locked");
  }
  return stages;
}

/**
 * Working copy of a session's workflow state. Learner actions are applied here and the
 * accumulated patches are committed in one store call.
 */
export class WorkflowChangeSet {
  private readonly stages = new Map<string, WorkflowStage>();
  private readonly reviewStarts = new Map<string, string | null>();
  private readonly quizzes = new Map<string, QuizState>();
  private readonly schedules = new Map<string, FlashcardSchedule>();
  private readonly touched = new Set<string>();
  private readonly topicsById: Map<string, StudyTopic>;

  constructor(
    private readonly session: StudySession,
    private readonly policy: WorkflowPolicy,
    private readonly now: Date
  ) {
    this.topicsById = new Map(session.topics.map((topic) => [topic.id, topic]));
  }

  topic(topicId: string): StudyTopic {
    const topic = this.topicsById.get(topicId);
    if (!topic) throw new TopicNotFoundError(topicId);
    return topic;
  }

  stageOf(topicId: string): WorkflowStage {
    return this.stages.get(topicId) ?? this.topic(topicId).workflowStage;
  }

  private advance(topicId: string, to: WorkflowStage) {
    const from = this.stageOf(topicId);
    if (!canTransition(from, to)) throw new WorkflowTransitionError(from, to);
    this.stages.set(topicId, to);
    this.touched.add(topicId);
    console.log("[workflow] stage advanced", { topicId, from, to });

    if (to === "flashcard_review") {
      this.reviewStarts.set(topicId, this.now.toISOString());
      // Nothing to review: the pass is already complete.
      if (this.allFlashcardsReviewed(topicId)) this.advance(topicId, "completed");
    } else if (to === "completed") {
      this.cascadeFrom(topicId);
    }
  }

  /**
   * Stores quiz progress. A finished quiz at or above the pass mark moves the topic to
   * flashcard review. Progress on a locked topic is rejected.
   */
  recordQuiz(topicId: string, quiz: QuizState) {
    const topic = this.topic(topicId);
    const stage = this.stageOf(topicId);
    if (topic.isCategory) throw new WorkflowTransitionError(stage, "flashcard_review", "categories have no quiz");
    if (stage === "locked") throw new WorkflowTransitionError(stage, "flashcard_review", "topic is locked");

    this.quizzes.set(topicId, quiz);
    this.touched.add(topicId);

    const passed = quiz.completed && quiz.score !== null && quiz.score >= this.policy.quizPassPercent;
    if (stage === "quiz_available" && passed) this.advance(topicId, "flashcard_review");
  }

  /**
   * Notes a flashcard review. When it was the last unreviewed card of a topic in review,
   * the topic completes.
   */
  recordFlashcardReview(flashcardId: string, schedule: FlashcardSchedule) {
    const topic = this.session.topics.find((t) => t.flashcards.some((card) => card.id === flashcardId));
    if (!topic) throw new TopicNotFoundError(`flashcard:${flashcardId}`);
    this.schedules.set(flashcardId, schedule);
    if (this.stageOf(topic.id) === "flashcard_review" && this.allFlashcardsReviewed(topic.id)) {
      this.advance(topic.id, "completed");
    }
  }

  // Explicit completion of the review pass; only legal once every card was reviewed.
  completeFlashcards(topicId: string) {
    const stage = this.stageOf(topicId);
    if (stage !== "flashcard_review") throw new WorkflowTransitionError(stage, "completed");
    if (!this.allFlashcardsReviewed(topicId)) {
      throw new WorkflowTransitionError(stage, "completed", "not every flashcard has been reviewed");
    }
    this.advance(topicId, "completed");
  }

  reviewStartedAt(topicId: string): string | null {
    return this.reviewStarts.has(topicId) ? this.reviewStarts.get(topicId) ?? null : this.topic(topicId).reviewStartedAt;
  }

  allFlashcardsReviewed(topicId: string): boolean {
    const startedAt = this.reviewStartedAt(topicId);
    if (!startedAt) return false;
    const since = Date.parse(startedAt);
    return this.topic(topicId).flashcards.every((card) => {
      const reviewedAt = (this.schedules.get(card.id) ?? card).lastReviewedAt;
      return reviewedAt !== null && Date.parse(reviewedAt) >= since;
    });
  }

  private prerequisitesMet(topic: StudyTopic): boolean {
    return topic.prerequisiteTopicIds.every(
      (id) => !this.topicsById.has(id) || this.stageOf(id) === "completed"
    );
  }

  private cascadeFrom(completedId: string) {
    const leaves = this.session.topics.filter((topic) => !topic.isCategory);

    for (const topic of leaves) {
      if (
        topic.prerequisiteTopicIds.includes(completedId) &&
        this.stageOf(topic.id) === "locked" &&
        this.prerequisitesMet(topic)
      ) {
        this.advance(topic.id, "quiz_available");
      }
    }

    if (this.policy.unlockPolicy === "sequential") {
      const next = leaves.find(
        (topic) => this.stageOf(topic.id) === "locked" && topic.prerequisiteTopicIds.length === 0
      );
      if (next) this.advance(next.id, "quiz_available");
    }
  }

  patches(): TopicStatePatch[] {
    return Array.from(this.touched).map((topicId) => {
      const patch: TopicStatePatch = { topicId };
      const stage = this.stages.get(topicId);
      if (stage) patch.workflowStage = stage;
      const quiz = this.quizzes.get(topicId);
      if (quiz) patch.quiz = quiz;
      if (this.reviewStarts.has(topicId)) patch.reviewStartedAt = this.reviewStarts.get(topicId) ?? null;
      return patch;
    });
  }

  changedStages(): { topicId: string; stage: WorkflowStage }[] {
    return Array.from(this.stages.entries()).map(([topicId, stage]) => ({ topicId, stage }));
  }

  progress(): number {
    return sessionProgress(
      this.session.topics.map((topic) => ({ isCategory: topic.isCategory, workflowStage: this.stageOf(topic.id) }))
    );
  }
}
