import type {
  FlashcardSchedule,
  LayoutPosition,
  StudyFlashcard,
  StudySession,
  WorkflowStage,
} from "@/lib/study-types";
import type { StudySessionStore } from "@/lib/study-store";
import type { SessionLock } from "@/lib/session-lock";
import type { TopicProgressBody } from "@/lib/schema";
import { WorkflowChangeSet, type WorkflowPolicy } from "@/lib/workflow";
import { applyReview, isDue, reviewAccuracy } from "@/lib/spaced-repetition";
import { stageHistogram, type StageHistogram } from "@/lib/session-progress";
import { leavesInOrder } from "@/lib/topic-tree";
import {
  FlashcardNotFoundError,
  StudySessionNotFoundError,
  TopicNotFoundError,
} from "@/lib/study-errors";

export type LearnerProgressDeps = {
  store: StudySessionStore;
  lock: SessionLock;
  now?: () => Date;
};

export type StageChange = { topicId: string; stage: WorkflowStage };

export type TopicProgressResult = {
  topicId: string;
  workflowStage: WorkflowStage;
  changed: StageChange[];
  progress: number;
};

export type BatchProgressResult = {
  applied: string[];
  skipped: string[];
  changed: StageChange[];
  progress: number;
};

export type FlashcardView = StudyFlashcard & { isDue: boolean; accuracy: number };

export type TopicFlashcardsResult = {
  topicId: string;
  workflowStage: WorkflowStage;
  flashcards: FlashcardView[];
  dueCount: number;
};

export type FlashcardReviewResult = {
  flashcardId: string;
  topicId: string;
  schedule: FlashcardSchedule;
  isDue: boolean;
  accuracy: number;
  workflowStage: WorkflowStage;
  changed: StageChange[];
  progress: number;
};

export type WorkflowNode = {
  id: string;
  title: string;
  stage: WorkflowStage;
  position: LayoutPosition | null;
  prerequisiteTopicIds: string[];
  questionCount: number;
  flashcardCount: number;
  quiz: { completed: boolean; score: number | null };
  flashcards: { reviewed: number; total: number; due: number };
};

export type WorkflowView = {
  sessionId: string;
  nodes: WorkflowNode[];
  stages: StageHistogram;
  progress: number;
};

/**
 * Learner-facing operations. Every write loads the session, applies the action to a
 * WorkflowChangeSet and commits the result in one store call, all inside the session's
 * `workflow:` lock scope.
 */
export class LearnerProgressService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: LearnerProgressDeps,
    private readonly policy: WorkflowPolicy
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private async loadSession(sessionId: string, userId: string): Promise<StudySession> {
    const session = await this.deps.store.getSession(sessionId, userId);
    if (!session) throw new StudySessionNotFoundError(sessionId);
    return session;
  }

  private async commit(changes: WorkflowChangeSet, sessionId: string, flashcard?: { id: string; schedule: FlashcardSchedule }) {
    await this.deps.store.commitWorkflowChange({
      sessionId,
      topics: changes.patches(),
      flashcard,
      progress: changes.progress(),
    });
  }

  private inWorkflowScope<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.deps.lock.runExclusive(`workflow:${sessionId}`, fn);
  }

  async updateTopicProgress(
    userId: string,
    sessionId: string,
    topicId: string,
    update: TopicProgressBody
  ): Promise<TopicProgressResult> {
    return this.inWorkflowScope(sessionId, async () => {
      const session = await this.loadSession(sessionId, userId);
      const changes = new WorkflowChangeSet(session, this.policy, this.now());
      changes.recordQuiz(topicId, update);
      await this.commit(changes, sessionId);
      return {
        topicId,
        workflowStage: changes.stageOf(topicId),
        changed: changes.changedStages(),
        progress: changes.progress(),
      };
    });
  }

  /**
   * Applies several quiz updates in traversal order. Ids that are not leaves of the session
   * are skipped and reported rather than failing the batch.
   */
  async batchUpdateProgress(
    userId: string,
    sessionId: string,
    updates: (TopicProgressBody & { topicId: string })[]
  ): Promise<BatchProgressResult> {
    return this.inWorkflowScope(sessionId, async () => {
      const session = await this.loadSession(sessionId, userId);
      const changes = new WorkflowChangeSet(session, this.policy, this.now());
      const order = new Map(leavesInOrder(session.topics).map((topic, idx) => [topic.id, idx]));

      const known = updates.filter((update) => order.has(update.topicId));
      const skipped = updates.filter((update) => !order.has(update.topicId)).map((update) => update.topicId);
      known.sort((a, b) => (order.get(a.topicId) ?? 0) - (order.get(b.topicId) ?? 0));

      for (const { topicId, ...quiz } of known) changes.recordQuiz(topicId, quiz);
      await this.commit(changes, sessionId);

      if (skipped.length > 0) console.warn("[learner-progress] skipped unknown topics", { sessionId, skipped });
      return {
        applied: known.map((update) => update.topicId),
        skipped,
        changed: changes.changedStages(),
        progress: changes.progress(),
      };
    });
  }

  private async sessionForTopic(topicId: string, userId: string): Promise<StudySession> {
    const sessionId = await this.deps.store.findSessionIdForTopic(topicId);
    if (!sessionId) throw new TopicNotFoundError(topicId);
    const session = await this.deps.store.getSession(sessionId, userId);
    if (!session) throw new TopicNotFoundError(topicId);
    return session;
  }

  async getTopicFlashcards(userId: string, topicId: string): Promise<TopicFlashcardsResult> {
    const session = await this.sessionForTopic(topicId, userId);
    const topic = session.topics.find((t) => t.id === topicId);
    if (!topic) throw new TopicNotFoundError(topicId);

    const now = this.now();
    const flashcards = topic.flashcards.map((card) => ({
      ...card,
      isDue: isDue(card, now),
      accuracy: reviewAccuracy(card),
    }));
    return {
      topicId,
      workflowStage: topic.workflowStage,
      flashcards,
      dueCount: flashcards.filter((card) => card.isDue).length,
    };
  }

  async completeTopicFlashcards(userId: string, topicId: string): Promise<TopicProgressResult> {
    const { id: sessionId } = await this.sessionForTopic(topicId, userId);
    return this.inWorkflowScope(sessionId, async () => {
      const session = await this.loadSession(sessionId, userId);
      const changes = new WorkflowChangeSet(session, this.policy, this.now());
      changes.completeFlashcards(topicId);
      await this.commit(changes, sessionId);
      return {
        topicId,
        workflowStage: changes.stageOf(topicId),
        changed: changes.changedStages(),
        progress: changes.progress(),
      };
    });
  }

  async reviewFlashcard(userId: string, flashcardId: string, quality: number): Promise<FlashcardReviewResult> {
    const sessionId = await this.deps.store.findSessionIdForFlashcard(flashcardId);
    if (!sessionId) throw new FlashcardNotFoundError(flashcardId);

    return this.inWorkflowScope(sessionId, async () => {
      const session = await this.deps.store.getSession(sessionId, userId);
      const topic = session?.topics.find((t) => t.flashcards.some((card) => card.id === flashcardId));
      const card = topic?.flashcards.find((c) => c.id === flashcardId);
      if (!session || !topic || !card) throw new FlashcardNotFoundError(flashcardId);

      const now = this.now();
      const schedule = applyReview(card, quality, now);
      const changes = new WorkflowChangeSet(session, this.policy, now);
      changes.recordFlashcardReview(flashcardId, schedule);
      await this.commit(changes, sessionId, { id: flashcardId, schedule });

      console.log("[learner-progress] flashcard reviewed", {
        flashcardId,
        quality,
        intervalDays: schedule.intervalDays,
        stage: changes.stageOf(topic.id),
      });
      return {
        flashcardId,
        topicId: topic.id,
        schedule,
        isDue: isDue(schedule, now),
        accuracy: reviewAccuracy(schedule),
        workflowStage: changes.stageOf(topic.id),
        changed: changes.changedStages(),
        progress: changes.progress(),
      };
    });
  }

  async getWorkflow(userId: string, sessionId: string): Promise<WorkflowView> {
    const session = await this.loadSession(sessionId, userId);
    const now = this.now();
    const leaves = leavesInOrder(session.topics);

    const nodes = leaves.map((topic) => {
      const since = topic.reviewStartedAt ? Date.parse(topic.reviewStartedAt) : null;
      const reviewed = topic.flashcards.filter(
        (card) => since !== null && card.lastReviewedAt !== null && Date.parse(card.lastReviewedAt) >= since
      ).length;
      return {
        id: topic.id,
        title: topic.title,
        stage: topic.workflowStage,
        position: topic.position,
        prerequisiteTopicIds: [...topic.prerequisiteTopicIds],
        questionCount: topic.questions.length,
        flashcardCount: topic.flashcards.length,
        quiz: { completed: topic.quiz.completed, score: topic.quiz.score },
        flashcards: {
          reviewed,
          total: topic.flashcards.length,
          due: topic.flashcards.filter((card) => isDue(card, now)).length,
        },
      };
    });

    return { sessionId, nodes, stages: stageHistogram(leaves), progress: session.progress };
  }
}
