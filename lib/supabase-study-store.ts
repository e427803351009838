import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { WORKFLOW_STAGES } from "@/lib/study-types";
import type {
  SessionStatus,
  StudyFlashcard,
  StudyQuestion,
  StudySession,
  StudySessionSummary,
  StudyTopic,
} from "@/lib/study-types";
import type { StudySessionStore, TopicContentWrite, WorkflowCommit } from "@/lib/study-store";

// Row shapes as stored; see supabase/migrations for the DDL and RPC functions.

const SessionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  source_text: z.string(),
  source_hash: z.string(),
  progressive_load: z.boolean(),
  questions_per_topic: z.number().int(),
  status: z.enum(["active", "archived"]),
  progress: z.number(),
  created_at: z.string(),
});

const TopicRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  parent_id: z.string().nullable(),
  title: z.string(),
  description: z.string().nullable(),
  is_category: z.boolean(),
  order_index: z.number().int(),
  depth: z.number().int(),
  position_x: z.number().nullable(),
  position_y: z.number().nullable(),
  workflow_stage: z.enum(WORKFLOW_STAGES),
  prerequisite_topic_ids: z.array(z.string()).nullable(),
  quiz_score: z.number().nullable(),
  current_question_index: z.number().int(),
  quiz_completed: z.boolean(),
  review_started_at: z.string().nullable(),
});

const QuestionRowSchema = z.object({
  id: z.string(),
  topic_id: z.string(),
  question: z.string(),
  options: z.array(z.string()),
  correct_answer: z.number().int(),
  explanation: z.string(),
  source_text: z.string().nullable(),
  source_page: z.number().int().nullable(),
  order_index: z.number().int(),
});

const FlashcardRowSchema = z.object({
  id: z.string(),
  topic_id: z.string(),
  front: z.string(),
  back: z.string(),
  hint: z.string().nullable(),
  order_index: z.number().int(),
  ease_factor: z.number(),
  interval_days: z.number().int(),
  repetitions: z.number().int(),
  next_review_date: z.string(),
  last_reviewed_at: z.string().nullable(),
  total_reviews: z.number().int(),
  correct_reviews: z.number().int(),
});

type TopicRow = z.infer<typeof TopicRowSchema>;
type QuestionRow = z.infer<typeof QuestionRowSchema>;
type FlashcardRow = z.infer<typeof FlashcardRowSchema>;

export class StudyStoreError extends Error {
  constructor(operation: string, readonly detail: string) {
    super(`Study store ${operation} failed: ${detail}`);
    this.name = "StudyStoreError";
  }
}

function questionToRow(sessionId: string, q: StudyQuestion) {
  return {
    id: q.id,
    topic_id: q.topicId,
    session_id: sessionId,
    question: q.question,
    options: q.options,
    correct_answer: q.correctAnswer,
    explanation: q.explanation,
    source_text: q.sourceText,
    source_page: q.sourcePage,
    order_index: q.orderIndex,
  };
}

function flashcardToRow(sessionId: string, f: StudyFlashcard) {
  return {
    id: f.id,
    topic_id: f.topicId,
    session_id: sessionId,
    front: f.front,
    back: f.back,
    hint: f.hint,
    order_index: f.orderIndex,
    ease_factor: f.easeFactor,
    interval_days: f.intervalDays,
    repetitions: f.repetitions,
    next_review_date: f.nextReviewDate,
    last_reviewed_at: f.lastReviewedAt,
    total_reviews: f.totalReviews,
    correct_reviews: f.correctReviews,
  };
}

function topicToRow(t: StudyTopic) {
  return {
    id: t.id,
    session_id: t.sessionId,
    parent_id: t.parentId,
    title: t.title,
    description: t.description,
    is_category: t.isCategory,
    order_index: t.orderIndex,
    depth: t.depth,
    position_x: t.position?.x ?? null,
    position_y: t.position?.y ?? null,
    workflow_stage: t.workflowStage,
    prerequisite_topic_ids: t.prerequisiteTopicIds,
    quiz_score: t.quiz.score,
    current_question_index: t.quiz.currentQuestionIndex,
    quiz_completed: t.quiz.completed,
    review_started_at: t.reviewStartedAt,
  };
}

function rowToQuestion(row: QuestionRow): StudyQuestion {
  return {
    id: row.id,
    topicId: row.topic_id,
    question: row.question,
    options: row.options,
    correctAnswer: row.correct_answer,
    explanation: row.explanation,
    sourceText: row.source_text,
    sourcePage: row.source_page,
    orderIndex: row.order_index,
  };
}

function rowToFlashcard(row: FlashcardRow): StudyFlashcard {
  return {
    id: row.id,
    topicId: row.topic_id,
    front: row.front,
    back: row.back,
    hint: row.hint,
    orderIndex: row.order_index,
    easeFactor: row.ease_factor,
    intervalDays: row.interval_days,
    repetitions: row.repetitions,
    nextReviewDate: row.next_review_date,
    lastReviewedAt: row.last_reviewed_at,
    totalReviews: row.total_reviews,
    correctReviews: row.correct_reviews,
  };
}

function rowToTopic(row: TopicRow, questions: StudyQuestion[], flashcards: StudyFlashcard[]): StudyTopic {
  return {
    id: row.id,
    sessionId: row.session_id,
    parentId: row.parent_id,
    title: row.title,
    description: row.description,
    isCategory: row.is_category,
    orderIndex: row.order_index,
    depth: row.depth,
    position: row.position_x !== null && row.position_y !== null ? { x: row.position_x, y: row.position_y } : null,
    workflowStage: row.workflow_stage,
    prerequisiteTopicIds: row.prerequisite_topic_ids ?? [],
    quiz: {
      score: row.quiz_score,
      currentQuestionIndex: row.current_question_index,
      completed: row.quiz_completed,
    },
    reviewStartedAt: row.review_started_at,
    questions,
    flashcards,
  };
}

export type PageResult = { data: unknown[] | null; error: { message: string } | null };

const PAGE_SIZE = 1000;

/**
 * Reads every row of a query page by page. PostgREST caps one response at its max-rows
 * setting, which may be lower than the page asked for, so the next page starts after the
 * rows actually returned and only an empty page ends the read. `fetchPage` must apply a total
 * order so pages do not overlap.
 */
export async function readAllPages(
  operation: string,
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  pageSize = PAGE_SIZE
): Promise<unknown[]> {
  const rows: unknown[] = [];
  for (;;) {
    const { data, error } = await fetchPage(rows.length, rows.length + pageSize - 1);
    if (error) throw new StudyStoreError(operation, error.message);
    if (!data || data.length === 0) return rows;
    rows.push(...data);
  }
}

function groupByTopic<T extends { topicId: string; orderIndex: number }>(items: T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const item of items) {
    const list = grouped.get(item.topicId) ?? [];
    list.push(item);
    grouped.set(item.topicId, list);
  }
  for (const list of grouped.values()) list.sort((a, b) => a.orderIndex - b.orderIndex);
  return grouped;
}

export class SupabaseStudyStore implements StudySessionStore {
  constructor(private readonly sb: SupabaseClient) {}

  async createSession(session: StudySession): Promise<void> {
    const { error } = await this.sb.rpc("create_study_session", {
      p_session: {
        id: session.id,
        user_id: session.userId,
        title: session.title,
        source_text: session.sourceText,
        source_hash: session.sourceHash,
        progressive_load: session.progressiveLoad,
        questions_per_topic: session.questionsPerTopic,
        status: session.status,
        progress: session.progress,
        created_at: session.createdAt,
      },
      p_topics: session.topics.map(topicToRow),
      p_questions: session.topics.flatMap((t) => t.questions.map((q) => questionToRow(session.id, q))),
      p_flashcards: session.topics.flatMap((t) => t.flashcards.map((f) => flashcardToRow(session.id, f))),
    });
    if (error) throw new StudyStoreError("createSession", error.message);
  }

  async getSession(sessionId: string, userId: string): Promise<StudySession | null> {
    const { data: sessionData, error: sessionError } = await this.sb
      .from("study_sessions")
      .select("*")
      .eq("id", sessionId)
      .eq("user_id", userId)
      .maybeSingle();
    if (sessionError) throw new StudyStoreError("getSession", sessionError.message);
    if (!sessionData) return null;
    const session = SessionRowSchema.parse(sessionData);

    const byTable = (table: string, orderColumns: string[]) =>
      readAllPages(`getSession ${table}`, (from, to) => {
        let query = this.sb.from(table).select("*").eq("session_id", sessionId);
        for (const column of orderColumns) query = query.order(column, { ascending: true });
        return query.range(from, to);
      });
    const [topicRows, questionRows, flashcardRows] = await Promise.all([
      byTable("study_topics", ["order_index", "id"]),
      byTable("study_questions", ["topic_id", "order_index", "id"]),
      byTable("study_flashcards", ["topic_id", "order_index", "id"]),
    ]);

    const questions = groupByTopic(z.array(QuestionRowSchema).parse(questionRows).map(rowToQuestion));
    const flashcards = groupByTopic(z.array(FlashcardRowSchema).parse(flashcardRows).map(rowToFlashcard));
    const topics = z
      .array(TopicRowSchema)
      .parse(topicRows)
      .map((row) => rowToTopic(row, questions.get(row.id) ?? [], flashcards.get(row.id) ?? []));

    return {
      id: session.id,
      userId: session.user_id,
      title: session.title,
      sourceText: session.source_text,
      sourceHash: session.source_hash,
      progressiveLoad: session.progressive_load,
      questionsPerTopic: session.questions_per_topic,
      status: session.status,
      progress: session.progress,
      createdAt: session.created_at,
      topics,
    };
  }

  async listSessions(userId: string, options: { includeArchived: boolean }): Promise<StudySessionSummary[]> {
    let query = this.sb
      .from("study_sessions")
      .select("id, title, progress, status, created_at")
      .eq("user_id", userId);
    if (!options.includeArchived) query = query.eq("status", "active");

    const { data, error } = await query.order("created_at", { ascending: false }).limit(100);
    if (error) throw new StudyStoreError("listSessions", error.message);
    return SessionRowSchema.pick({ id: true, title: true, progress: true, status: true, created_at: true })
      .array()
      .parse(data ?? [])
      .map((row) => ({
        id: row.id,
        title: row.title,
        progress: row.progress,
        status: row.status,
        createdAt: row.created_at,
      }));
  }

  async saveTopicContent(sessionId: string, writes: TopicContentWrite[]): Promise<void> {
    const { error } = await this.sb.rpc("save_topic_content", {
      p_session_id: sessionId,
      p_questions: writes.flatMap((w) => w.questions.map((q) => questionToRow(sessionId, q))),
      p_flashcards: writes.flatMap((w) => w.flashcards.map((f) => flashcardToRow(sessionId, f))),
    });
    if (error) throw new StudyStoreError("saveTopicContent", error.message);
  }

  async commitWorkflowChange(commit: WorkflowCommit): Promise<void> {
    const { error } = await this.sb.rpc("commit_workflow_change", {
      p_session_id: commit.sessionId,
      p_topics: commit.topics.map((patch) => ({
        id: patch.topicId,
        workflow_stage: patch.workflowStage ?? null,
        quiz_score: patch.quiz ? patch.quiz.score : null,
        current_question_index: patch.quiz ? patch.quiz.currentQuestionIndex : null,
        quiz_completed: patch.quiz ? patch.quiz.completed : null,
        has_quiz: patch.quiz !== undefined,
        has_review_started_at: patch.reviewStartedAt !== undefined,
        review_started_at: patch.reviewStartedAt ?? null,
      })),
      p_flashcard: commit.flashcard
        ? {
            id: commit.flashcard.id,
            ease_factor: commit.flashcard.schedule.easeFactor,
            interval_days: commit.flashcard.schedule.intervalDays,
            repetitions: commit.flashcard.schedule.repetitions,
            next_review_date: commit.flashcard.schedule.nextReviewDate,
            last_reviewed_at: commit.flashcard.schedule.lastReviewedAt,
            total_reviews: commit.flashcard.schedule.totalReviews,
            correct_reviews: commit.flashcard.schedule.correctReviews,
          }
        : null,
      p_progress: commit.progress,
    });
    if (error) throw new StudyStoreError("commitWorkflowChange", error.message);
  }

  async findSessionIdForTopic(topicId: string): Promise<string | null> {
    return this.lookupSessionId("study_topics", topicId);
  }

  async findSessionIdForFlashcard(flashcardId: string): Promise<string | null> {
    return this.lookupSessionId("study_flashcards", flashcardId);
  }

  private async lookupSessionId(table: "study_topics" | "study_flashcards", id: string): Promise<string | null> {
    const { data, error } = await this.sb.from(table).select("session_id").eq("id", id).maybeSingle();
    if (error) throw new StudyStoreError(`lookup ${table}`, error.message);
    return typeof data?.session_id === "string" ? data.session_id : null;
  }

  async deleteSession(sessionId: string, userId: string): Promise<boolean> {
    const { data, error } = await this.sb
      .from("study_sessions")
      .delete()
      .eq("id", sessionId)
      .eq("user_id", userId)
      .select("id");
    if (error) throw new StudyStoreError("deleteSession", error.message);
    return (data ?? []).length > 0;
  }

  async setSessionStatus(sessionId: string, userId: string, status: SessionStatus): Promise<boolean> {
    const { data, error } = await this.sb
      .from("study_sessions")
      .update({ status })
      .eq("id", sessionId)
      .eq("user_id", userId)
      .select("id");
    if (error) throw new StudyStoreError("setSessionStatus", error.message);
    return (data ?? []).length > 0;
  }
}
