// Shared domain types for study sessions, their topic trees and learner state.

export const WORKFLOW_STAGES = ["locked", "quiz_available", "flashcard_review", "completed"] as const;
export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

export type UnlockPolicy = "sequential" | "parallel";

export type SessionStatus = "active" | "archived";

export type LayoutPosition = { x: number; y: number };

export type QuestionDraft = {
  question: string;
  options: string[];
  correctAnswer: number;
  explanation: string;
  sourceText: string | null;
  sourcePage: number | null;
};

export type FlashcardDraft = {
  front: string;
  back: string;
  hint: string | null;
};

export type LeafContent = {
  questions: QuestionDraft[];
  flashcards: FlashcardDraft[];
};

/**
 * A topic before it has an identity. `key` is unique within one tree and
 * `prerequisiteKeys` reference other leaves of the same tree.
 * Drafts are kept in pre-order, which is the traversal order used for
 * batch selection and sequential unlock.
 */
export type TopicDraft = {
  key: string;
  parentKey: string | null;
  title: string;
  description: string | null;
  isCategory: boolean;
  depth: number;
  position: LayoutPosition;
  prerequisiteKeys: string[];
  content: LeafContent | null;
};

// What the generation cache stores: a complete tree prior to persistence.
export type StudyTreeSnapshot = {
  title: string;
  topics: TopicDraft[];
};

export type FlashcardSchedule = {
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  nextReviewDate: string;
  lastReviewedAt: string | null;
  totalReviews: number;
  correctReviews: number;
};

export type StudyQuestion = QuestionDraft & {
  id: string;
  topicId: string;
  orderIndex: number;
};

export type StudyFlashcard = FlashcardDraft &
  FlashcardSchedule & {
    id: string;
    topicId: string;
    orderIndex: number;
  };

export type QuizState = {
  score: number | null;
  currentQuestionIndex: number;
  completed: boolean;
};

export type StudyTopic = {
  id: string;
  sessionId: string;
  parentId: string | null;
  title: string;
  description: string | null;
  isCategory: boolean;
  orderIndex: number;
  depth: number;
  position: LayoutPosition | null;
  workflowStage: WorkflowStage;
  prerequisiteTopicIds: string[];
  quiz: QuizState;
  // Start of the current flashcard pass; reviews before it do not count.
  reviewStartedAt: string | null;
  questions: StudyQuestion[];
  flashcards: StudyFlashcard[];
};

export type StudySession = {
  id: string;
  userId: string;
  title: string;
  sourceText: string;
  sourceHash: string;
  progressiveLoad: boolean;
  questionsPerTopic: number;
  status: SessionStatus;
  progress: number;
  createdAt: string;
  // Pre-order; `orderIndex` matches array position.
  topics: StudyTopic[];
};

export type StudySessionSummary = {
  id: string;
  title: string;
  progress: number;
  status: SessionStatus;
  createdAt: string;
};

export type TopicNode = Omit<StudyTopic, "sessionId"> & {
  children: TopicNode[];
};
