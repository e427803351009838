import type {
  FlashcardSchedule,
  QuizState,
  SessionStatus,
  StudyFlashcard,
  StudyQuestion,
  StudySession,
  StudySessionSummary,
  WorkflowStage,
} from "@/lib/study-types";

export type TopicContentWrite = {
  topicId: string;
  questions: StudyQuestion[];
  flashcards: StudyFlashcard[];
};

export type TopicStatePatch = {
  topicId: string;
  workflowStage?: WorkflowStage;
  quiz?: QuizState;
  reviewStartedAt?: string | null;
};

/**
 * Everything one learner action changes, applied together: topic stage and quiz state
 * (including any prerequisite cascade), an optional flashcard schedule and the session progress.
 */
export type WorkflowCommit = {
  sessionId: string;
  topics: TopicStatePatch[];
  flashcard?: { id: string; schedule: FlashcardSchedule };
  progress: number;
};

/**
 * Persistence for study sessions. Each method is atomic: a failure leaves no partial write.
 */
export interface StudySessionStore {
  createSession(session: StudySession): Promise<void>;
  getSession(sessionId: string, userId: string): Promise<StudySession | null>;
  listSessions(userId: string, options: { includeArchived: boolean }): Promise<StudySessionSummary[]>;
  // Writes content for leaves that have none yet; leaves that already have questions are left untouched.
  saveTopicContent(sessionId: string, writes: TopicContentWrite[]): Promise<void>;
  commitWorkflowChange(commit: WorkflowCommit): Promise<void>;
  findSessionIdForTopic(topicId: string): Promise<string | null>;
  findSessionIdForFlashcard(flashcardId: string): Promise<string | null>;
  deleteSession(sessionId: string, userId: string): Promise<boolean>;
  setSessionStatus(sessionId: string, userId: string, status: SessionStatus): Promise<boolean>;
}
