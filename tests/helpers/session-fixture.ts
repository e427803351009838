import type { StudyFlashcard, StudySession, StudyTopic, WorkflowStage } from "@/lib/study-types";
import { initialSchedule } from "@/lib/spaced-repetition";

export type LeafSpec = {
  id: string;
  flashcards?: number;
  prerequisites?: string[];
  stage?: WorkflowStage;
};

export const FIXTURE_CREATED = new Date("2025-03-01T09:00:00.000Z");

/**
 * One category ("cat") holding the given leaves in order. Flashcard ids are `<leaf>-c<n>`.
 */
export function sessionFixture(leaves: LeafSpec[], userId = "user-1"): StudySession {
  const sessionId = "session-1";
  const topic = (partial: Pick<StudyTopic, "id" | "parentId" | "isCategory" | "orderIndex" | "depth">): StudyTopic => ({
    ...partial,
    sessionId,
    title: partial.id,
    description: null,
    position: null,
    workflowStage: "locked",
    prerequisiteTopicIds: [],
    quiz: { score: null, currentQuestionIndex: 0, completed: false },
    reviewStartedAt: null,
    questions: [],
    flashcards: [],
  });

  const topics: StudyTopic[] = [topic({ id: "cat", parentId: null, isCategory: true, orderIndex: 0, depth: 1 })];
  leaves.forEach((spec, idx) => {
    const flashcards: StudyFlashcard[] = Array.from({ length: spec.flashcards ?? 2 }, (_, n) => ({
      ...initialSchedule(FIXTURE_CREATED),
      id: `${spec.id}-c${n + 1}`,
      topicId: spec.id,
      orderIndex: n,
      front: `front ${n + 1}`,
      back: `back ${n + 1}`,
      hint: null,
    }));
    topics.push({
      ...topic({ id: spec.id, parentId: "cat", isCategory: false, orderIndex: idx + 1, depth: 2 }),
      workflowStage: spec.stage ?? "locked",
      prerequisiteTopicIds: spec.prerequisites ?? [],
      flashcards,
    });
  });

  return {
    id: sessionId,
    userId,
    title: "Fixture session",
    sourceText: "fixture source",
    sourceHash: "hash",
    progressiveLoad: true,
    questionsPerTopic: 2,
    status: "active",
    progress: 0,
    createdAt: FIXTURE_CREATED.toISOString(),
    topics,
  };
}
