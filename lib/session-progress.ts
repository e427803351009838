import type { StudyTopic, WorkflowStage } from "@/lib/study-types";

type TopicStageView = Pick<StudyTopic, "isCategory" | "workflowStage">;
type TopicContentView = Pick<StudyTopic, "isCategory" | "questions" | "flashcards">;

export type StageHistogram = Record<WorkflowStage, number>;

export type ContentTotals = {
  totalLeaves: number;
  filledLeaves: number;
  questionsRemaining: number;
  totalQuestions: number;
  totalFlashcards: number;
};

// Whole percent of leaf topics that reached `completed`.
export function sessionProgress(topics: TopicStageView[]): number {
  const leaves = topics.filter((topic) => !topic.isCategory);
  if (leaves.length === 0) return 0;
  const completed = leaves.filter((topic) => topic.workflowStage === "completed").length;
  return Math.floor((completed / leaves.length) * 100);
}

export function stageHistogram(topics: TopicStageView[]): StageHistogram {
  const histogram: StageHistogram = { locked: 0, quiz_available: 0, flashcard_review: 0, completed: 0 };
  for (const topic of topics) {
    if (!topic.isCategory) histogram[topic.workflowStage] += 1;
  }
  return histogram;
}

/**
 * Content counts derived by scanning leaves. `questionsRemaining` (leaves still lacking
 * questions) is never stored; it is recomputed here each time.
 */
export function contentTotals(topics: TopicContentView[]): ContentTotals {
  let totalLeaves = 0;
  let filledLeaves = 0;
  let totalQuestions = 0;
  let totalFlashcards = 0;
  for (const topic of topics) {
    if (topic.isCategory) continue;
    totalLeaves += 1;
    if (topic.questions.length > 0) filledLeaves += 1;
    totalQuestions += topic.questions.length;
    totalFlashcards += topic.flashcards.length;
  }
  return {
    totalLeaves,
    filledLeaves,
    questionsRemaining: totalLeaves - filledLeaves,
    totalQuestions,
    totalFlashcards,
  };
}

export type GenerationState = "created" | "partially_filled" | "fully_filled";

export function generationState(totals: Pick<ContentTotals, "filledLeaves" | "questionsRemaining">): GenerationState {
  if (totals.questionsRemaining === 0) return "fully_filled";
  return totals.filledLeaves === 0 ? "created" : "partially_filled";
}
