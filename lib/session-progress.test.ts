import { describe, it, expect } from 'vitest';
import { contentTotals, generationState, sessionProgress, stageHistogram } from '@/lib/session-progress';
import { sessionFixture } from '@/tests/helpers/session-fixture';

describe('sessionProgress', () => {
  it('floors the completed share of leaves', () => {
    const topics = [
      { isCategory: true, workflowStage: 'completed' as const },
      { isCategory: false, workflowStage: 'completed' as const },
      { isCategory: false, workflowStage: 'flashcard_review' as const },
      { isCategory: false, workflowStage: 'locked' as const },
    ];
    expect(sessionProgress(topics)).toBe(33);
    expect(stageHistogram(topics)).toEqual({ locked: 1, quiz_available: 0, flashcard_review: 1, completed: 1 });
  });

  it('is zero without leaves', () => {
    expect(sessionProgress([{ isCategory: true, workflowStage: 'locked' }])).toBe(0);
  });
});

describe('contentTotals', () => {
  it('counts leaves still waiting for questions', () => {
    const session = sessionFixture([{ id: 'a' }, { id: 'b', flashcards: 3 }, { id: 'c', flashcards: 0 }]);
    const [, a] = session.topics;
    if (!a) throw new Error('fixture has leaves');
    a.questions = [
      {
        id: 'q1',
        topicId: 'a',
        orderIndex: 0,
        question: 'Q?',
        options: ['1', '2', '3', '4'],
        correctAnswer: 1,
        explanation: 'Two.',
        sourceText: null,
        sourcePage: null,
      },
    ];

    const totals = contentTotals(session.topics);
    expect(totals).toEqual({
      totalLeaves: 3,
      filledLeaves: 1,
      questionsRemaining: 2,
      totalQuestions: 1,
      totalFlashcards: 5,
    });
    expect(generationState(totals)).toBe('partially_filled');
    expect(generationState({ filledLeaves: 0, questionsRemaining: 3 })).toBe('created');
    expect(generationState({ filledLeaves: 3, questionsRemaining: 0 })).toBe('fully_filled');
  });
});
