import { describe, it, expect } from 'vitest';
import {
  MAX_QUESTIONS_PER_CALL,
  buildContentPrompt,
  estimateContentTokens,
  leavesPerContentCall,
  planContentRounds,
} from '@/lib/study-prompts';

// Output limit the adapter gives a call covering `leaves` leaves on a backend capped at `limit`.
const adapterBudget = (leaves: number, limit: number) => Math.min(limit, 1024 + leaves * 4096);

describe('planContentRounds', () => {
  it('splits thirty questions into twenty and ten with flashcards up front', () => {
    expect(planContentRounds(30)).toEqual([
      { questions: 20, flashcards: 12 },
      { questions: 10, flashcards: 0 },
    ]);
  });

  it('keeps small requests in one round', () => {
    expect(planContentRounds(2)).toEqual([{ questions: 2, flashcards: 3 }]);
  });

  it('covers a hundred questions in five rounds', () => {
    const rounds = planContentRounds(100);
    expect(rounds.map((r) => r.questions)).toEqual([20, 20, 20, 20, 20]);
    expect(rounds.map((r) => r.flashcards)).toEqual([12, 0, 0, 0, 0]);
  });
});

describe('leavesPerContentCall', () => {
  it('puts two full leaves in one call at the default limit', () => {
    expect(leavesPerContentCall({ questions: 20, flashcards: 12 })).toBe(2);
    expect(leavesPerContentCall({ questions: 10, flashcards: 0 })).toBe(5);
  });

  it('drops to one leaf per call on a smaller backend', () => {
    expect(leavesPerContentCall({ questions: 20, flashcards: 12 }, 4096)).toBe(1);
  });

  it('keeps every planned call inside the adapter output budget', () => {
    for (const limit of [4096, 8192, 16384]) {
      for (const questionsPerTopic of [1, 5, 10, 20, 30, 55, 100]) {
        const rounds = planContentRounds(questionsPerTopic, limit);
        expect(rounds.reduce((sum, r) => sum + r.questions, 0)).toBe(questionsPerTopic);
        for (const round of rounds) {
          expect(round.questions).toBeLessThanOrEqual(MAX_QUESTIONS_PER_CALL);
          const leaves = leavesPerContentCall(round, limit);
          expect(estimateContentTokens(leaves, round)).toBeLessThanOrEqual(adapterBudget(leaves, limit));
        }
      }
    }
  });
});

describe('buildContentPrompt', () => {
  it('lists questions a leaf already has', () => {
    const { user } = buildContentPrompt({
      sourceExcerpt: 'Cells divide by mitosis.',
      leaves: [
        { key: 'L1', title: 'Mitosis', description: null, parentTitle: 'Cell cycle', askedQuestions: ['What is prophase?'] },
      ],
      questionsPerTopic: 10,
      flashcardsPerTopic: 0,
    });
    const lines = user.split('\n');
    expect(lines[0]).toBe('Write 10 questions and 0 flashcards for EACH of these 1 topics:');
    expect(lines).toContain('Already asked (write different questions):');
    expect(lines).toContain('- What is prophase?');
  });
});
