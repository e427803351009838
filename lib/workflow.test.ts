import { describe, it, expect } from 'vitest';
import { WorkflowChangeSet, canTransition, initialWorkflowStages, DEFAULT_WORKFLOW_POLICY } from '@/lib/workflow';
import { applyReview } from '@/lib/spaced-repetition';
import { WorkflowTransitionError } from '@/lib/study-errors';
import { sessionFixture } from '@/tests/helpers/session-fixture';

const NOW = new Date('2025-03-02T10:00:00.000Z');
const passing = { score: 80, currentQuestionIndex: 4, completed: true };

function reviewAll(changes: WorkflowChangeSet, topicId: string) {
  for (const card of changes.topic(topicId).flashcards) {
    changes.recordFlashcardReview(card.id, applyReview(card, 4, NOW));
  }
}

describe('canTransition', () => {
  it('allows exactly one step forward', () => {
    expect(canTransition('locked', 'quiz_available')).toBe(true);
    expect(canTransition('quiz_available', 'flashcard_review')).toBe(true);
    expect(canTransition('flashcard_review', 'completed')).toBe(true);
    expect(canTransition('locked', 'flashcard_review')).toBe(false);
    expect(canTransition('completed', 'locked')).toBe(false);
    expect(canTransition('flashcard_review', 'quiz_available')).toBe(false);
  });
});

describe('initialWorkflowStages', () => {
  const session = sessionFixture([{ id: 'a' }, { id: 'b', prerequisites: ['a'] }, { id: 'c' }]);

  it('opens the first free leaf under the sequential policy', () => {
    const stages = initialWorkflowStages(session.topics, DEFAULT_WORKFLOW_POLICY);
    expect(Object.fromEntries(stages)).toEqual({ cat: 'locked', a: 'quiz_available', b: 'locked', c: 'locked' });
  });

  it('opens every free leaf under the parallel policy', () => {
    const stages = initialWorkflowStages(session.topics, { unlockPolicy: 'parallel', quizPassPercent: 70 });
    expect(Object.fromEntries(stages)).toEqual({ cat: 'locked', a: 'quiz_available', b: 'locked', c: 'quiz_available' });
  });
});

describe('WorkflowChangeSet', () => {
  it('rejects quiz progress on a locked topic', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available' }, { id: 'b' }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    expect(() => changes.recordQuiz('b', passing)).toThrow(WorkflowTransitionError);
    expect(changes.patches()).toEqual([]);
  });

  it('keeps the quiz stage below the pass mark or while unfinished', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available' }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    changes.recordQuiz('a', { score: 69, currentQuestionIndex: 9, completed: true });
    expect(changes.stageOf('a')).toBe('quiz_available');
    changes.recordQuiz('a', { score: 90, currentQuestionIndex: 3, completed: false });
    expect(changes.stageOf('a')).toBe('quiz_available');
    expect(changes.patches()).toEqual([
      { topicId: 'a', quiz: { score: 90, currentQuestionIndex: 3, completed: false } },
    ]);
  });

  it('moves a passed quiz to flashcard review and stamps the pass start', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available' }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    changes.recordQuiz('a', { score: 70, currentQuestionIndex: 9, completed: true });
    expect(changes.patches()).toEqual([
      {
        topicId: 'a',
        workflowStage: 'flashcard_review',
        quiz: { score: 70, currentQuestionIndex: 9, completed: true },
        reviewStartedAt: NOW.toISOString(),
      },
    ]);
  });

  it('completes a topic without flashcards and unlocks its dependents', () => {
    const session = sessionFixture([
      { id: 'a', stage: 'quiz_available', flashcards: 0 },
      { id: 'b', prerequisites: ['a'] },
    ]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    changes.recordQuiz('a', passing);
    expect(changes.changedStages()).toEqual([
      { topicId: 'a', stage: 'completed' },
      { topicId: 'b', stage: 'quiz_available' },
    ]);
    expect(changes.progress()).toBe(50);
  });

  it('waits for every prerequisite before unlocking', () => {
    const session = sessionFixture([
      { id: 'a', stage: 'quiz_available', flashcards: 0 },
      { id: 'b', stage: 'quiz_available', flashcards: 0 },
      { id: 'c', prerequisites: ['a', 'b'] },
    ]);
    const changes = new WorkflowChangeSet(session, { unlockPolicy: 'parallel', quizPassPercent: 70 }, NOW);
    changes.recordQuiz('a', passing);
    expect(changes.stageOf('c')).toBe('locked');
    changes.recordQuiz('b', passing);
    expect(changes.stageOf('c')).toBe('quiz_available');
  });

  it('opens the next free leaf on completion under the sequential policy', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available', flashcards: 0 }, { id: 'b' }, { id: 'c' }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    changes.recordQuiz('a', passing);
    expect(changes.stageOf('b')).toBe('quiz_available');
    expect(changes.stageOf('c')).toBe('locked');
  });

  it('completes the topic once every card of the pass is reviewed', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available' }, { id: 'b', prerequisites: ['a'] }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    changes.recordQuiz('a', passing);

    const [first] = changes.topic('a').flashcards;
    if (!first) throw new Error('fixture has cards');
    changes.recordFlashcardReview(first.id, applyReview(first, 4, NOW));
    expect(changes.stageOf('a')).toBe('flashcard_review');

    reviewAll(changes, 'a');
    expect(changes.stageOf('a')).toBe('completed');
    expect(changes.stageOf('b')).toBe('quiz_available');
  });

  it('ignores reviews made before the current pass started', () => {
    const session = sessionFixture([{ id: 'a', stage: 'flashcard_review' }]);
    const topic = session.topics[1];
    if (!topic) throw new Error('fixture has a leaf');
    topic.reviewStartedAt = NOW.toISOString();
    for (const card of topic.flashcards) card.lastReviewedAt = '2025-03-01T00:00:00.000Z';

    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    expect(changes.allFlashcardsReviewed('a')).toBe(false);
    expect(() => changes.completeFlashcards('a')).toThrow(WorkflowTransitionError);
  });

  it('rejects explicit completion outside flashcard review', () => {
    const session = sessionFixture([{ id: 'a', stage: 'quiz_available' }]);
    const changes = new WorkflowChangeSet(session, DEFAULT_WORKFLOW_POLICY, NOW);
    expect(() => changes.completeFlashcards('a')).toThrow('Cannot move topic from quiz_available to completed');
  });
});
