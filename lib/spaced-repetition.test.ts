import { describe, it, expect } from 'vitest';
import {
  applyReview,
  initialSchedule,
  isDue,
  MIN_EASE_FACTOR,
  nextEaseFactor,
  reviewAccuracy,
} from '@/lib/spaced-repetition';
import type { FlashcardSchedule } from '@/lib/study-types';

const NOW = new Date('2025-03-01T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;

function daysAfter(date: Date, days: number) {
  return new Date(date.getTime() + days * DAY).toISOString();
}

describe('applyReview', () => {
  it('schedules a fresh card one day out, then six days out on quality 4', () => {
    const first = applyReview(initialSchedule(NOW), 4, NOW);
    expect(first.repetitions).toBe(1);
    expect(first.intervalDays).toBe(1);
    expect(first.easeFactor).toBe(2.5);
    expect(first.nextReviewDate).toBe(daysAfter(NOW, 1));

    const later = new Date(NOW.getTime() + DAY);
    const second = applyReview(first, 4, later);
    expect(second.repetitions).toBe(2);
    expect(second.intervalDays).toBe(6);
    expect(second.nextReviewDate).toBe(daysAfter(later, 6));
  });

  it('resets interval and repetitions on quality 1 and keeps the ease factor', () => {
    const mature: FlashcardSchedule = {
      easeFactor: 2.1,
      intervalDays: 40,
      repetitions: 7,
      nextReviewDate: NOW.toISOString(),
      lastReviewedAt: daysAfter(NOW, -40),
      totalReviews: 9,
      correctReviews: 8,
    };
    const next = applyReview(mature, 1, NOW);
    expect(next.repetitions).toBe(0);
    expect(next.intervalDays).toBe(1);
    expect(next.easeFactor).toBe(2.1);
    expect(next.nextReviewDate).toBe(daysAfter(NOW, 1));
    expect(next.totalReviews).toBe(10);
    expect(next.correctReviews).toBe(8);
    expect(next.lastReviewedAt).toBe(NOW.toISOString());
  });

  it('grows the interval strictly from the third perfect review on', () => {
    let schedule = initialSchedule(NOW);
    const intervals: number[] = [];
    for (let i = 0; i < 6; i++) {
      schedule = applyReview(schedule, 5, NOW);
      intervals.push(schedule.intervalDays);
    }
    expect(intervals.slice(0, 3)).toEqual([1, 6, 17]);
    for (let i = 3; i < intervals.length; i++) {
      expect(intervals[i]).toBeGreaterThan(intervals[i - 1]);
    }
    expect(schedule.correctReviews).toBe(6);
  });

  it('never lets the ease factor fall below the floor', () => {
    let schedule = initialSchedule(NOW);
    for (let i = 0; i < 12; i++) {
      schedule = applyReview(schedule, 3, NOW);
      expect(schedule.easeFactor).toBeGreaterThanOrEqual(MIN_EASE_FACTOR);
    }
    expect(schedule.easeFactor).toBe(MIN_EASE_FACTOR);
  });

  it('rejects qualities outside 0-5', () => {
    expect(() => applyReview(initialSchedule(NOW), 6, NOW)).toThrow(RangeError);
    expect(() => applyReview(initialSchedule(NOW), 2.5, NOW)).toThrow(RangeError);
  });

  it('does not mutate the input schedule', () => {
    const schedule = initialSchedule(NOW);
    applyReview(schedule, 5, NOW);
    expect(schedule).toEqual(initialSchedule(NOW));
  });
});

describe('nextEaseFactor', () => {
  it('follows the SM-2 adjustment', () => {
    expect(nextEaseFactor(2.5, 4)).toBe(2.5);
    expect(nextEaseFactor(2.5, 5)).toBeCloseTo(2.6, 10);
    expect(nextEaseFactor(2.5, 3)).toBeCloseTo(2.36, 10);
  });
});

describe('isDue / reviewAccuracy', () => {
  it('treats never-reviewed cards as due', () => {
    expect(isDue(initialSchedule(NOW), new Date(NOW.getTime() - DAY))).toBe(true);
  });

  it('compares the next review date against now', () => {
    const reviewed = applyReview(initialSchedule(NOW), 4, NOW);
    expect(isDue(reviewed, NOW)).toBe(false);
    expect(isDue(reviewed, new Date(NOW.getTime() + DAY))).toBe(true);
  });

  it('reports accuracy as a rounded percentage', () => {
    expect(reviewAccuracy({ totalReviews: 0, correctReviews: 0 })).toBe(0);
    expect(reviewAccuracy({ totalReviews: 3, correctReviews: 2 })).toBe(67);
  });
});
