import type { FlashcardSchedule } from "@/lib/study-types";

// SM-2 scheduling for a single flashcard.

export const DEFAULT_EASE_FACTOR = 2.5;
export const MIN_EASE_FACTOR = 1.3;
export const PASSING_QUALITY = 3;
export const MAX_QUALITY = 5;

const DAY_MS = 24 * 60 * 60 * 1000;

export type ReviewQuality = 0 | 1 | 2 | 3 | 4 | 5;

export function isReviewQuality(value: unknown): value is ReviewQuality {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_QUALITY;
}

// A new card is due as soon as it exists.
export function initialSchedule(now: Date): FlashcardSchedule {
  return {
    easeFactor: DEFAULT_EASE_FACTOR,
    intervalDays: 1,
    repetitions: 0,
    nextReviewDate: now.toISOString(),
    lastReviewedAt: null,
    totalReviews: 0,
    correctReviews: 0,
  };
}

export function nextEaseFactor(easeFactor: number, quality: ReviewQuality): number {
  const miss = MAX_QUALITY - quality;
  return Math.max(MIN_EASE_FACTOR, easeFactor + (0.1 - miss * (0.08 + miss * 0.02)));
}

/**
 * Applies one review and returns the new schedule; the input is not mutated.
 * Failed reviews (quality < 3) restart the card at a one day interval and keep the ease factor.
 */
export function applyReview(schedule: FlashcardSchedule, quality: number, now: Date): FlashcardSchedule {
  if (!isReviewQuality(quality)) {
    throw new RangeError(`Review quality must be an integer from 0 to ${MAX_QUALITY}, got ${quality}`);
  }

  const passed = quality >= PASSING_QUALITY;
  let { easeFactor, intervalDays, repetitions } = schedule;

  if (!passed) {
    repetitions = 0;
    intervalDays = 1;
  } else {
    repetitions += 1;
    easeFactor = nextEaseFactor(easeFactor, quality);
    if (repetitions === 1) intervalDays = 1;
    else if (repetitions === 2) intervalDays = 6;
    else intervalDays = Math.max(1, Math.round(schedule.intervalDays * easeFactor));
  }

  return {
    easeFactor,
    intervalDays,
    repetitions,
    nextReviewDate: new Date(now.getTime() + intervalDays * DAY_MS).toISOString(),
    lastReviewedAt: now.toISOString(),
    totalReviews: schedule.totalReviews + 1,
    correctReviews: schedule.correctReviews + (passed ? 1 : 0),
  };
}

export function isDue(schedule: Pick<FlashcardSchedule, "nextReviewDate" | "lastReviewedAt">, now: Date): boolean {
  if (!schedule.lastReviewedAt) return true;
  return Date.parse(schedule.nextReviewDate) <= now.getTime();
}

export function reviewAccuracy(schedule: Pick<FlashcardSchedule, "totalReviews" | "correctReviews">): number {
  if (schedule.totalReviews <= 0) return 0;
  return Math.round((schedule.correctReviews / schedule.totalReviews) * 100);
}
