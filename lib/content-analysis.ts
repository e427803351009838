// Source text intake: size checks, complexity analysis and windowing for prompts.

import { InvalidContentError } from "@/lib/study-errors";

export const MIN_SOURCE_CHARS = 50;
export const GENERATION_WINDOW_CHARS = 80_000;
export const WINDOW_OVERLAP_CHARS = 8_000;
const OUTLINE_SNIPPET_CHARS = 400;
const WORDS_PER_MINUTE = 225;

export type ContentAnalysis = {
  wordCount: number;
  estimatedReadingMinutes: number;
  recommendedTopics: number;
  recommendedQuestions: number;
  complexityScore: number;
  uniqueWordRatio: number;
  avgWordLength: number;
  avgSentenceLength: number;
};

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const ALNUM = /^[\p{L}\p{N}]+$/u;

export function analyzeContent(text: string): ContentAnalysis {
  const words = text.split(/\s+/).filter(Boolean);
  const wordCount = words.length;
  const divisor = Math.max(wordCount, 1);

  const unique = new Set(words.filter((word) => ALNUM.test(word)).map((word) => word.toLowerCase()));
  const uniqueWordRatio = unique.size / divisor;
  const avgWordLength = words.reduce((sum, word) => sum + word.length, 0) / divisor;
  const sentences = (text.match(/[.!?]/g) ?? []).length;
  const avgSentenceLength = wordCount / Math.max(sentences, 1);

  const complexityScore = Math.min(
    1,
    uniqueWordRatio * 0.4 + Math.min(avgWordLength / 8, 1) * 0.3 + Math.min(avgSentenceLength / 25, 1) * 0.3
  );

  let baseTopics: number;
  if (wordCount < 100) baseTopics = 1;
  else if (wordCount < 500) baseTopics = 2;
  else if (wordCount < 2000) baseTopics = 4;
  else if (wordCount < 5000) baseTopics = 8;
  else if (wordCount < 10000) baseTopics = 12;
  else if (wordCount < 20000) baseTopics = 20;
  else baseTopics = 30;

  let baseQuestions: number;
  if (wordCount < 1000) baseQuestions = 15;
  else if (wordCount < 3000) baseQuestions = 20;
  else if (wordCount < 10000) baseQuestions = 25;
  else baseQuestions = 30;

  return {
    wordCount,
    estimatedReadingMinutes: Math.max(1, Math.round(wordCount / WORDS_PER_MINUTE)),
    recommendedTopics: clamp(Math.round(baseTopics * (0.8 + complexityScore * 0.4)), 1, 35),
    recommendedQuestions: clamp(Math.round(baseQuestions * (0.9 + complexityScore * 0.6)), 10, 100),
    complexityScore: round(complexityScore, 2),
    uniqueWordRatio: round(uniqueWordRatio, 2),
    avgWordLength: round(avgWordLength, 1),
    avgSentenceLength: round(avgSentenceLength, 1),
  };
}

export function assertUsableContent(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length < MIN_SOURCE_CHARS) {
    throw new InvalidContentError(
      `Source content is too short (${trimmed.length} characters); at least ${MIN_SOURCE_CHARS} are required`
    );
  }
  return trimmed;
}

export function chunkText(
  text: string,
  windowChars = GENERATION_WINDOW_CHARS,
  overlapChars = WINDOW_OVERLAP_CHARS
): string[] {
  if (windowChars <= overlapChars) throw new RangeError("Window must be larger than its overlap");
  if (text.length <= windowChars) return [text];

  const chunks: string[] = [];
  const step = windowChars - overlapChars;
  for (let start = 0; start < text.length; start += step) {
    chunks.push(text.slice(start, start + windowChars));
    if (start + windowChars >= text.length) break;
  }
  return chunks;
}

/**
 * Fits long sources into one prompt window: the first window verbatim,
 * followed by the opening of every later chunk so the model still sees the outline.
 */
export function buildSourceExcerpt(text: string, windowChars = GENERATION_WINDOW_CHARS): string {
  if (text.length <= windowChars) return text;

  const chunks = chunkText(text, windowChars, WINDOW_OVERLAP_CHARS);
  const later = chunks.slice(1).map((chunk, idx) => {
    const opening = chunk.slice(WINDOW_OVERLAP_CHARS, WINDOW_OVERLAP_CHARS + OUTLINE_SNIPPET_CHARS).trim();
    return `[Section ${idx + 2}] ${opening}`;
  });
  const outline = `\n\n[Later sections, openings only]\n${later.join("\n")}`;
  const headChars = Math.max(0, windowChars - outline.length);
  return text.slice(0, headChars) + outline;
}

export function suggestedCategoryCount(targetLeaves: number): number {
  return Math.max(2, Math.min(5, Math.ceil(targetLeaves / 4)));
}
