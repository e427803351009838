import type { HierarchyIssue } from "@/lib/study-errors";
import { DEFAULT_MAX_TOKENS } from "@/lib/model-config";

export type PromptPair = { system: string; user: string };

type HierarchyPromptParams = {
  sourceExcerpt: string;
  targetLeaves: number;
  categoryCount: number;
  questionsPerTopic: number;
  title?: string;
  // Problems found in the previous proposal; switches to the stricter wording.
  previousIssues?: HierarchyIssue[];
};

export function buildHierarchyPrompt(params: HierarchyPromptParams): PromptPair {
  const { sourceExcerpt, targetLeaves, categoryCount, questionsPerTopic, title, previousIssues } = params;

  const system = [
    `Organize study material into a topic hierarchy as a JSON object.`,
    `Depth: category -> subtopic -> leaf at most. A category with no subtopics is itself a leaf.`,
    `Leaves carry the questions: each leaf needs a specific title and a one-sentence description, with enough material for ${questionsPerTopic} distinct multiple-choice questions.`,
    `Siblings must cover different material; never repeat a title or reword the same idea.`,
    `Optional "prerequisites" lists titles of other leaves that must be studied first. Never create circular prerequisites.`,
    `JSON Schema: { title: string, categories: [{ title: string, description: string, prerequisites?: string[], subtopics?: [same shape] }] }`,
  ].join("\n");

  const userLines = [
    `Create ${categoryCount} categories with about ${targetLeaves} leaf topics in total.`,
  ];
  if (title) userLines.push(`Session title: ${title}`);

  if (previousIssues && previousIssues.length > 0) {
    userLines.push(`\nThe previous hierarchy was rejected. Fix every problem below:`);
    for (const issue of previousIssues.slice(0, 12)) {
      userLines.push(`- ${issue.path}: ${issue.message}`);
    }
    userLines.push(`Do not nest deeper than three levels. Keep every title unique among its siblings.`);
  }

  userLines.push(`\nStudy material:`);
  userLines.push(sourceExcerpt.trim());
  userLines.push(`\nRespond with a valid JSON object matching the hierarchy schema.`);

  return { system, user: userLines.join("\n") };
}

export type ContentPromptLeaf = {
  key: string;
  title: string;
  description: string | null;
  parentTitle: string | null;
  // Questions this leaf already received in an earlier round.
  askedQuestions?: string[];
};

type ContentPromptParams = {
  sourceExcerpt: string;
  leaves: ContentPromptLeaf[];
  questionsPerTopic: number;
  flashcardsPerTopic: number;
};

export function flashcardsPerTopicFor(questionsPerTopic: number): number {
  return Math.min(12, Math.max(3, Math.round(questionsPerTopic / 2)));
}

// Output size estimates; a question with its explanation and source quote runs about 150 tokens.
export const MAX_QUESTIONS_PER_CALL = 20;
export const TOKENS_PER_QUESTION = 150;
export const TOKENS_PER_FLASHCARD = 60;
const RESPONSE_OVERHEAD_TOKENS = 256;

export type ContentRound = { questions: number; flashcards: number };

export function estimateContentTokens(leafCount: number, round: ContentRound): number {
  return RESPONSE_OVERHEAD_TOKENS + leafCount * (round.questions * TOKENS_PER_QUESTION + round.flashcards * TOKENS_PER_FLASHCARD);
}

/**
 * Splits a leaf's questions into rounds that each fit one response. Flashcards are all asked
 * for in the first round.
 */
export function planContentRounds(questionsPerTopic: number, outputTokens = DEFAULT_MAX_TOKENS): ContentRound[] {
  const flashcards = flashcardsPerTopicFor(questionsPerTopic);
  const fitting = Math.floor((outputTokens - RESPONSE_OVERHEAD_TOKENS - flashcards * TOKENS_PER_FLASHCARD) / TOKENS_PER_QUESTION);
  const perRound = Math.max(1, Math.min(MAX_QUESTIONS_PER_CALL, fitting));

  const rounds: ContentRound[] = [];
  for (let asked = 0; asked < questionsPerTopic; asked += perRound) {
    rounds.push({ questions: Math.min(perRound, questionsPerTopic - asked), flashcards: asked === 0 ? flashcards : 0 });
  }
  return rounds;
}

// How many leaves one call can cover for a round without overrunning the output limit.
export function leavesPerContentCall(round: ContentRound, outputTokens = DEFAULT_MAX_TOKENS): number {
  const perLeaf = estimateContentTokens(1, round) - RESPONSE_OVERHEAD_TOKENS;
  return Math.max(1, Math.floor((outputTokens - RESPONSE_OVERHEAD_TOKENS) / perLeaf));
}

export function buildContentPrompt(params: ContentPromptParams): PromptPair {
  const { sourceExcerpt, leaves, questionsPerTopic, flashcardsPerTopic } = params;

  const system = [
    `Generate multiple-choice questions and flashcards for each requested topic as a JSON object.`,
    `Questions: exactly 4 plausible options, correctAnswer is the 0-based index of the right option, explanation says why it is right. Test understanding and application, not only recall.`,
    `sourceText quotes the passage from the material that supports the answer; sourcePage is the page number when known.`,
    `Flashcards: a short prompt on the front, the answer on the back, an optional hint.`,
    `No duplicate questions within or across topics. Use only the topic keys given.`,
    `JSON Schema: { subtopics: { [key: string]: { questions: [{ question: string, options: string[4], correctAnswer: 0-3, explanation: string, sourceText?: string, sourcePage?: number }], flashcards: [{ front: string, back: string, hint?: string }] } } }`,
  ].join("\n");

  const userLines = [
    `Write ${questionsPerTopic} questions and ${flashcardsPerTopic} flashcards for EACH of these ${leaves.length} topics:`,
  ];
  for (const leaf of leaves) {
    userLines.push(`\n[${leaf.key}]`);
    userLines.push(`Title: ${leaf.title}`);
    if (leaf.parentTitle) userLines.push(`Category: ${leaf.parentTitle}`);
    if (leaf.description) userLines.push(`Focus: ${leaf.description}`);
    if (leaf.askedQuestions && leaf.askedQuestions.length > 0) {
      userLines.push(`Already asked (write different questions):`);
      for (const question of leaf.askedQuestions) userLines.push(`- ${question}`);
    }
  }

  userLines.push(`\nStudy material:`);
  userLines.push(sourceExcerpt.trim());
  userLines.push(`\nRespond with a valid JSON object keyed by the topic keys above.`);

  return { system, user: userLines.join("\n") };
}
