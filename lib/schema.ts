import { z } from "zod";

// ---- Provider output ----

export type TopicProposalNode = {
  title: string;
  description?: string | null;
  prerequisites?: string[] | null;
  subtopics?: TopicProposalNode[] | null;
};

export const TopicProposalNodeSchema: z.ZodType<TopicProposalNode> = z.lazy(() =>
  z.object({
    title: z.string().trim().min(1),
    description: z.string().nullish(),
    prerequisites: z.array(z.string()).nullish(),
    subtopics: z.array(TopicProposalNodeSchema).nullish(),
  })
);

export const TopicProposalSchema = z.object({
  title: z.string().trim().min(1).nullish(),
  categories: z.array(TopicProposalNodeSchema).min(1),
});

export type TopicProposal = z.infer<typeof TopicProposalSchema>;

const LETTER_INDEX = "ABCD";

// Models occasionally answer with the option letter instead of its index.
const CorrectAnswerSchema = z.preprocess((value) => {
  if (typeof value === "string") {
    const trimmed = value.trim().toUpperCase();
    if (trimmed.length === 1 && LETTER_INDEX.includes(trimmed)) return LETTER_INDEX.indexOf(trimmed);
    if (/^\d$/.test(trimmed)) return Number(trimmed);
  }
  return value;
}, z.number().int().min(0).max(3));

// One MCQ with exactly four options and a mandatory explanation
export const GeneratedQuestionSchema = z.object({
  question: z.string().trim().min(1),
  options: z.array(z.string().trim().min(1)).length(4),
  correctAnswer: CorrectAnswerSchema,
  explanation: z.string().trim().min(1),
  sourceText: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() ? value.trim() : null)),
  sourcePage: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value) => {
      if (value === null || value === undefined) return null;
      const page = typeof value === "number" ? value : Number.parseInt(value, 10);
      return Number.isFinite(page) && page > 0 ? Math.trunc(page) : null;
    }),
});

export const GeneratedFlashcardSchema = z.object({
  front: z.string().trim().min(1),
  back: z.string().trim().min(1),
  hint: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() ? value.trim() : null)),
});

export const GeneratedLeafContentSchema = z.object({
  questions: z.array(GeneratedQuestionSchema).min(1),
  flashcards: z.array(GeneratedFlashcardSchema).default([]),
});

export const ContentBatchSchema = z.object({
  subtopics: z.record(z.string(), GeneratedLeafContentSchema),
});

export type ContentBatch = z.infer<typeof ContentBatchSchema>;

/**
 * Content batch schema that also requires an entry for every requested leaf key.
 * A batch missing a leaf is a schema violation and is retried like a parse failure.
 */
export function contentBatchSchemaFor(keys: string[]) {
  return ContentBatchSchema.superRefine((batch, ctx) => {
    for (const key of keys) {
      if (!batch.subtopics[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["subtopics", key],
          message: `Missing content for requested topic ${key}`,
        });
      }
    }
  });
}

// ---- Request bodies ----

export const CreateSessionBodySchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  content: z.string().min(1),
  numTopics: z.number().int().min(1).max(35).default(6),
  questionsPerTopic: z.number().int().min(1).max(100).default(10),
  progressiveLoad: z.boolean().default(true),
});

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>;

export const AnalyzeContentBodySchema = z.object({
  content: z.string().min(1),
});

export const TopicProgressBodySchema = z.object({
  score: z.number().min(0).max(100),
  currentQuestionIndex: z.number().int().min(0),
  completed: z.boolean(),
});

export type TopicProgressBody = z.infer<typeof TopicProgressBodySchema>;

export const BatchProgressBodySchema = z.object({
  updates: z
    .array(TopicProgressBodySchema.extend({ topicId: z.string().min(1) }))
    .min(1)
    .max(50),
});

export const FlashcardReviewBodySchema = z.object({
  quality: z.number().int().min(0).max(5),
});
