/**
 * Incremental generation orchestrator.
 *
 * Session creation builds the topic tree (or reuses a cached one) and fills the first k leaves.
 * Each generate-more call fills the next b unfilled leaves in pre-order, under a per-session
 * lock held across select -> generate -> persist so that concurrent callers never pick the
 * same leaf. Progress is never stored: it is re-derived by scanning leaves for content.
 */

import { randomUUID } from "crypto";
import type {
  LeafContent,
  QuestionDraft,
  StudyFlashcard,
  StudyQuestion,
  StudySession,
  StudyTopic,
  StudyTreeSnapshot,
  TopicDraft,
  TopicNode,
} from "@/lib/study-types";
import { TopicProposalSchema, contentBatchSchemaFor, type ContentBatch } from "@/lib/schema";
import type { ContentGenerator, GenerateResult } from "@/lib/generation-adapter";
import type { GenerationPhase } from "@/lib/model-config";
import type { GenerationCache } from "@/lib/generation-cache";
import { generationCacheKey, hashSourceText } from "@/lib/generation-cache";
import type { SessionLock } from "@/lib/session-lock";
import type { StudySessionStore, TopicContentWrite } from "@/lib/study-store";
import type { UsageRecorder } from "@/lib/usage";
import { DEFAULT_MAX_TOKENS, getModelIdentifier } from "@/lib/model-config";
import {
  assertAcyclic,
  buildTopicHierarchy,
  prerequisiteKeyGraph,
  type QuestionWorthinessPolicy,
} from "@/lib/topic-hierarchy";
import {
  buildContentPrompt,
  buildHierarchyPrompt,
  leavesPerContentCall,
  planContentRounds,
  type ContentPromptLeaf,
} from "@/lib/study-prompts";
import { assertUsableContent, buildSourceExcerpt, suggestedCategoryCount } from "@/lib/content-analysis";
import { initialSchedule } from "@/lib/spaced-repetition";
import { initialWorkflowStages, type WorkflowPolicy } from "@/lib/workflow";
import { contentTotals } from "@/lib/session-progress";
import { buildTopicTree, leavesInOrder } from "@/lib/topic-tree";
import { GenerationError, StudySessionNotFoundError, errorMessage } from "@/lib/study-errors";

export type OrchestratorSettings = {
  initialLeaves: number;
  batchLeaves: number;
  cacheTtlSeconds: number;
  hierarchyAttempts: number;
  workflow: WorkflowPolicy;
  worthiness?: QuestionWorthinessPolicy;
  // Smallest output limit among the configured backends; content calls are sized to fit it.
  contentOutputTokens?: number;
};

export type OrchestratorDeps = {
  store: StudySessionStore;
  cache: GenerationCache;
  generator: ContentGenerator;
  lock: SessionLock;
  usage?: UsageRecorder;
  now?: () => Date;
  newId?: () => string;
};

export type CreateSessionInput = {
  userId: string;
  title?: string;
  content: string;
  numTopics: number;
  questionsPerTopic: number;
  progressiveLoad: boolean;
};

export type CreateSessionResult = {
  sessionId: string;
  title: string;
  topics: TopicNode[];
  questionsRemaining: number;
  progressiveLoad: boolean;
  totalQuestions: number;
  totalFlashcards: number;
  fromCache: boolean;
};

export type GenerateMoreResult = {
  message: string;
  generated: number;
  remaining: number;
  totalQuestions: number;
  totalFlashcards: number;
  hasMore: boolean;
};

type UsageContext = { userId: string; sessionId: string | null };

const TITLE_FALLBACK_CHARS = 60;

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

const questionKey = (text: string) => text.trim().toLowerCase().replace(/\s+/g, " ");

/**
 * Drops questions whose text repeats one already in the session. A leaf is never left empty
 * by this: if every question repeats, the generated list is kept as is.
 */
function dedupeQuestions(questions: QuestionDraft[], seen: Set<string>): QuestionDraft[] {
  const fresh: QuestionDraft[] = [];
  for (const question of questions) {
    const key = questionKey(question.question);
    if (seen.has(key)) continue;
    seen.add(key);
    fresh.push(question);
  }
  return fresh.length > 0 ? fresh : questions;
}

export class GenerationOrchestrator {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings
  ) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  async createSession(input: CreateSessionInput): Promise<CreateSessionResult> {
    const sourceText = assertUsableContent(input.content);
    const cacheKey = generationCacheKey({
      sourceText,
      targetLeaves: input.numTopics,
      questionsPerTopic: input.questionsPerTopic,
      progressiveLoad: input.progressiveLoad,
    });

    let snapshot = await this.deps.cache.lookup(cacheKey);
    const fromCache = snapshot !== null;
    if (!snapshot) {
      const generated = await this.generateSnapshot(input, sourceText);
      snapshot = generated.snapshot;
      if (generated.complete) {
        await this.deps.cache.store(cacheKey, snapshot, this.settings.cacheTtlSeconds);
      }
    }

    const session = this.materialize(snapshot, input, sourceText);
    await this.deps.store.createSession(session);

    const totals = contentTotals(session.topics);
    console.log("[generation-orchestrator] session created", {
      sessionId: session.id,
      fromCache,
      leaves: totals.totalLeaves,
      filled: totals.filledLeaves,
      remaining: totals.questionsRemaining,
    });

    return {
      sessionId: session.id,
      title: session.title,
      topics: buildTopicTree(session.topics),
      questionsRemaining: totals.questionsRemaining,
      progressiveLoad: input.progressiveLoad,
      totalQuestions: totals.totalQuestions,
      totalFlashcards: totals.totalFlashcards,
      fromCache,
    };
  }

  async generateMore(sessionId: string, userId: string): Promise<GenerateMoreResult> {
    return this.deps.lock.runExclusive(`generate:${sessionId}`, async () => {
      const session = await this.deps.store.getSession(sessionId, userId);
      if (!session) throw new StudySessionNotFoundError(sessionId);

      const pending = leavesInOrder(session.topics).filter((topic) => topic.questions.length === 0);
      if (pending.length === 0) {
        return {
          message: "All topics already have questions",
          generated: 0,
          remaining: 0,
          totalQuestions: 0,
          totalFlashcards: 0,
          hasMore: false,
        };
      }

      const batch = pending.slice(0, this.settings.batchLeaves);
      const parents = new Map(session.topics.map((topic) => [topic.id, topic.title]));
      const contents = await this.fillLeaves(
        batch.map((topic) => ({
          id: topic.id,
          title: topic.title,
          description: topic.description,
          parentTitle: topic.parentId ? parents.get(topic.parentId) ?? null : null,
        })),
        buildSourceExcerpt(session.sourceText),
        session.questionsPerTopic,
        "incremental",
        { userId, sessionId }
      );

      const seen = new Set(session.topics.flatMap((topic) => topic.questions.map((q) => questionKey(q.question))));
      const writes: TopicContentWrite[] = [];
      for (const topic of batch) {
        const content = contents.get(topic.id);
        if (!content) continue;
        writes.push(this.contentWrite(topic.id, { ...content, questions: dedupeQuestions(content.questions, seen) }));
      }

      await this.deps.store.saveTopicContent(sessionId, writes);

      const written = new Map(writes.map((write) => [write.topicId, write]));
      const totals = contentTotals(
        session.topics.map((topic) => {
          const write = written.get(topic.id);
          return write && topic.questions.length === 0
            ? { ...topic, questions: write.questions, flashcards: write.flashcards }
            : topic;
        })
      );

      const totalQuestions = writes.reduce((sum, write) => sum + write.questions.length, 0);
      const totalFlashcards = writes.reduce((sum, write) => sum + write.flashcards.length, 0);
      console.log("[generation-orchestrator] batch persisted", {
        sessionId,
        generated: writes.length,
        remaining: totals.questionsRemaining,
      });

      return {
        message: `Generated content for ${writes.length} topic${writes.length === 1 ? "" : "s"}`,
        generated: writes.length,
        remaining: totals.questionsRemaining,
        totalQuestions,
        totalFlashcards,
        hasMore: totals.questionsRemaining > 0,
      };
    });
  }

  /**
   * Builds the tree and fills the creation-time leaves. `complete` is false when a content
   * batch failed; such a tree is persisted but not cached.
   */
  private async generateSnapshot(
    input: CreateSessionInput,
    sourceText: string
  ): Promise<{ snapshot: StudyTreeSnapshot; complete: boolean }> {
    const excerpt = buildSourceExcerpt(sourceText);
    const usageContext: UsageContext = { userId: input.userId, sessionId: null };

    const hierarchy = await buildTopicHierarchy(
      async (previousIssues) => {
        const result = await this.deps.generator.generate({
          prompt: buildHierarchyPrompt({
            sourceExcerpt: excerpt,
            targetLeaves: input.numTopics,
            categoryCount: suggestedCategoryCount(input.numTopics),
            questionsPerTopic: input.questionsPerTopic,
            title: input.title,
            previousIssues,
          }),
          schema: TopicProposalSchema,
          batchSize: 1,
          phase: "initial",
          label: "hierarchy",
        });
        await this.recordUsage(result, "hierarchy", "initial", usageContext);
        return result.data;
      },
      { maxAttempts: this.settings.hierarchyAttempts, policy: this.settings.worthiness }
    );

    const topics = hierarchy.topics;
    const leaves = topics.filter((topic) => !topic.isCategory);
    const targets = input.progressiveLoad ? leaves.slice(0, this.settings.initialLeaves) : leaves;
    const byKey = new Map(topics.map((topic) => [topic.key, topic]));
    const seen = new Set<string>();
    let complete = true;

    for (const batch of chunk(targets, this.settings.batchLeaves)) {
      let contents: Map<string, LeafContent>;
      try {
        contents = await this.fillLeaves(
          batch.map((leaf) => ({
            id: leaf.key,
            title: leaf.title,
            description: leaf.description,
            parentTitle: leaf.parentKey ? byKey.get(leaf.parentKey)?.title ?? null : null,
          })),
          excerpt,
          input.questionsPerTopic,
          "initial",
          usageContext
        );
      } catch (err) {
        if (!(err instanceof GenerationError)) throw err;
        // The tree is still usable; remaining leaves are filled through generate-more.
        console.warn("[generation-orchestrator] initial content batch failed", { error: err.message });
        complete = false;
        break;
      }
      for (const leaf of batch) {
        const content = contents.get(leaf.key);
        if (content) leaf.content = { ...content, questions: dedupeQuestions(content.questions, seen) };
      }
    }

    const title =
      input.title?.trim() ||
      hierarchy.title?.trim() ||
      sourceText.slice(0, TITLE_FALLBACK_CHARS).replace(/\s+/g, " ").trim();

    return { snapshot: { title, topics }, complete };
  }

  /**
   * Generates content for a batch of leaves. The questions of each leaf are asked for in rounds
   * that fit one response, and each round covers as many leaves per call as fit. Leaves are
   * addressed by short local keys (L1, L2, ...) in the prompt and mapped back to their ids here.
   * A failed call fails the whole batch, so a leaf is written with all of its content or not at all.
   */
  private async fillLeaves(
    leaves: (Omit<ContentPromptLeaf, "key"> & { id: string })[],
    sourceExcerpt: string,
    questionsPerTopic: number,
    phase: GenerationPhase,
    usageContext: UsageContext
  ): Promise<Map<string, LeafContent>> {
    const outputTokens = this.settings.contentOutputTokens ?? DEFAULT_MAX_TOKENS;
    const contents = new Map<string, LeafContent>(leaves.map((leaf) => [leaf.id, { questions: [], flashcards: [] }]));

    for (const round of planContentRounds(questionsPerTopic, outputTokens)) {
      for (const group of chunk(leaves, leavesPerContentCall(round, outputTokens))) {
        const keyed = group.map((leaf, idx) => ({
          ...leaf,
          key: `L${idx + 1}`,
          askedQuestions: contents.get(leaf.id)?.questions.map((q) => q.question) ?? [],
        }));
        const result = await this.deps.generator.generate<ContentBatch>({
          prompt: buildContentPrompt({
            sourceExcerpt,
            leaves: keyed,
            questionsPerTopic: round.questions,
            flashcardsPerTopic: round.flashcards,
          }),
          schema: contentBatchSchemaFor(keyed.map((leaf) => leaf.key)),
          batchSize: keyed.length,
          phase,
          label: `content x${keyed.length}`,
        });
        await this.recordUsage(result, "content", phase, usageContext);

        for (const leaf of keyed) {
          const generated = result.data.subtopics[leaf.key];
          const content = contents.get(leaf.id);
          if (!generated || !content) continue;
          content.questions.push(...generated.questions);
          content.flashcards.push(...generated.flashcards);
        }
      }
    }
    return contents;
  }

  private contentWrite(topicId: string, content: LeafContent): TopicContentWrite {
    const created = this.now();
    const questions: StudyQuestion[] = content.questions.map((question, idx) => ({
      ...question,
      options: [...question.options],
      id: this.newId(),
      topicId,
      orderIndex: idx,
    }));
    const flashcards: StudyFlashcard[] = content.flashcards.map((card, idx) => ({
      ...card,
      ...initialSchedule(created),
      id: this.newId(),
      topicId,
      orderIndex: idx,
    }));
    return { topicId, questions, flashcards };
  }

  // Gives every draft a fresh identity; cached and freshly generated trees take the same path.
  private materialize(snapshot: StudyTreeSnapshot, input: CreateSessionInput, sourceText: string): StudySession {
    // Cached trees skip normalization, so the prerequisite graph is checked again here.
    assertAcyclic(prerequisiteKeyGraph(snapshot.topics));
    const sessionId = this.newId();
    const ids = new Map<string, string>(snapshot.topics.map((draft: TopicDraft) => [draft.key, this.newId()]));
    const idFor = (key: string) => ids.get(key) ?? key;

    const topics: StudyTopic[] = snapshot.topics.map((draft, orderIndex) => {
      const id = idFor(draft.key);
      const content = draft.content ? this.contentWrite(id, draft.content) : null;
      return {
        id,
        sessionId,
        parentId: draft.parentKey ? idFor(draft.parentKey) : null,
        title: draft.title,
        description: draft.description,
        isCategory: draft.isCategory,
        orderIndex,
        depth: draft.depth,
        position: { ...draft.position },
        workflowStage: "locked",
        prerequisiteTopicIds: draft.prerequisiteKeys.filter((key) => ids.has(key)).map(idFor),
        quiz: { score: null, currentQuestionIndex: 0, completed: false },
        reviewStartedAt: null,
        questions: content?.questions ?? [],
        flashcards: content?.flashcards ?? [],
      };
    });

    const stages = initialWorkflowStages(topics, this.settings.workflow);
    for (const topic of topics) topic.workflowStage = stages.get(topic.id) ?? "locked";

    return {
      id: sessionId,
      userId: input.userId,
      title: input.title?.trim() || snapshot.title,
      sourceText,
      sourceHash: hashSourceText(sourceText),
      progressiveLoad: input.progressiveLoad,
      questionsPerTopic: input.questionsPerTopic,
      status: "active",
      progress: 0,
      createdAt: this.now().toISOString(),
      topics,
    };
  }

  private async recordUsage(
    result: GenerateResult<unknown>,
    feature: "hierarchy" | "content",
    phase: GenerationPhase,
    context: UsageContext
  ) {
    if (!this.deps.usage) return;
    try {
      await this.deps.usage.record({
        userId: context.userId,
        model: getModelIdentifier(result),
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
        metadata: { feature: `study-${feature}`, phase, sessionId: context.sessionId, attempts: result.attempts },
      });
    } catch (err) {
      console.warn("[generation-orchestrator] usage log failed", { error: errorMessage(err) });
    }
  }
}
