import type { SupabaseClient } from "@supabase/supabase-js";
import type { StudySessionSummary, TopicNode } from "@/lib/study-types";
import type { StudySessionStore } from "@/lib/study-store";
import { SupabaseStudyStore } from "@/lib/supabase-study-store";
import { AdvisoryGenerationCache, SupabaseGenerationCache, type GenerationCache } from "@/lib/generation-cache";
import { GenerationAdapter, type ContentGenerator } from "@/lib/generation-adapter";
import { createBackend } from "@/lib/generation-backends";
import { SupabaseSessionLock, type SessionLock } from "@/lib/session-lock";
import { SupabaseUsageRecorder, type UsageRecorder } from "@/lib/usage";
import { GenerationOrchestrator } from "@/lib/generation-orchestrator";
import { LearnerProgressService } from "@/lib/learner-progress";
import { readEngineConfig, type EngineConfig } from "@/lib/engine-config";
import { contentTotals, generationState, type GenerationState } from "@/lib/session-progress";
import { buildTopicTree } from "@/lib/topic-tree";
import { StudySessionNotFoundError } from "@/lib/study-errors";

export type EngineDeps = {
  store: StudySessionStore;
  cache: GenerationCache;
  generator: ContentGenerator;
  lock: SessionLock;
  usage?: UsageRecorder;
  now?: () => Date;
  newId?: () => string;
};

export type SessionDetail = {
  id: string;
  title: string;
  status: string;
  progressiveLoad: boolean;
  questionsPerTopic: number;
  createdAt: string;
  progress: number;
  questionsRemaining: number;
  totalQuestions: number;
  totalFlashcards: number;
  generationState: GenerationState;
  topics: TopicNode[];
};

/**
 * Entry point used by the route handlers: generation, learner progress and session
 * housekeeping over one store.
 */
export class StudyEngine {
  readonly generation: GenerationOrchestrator;
  readonly learner: LearnerProgressService;

  constructor(
    private readonly deps: EngineDeps,
    config: Pick<EngineConfig, "orchestrator" | "workflow">
  ) {
    // Cache failures never surface to callers.
    const cache = deps.cache instanceof AdvisoryGenerationCache ? deps.cache : new AdvisoryGenerationCache(deps.cache);
    this.generation = new GenerationOrchestrator({ ...deps, cache }, config.orchestrator);
    this.learner = new LearnerProgressService({ store: deps.store, lock: deps.lock, now: deps.now }, config.workflow);
  }

  async getSession(sessionId: string, userId: string): Promise<SessionDetail> {
    const session = await this.deps.store.getSession(sessionId, userId);
    if (!session) throw new StudySessionNotFoundError(sessionId);
    const totals = contentTotals(session.topics);
    return {
      id: session.id,
      title: session.title,
      status: session.status,
      progressiveLoad: session.progressiveLoad,
      questionsPerTopic: session.questionsPerTopic,
      createdAt: session.createdAt,
      progress: session.progress,
      questionsRemaining: totals.questionsRemaining,
      totalQuestions: totals.totalQuestions,
      totalFlashcards: totals.totalFlashcards,
      generationState: generationState(totals),
      topics: buildTopicTree(session.topics),
    };
  }

  listSessions(userId: string, includeArchived = false): Promise<StudySessionSummary[]> {
    return this.deps.store.listSessions(userId, { includeArchived });
  }

  async deleteSession(sessionId: string, userId: string): Promise<void> {
    const deleted = await this.deps.store.deleteSession(sessionId, userId);
    if (!deleted) throw new StudySessionNotFoundError(sessionId);
    console.log("[study-engine] session deleted", { sessionId });
  }

  async archiveSession(sessionId: string, userId: string): Promise<void> {
    const updated = await this.deps.store.setSessionStatus(sessionId, userId, "archived");
    if (!updated) throw new StudySessionNotFoundError(sessionId);
    console.log("[study-engine] session archived", { sessionId });
  }
}

/**
 * Builds the engine from environment configuration over a service-role Supabase client.
 * Throws ConfigurationError when no generation backend has an API key.
 */
export function createStudyEngine(sb: SupabaseClient, config: EngineConfig = readEngineConfig()): StudyEngine {
  const backends = {
    fast: config.backends.fast ? createBackend(config.backends.fast) : undefined,
    bulk: config.backends.bulk ? createBackend(config.backends.bulk) : undefined,
  };
  return new StudyEngine(
    {
      store: new SupabaseStudyStore(sb),
      cache: new SupabaseGenerationCache(sb),
      generator: new GenerationAdapter(backends),
      lock: new SupabaseSessionLock(sb, config.lock),
      usage: new SupabaseUsageRecorder(sb),
    },
    config
  );
}
