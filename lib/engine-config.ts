import type { UnlockPolicy } from "@/lib/study-types";
import { DEFAULT_MAX_TOKENS, clampNumber, getBackendConfig, type BackendConfig, type EnvSource } from "@/lib/model-config";
import { GENERATION_CACHE_TTL_SECONDS } from "@/lib/generation-cache";
import { DEFAULT_WORKFLOW_POLICY, type WorkflowPolicy } from "@/lib/workflow";
import type { OrchestratorSettings } from "@/lib/generation-orchestrator";

export type EngineConfig = {
  backends: { fast: BackendConfig | null; bulk: BackendConfig | null };
  orchestrator: OrchestratorSettings;
  workflow: WorkflowPolicy;
  lock: { ttlMs: number; waitMs: number };
};

function readUnlockPolicy(raw: string | undefined): UnlockPolicy {
  const value = raw?.trim().toLowerCase();
  if (value === "parallel" || value === "sequential") return value;
  if (value) console.warn("[engine-config] unknown STUDY_UNLOCK_POLICY, using default", { value });
  return DEFAULT_WORKFLOW_POLICY.unlockPolicy;
}

const int = (raw: string | undefined, fallback: number, min: number, max: number) =>
  Math.round(clampNumber(raw, fallback, min, max));

export function readEngineConfig(env: EnvSource = process.env): EngineConfig {
  const workflow: WorkflowPolicy = {
    unlockPolicy: readUnlockPolicy(env.STUDY_UNLOCK_POLICY),
    quizPassPercent: clampNumber(env.STUDY_QUIZ_PASS_PERCENT, DEFAULT_WORKFLOW_POLICY.quizPassPercent, 0, 100),
  };

  const fast = getBackendConfig("fast", env);
  const bulk = getBackendConfig("bulk", env);
  const limits = [fast, bulk].flatMap((backend) => (backend ? [backend.maxTokens] : []));

  return {
    backends: { fast, bulk },
    orchestrator: {
      initialLeaves: int(env.STUDY_INITIAL_LEAVES, 3, 1, 35),
      batchLeaves: int(env.STUDY_BATCH_LEAVES, 2, 1, 10),
      cacheTtlSeconds: int(env.STUDY_CACHE_TTL_SECONDS, GENERATION_CACHE_TTL_SECONDS, 60, 30 * 24 * 60 * 60),
      hierarchyAttempts: int(env.STUDY_HIERARCHY_ATTEMPTS, 2, 1, 5),
      workflow,
      contentOutputTokens: limits.length > 0 ? Math.min(...limits) : DEFAULT_MAX_TOKENS,
    },
    workflow,
    lock: {
      ttlMs: int(env.STUDY_LOCK_TTL_MS, 180_000, 10_000, 30 * 60 * 1000),
      waitMs: int(env.STUDY_LOCK_WAIT_MS, 30_000, 0, 5 * 60 * 1000),
    },
  };
}
