/**
 * Generation Backend Configuration
 *
 * Two interchangeable backends produce study content:
 * - fast: Anthropic Claude Haiku (low latency, higher cost, supports response prefill)
 * - bulk: DeepSeek chat through its OpenAI-compatible API (cheaper, used for incremental batches)
 *
 * A backend is only registered when its API key is present.
 */

export type BackendId = "fast" | "bulk";
export type GenerationPhase = "initial" | "incremental";

export interface BackendConfig {
  id: BackendId;
  provider: "anthropic" | "deepseek";
  apiKey: string;
  baseURL: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_FAST_MODEL = "claude-3-5-haiku-20241022";
export const DEFAULT_BULK_MODEL = "deepseek-chat";
export const DEFAULT_MAX_TOKENS = 8192;
export const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 120_000;

export function clampNumber(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function clampTokens(raw: string | undefined) {
  return Math.round(clampNumber(raw, DEFAULT_MAX_TOKENS, 1024, 16_384));
}

export function getBackendConfig(id: BackendId, env: EnvSource = process.env): BackendConfig | null {
  const temperature = clampNumber(env.STUDY_TEMPERATURE, DEFAULT_TEMPERATURE, 0, 1);

  if (id === "fast") {
    const apiKey = env.ANTHROPIC_API_KEY?.trim();
    if (!apiKey) return null;
    return {
      id,
      provider: "anthropic",
      apiKey,
      baseURL: env.STUDY_FAST_BASE_URL?.trim() || "https://api.anthropic.com",
      model: env.STUDY_FAST_MODEL?.trim() || DEFAULT_FAST_MODEL,
      maxTokens: clampTokens(env.STUDY_FAST_MAX_TOKENS),
      temperature,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    };
  }

  const apiKey = env.DEEPSEEK_API_KEY?.trim();
  if (!apiKey) return null;
  return {
    id,
    provider: "deepseek",
    apiKey,
    baseURL: env.STUDY_BULK_BASE_URL?.trim() || "https://api.deepseek.com",
    model: env.STUDY_BULK_MODEL?.trim() || DEFAULT_BULK_MODEL,
    maxTokens: clampTokens(env.STUDY_BULK_MAX_TOKENS),
    temperature,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Backend order for a request: the first batch of a session prefers the fast backend so the
 * first topics appear quickly; incremental batches prefer the bulk backend. The other backend
 * is the failover target.
 */
export function backendPreference(phase: GenerationPhase): [BackendId, BackendId] {
  return phase === "initial" ? ["fast", "bulk"] : ["bulk", "fast"];
}

/**
 * Model identifier for usage tracking; matches the pricing table in usage.ts.
 */
export function getModelIdentifier(config: Pick<BackendConfig, "provider" | "model">): string {
  return `${config.provider}/${config.model}`;
}
