/**
 * Generation adapter
 *
 * One entry point over the fast and bulk backends. Every request:
 * 1. is seeded with "{" on backends that support prefill (others get JSON mode)
 * 2. is parsed leniently (fences, surrounding prose) and then schema-validated
 * 3. on failure is retried once on the same backend with a stricter format instruction,
 *    then once on the other backend, before a GenerationError is raised
 */

import type { ZodError } from "zod";
import type { PromptPair } from "@/lib/study-prompts";
import { backendPreference, type BackendId, type GenerationPhase } from "@/lib/model-config";
import type { BackendUsage, GenerationBackend } from "@/lib/generation-backends";
import { parseModelJson } from "@/lib/json-repair";
import {
  ConfigurationError,
  GenerationError,
  errorMessage,
  type GenerationAttemptFailure,
} from "@/lib/study-errors";

export const JSON_PREFILL = "{";

const TOKENS_BASE = 1024;
const TOKENS_PER_BATCH_ITEM = 4096;

const STRICT_FORMAT_INSTRUCTIONS = [
  "",
  "Final requirement: Respond with ONLY a single strict JSON object (no prose, no markdown).",
  "Final requirement: The response must start with { and end with }. Text outside the JSON object makes it invalid. Keep it compact so it is not cut off.",
];

export type OutputSchema<T> = {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodError };
};

export type GenerateRequest<T> = {
  prompt: PromptPair;
  schema: OutputSchema<T>;
  // Number of items (leaves or topics) the prompt asks for; scales the token budget.
  batchSize: number;
  phase: GenerationPhase;
  label: string;
};

export type GenerateResult<T> = {
  data: T;
  backend: BackendId;
  model: string;
  provider: GenerationBackend["provider"];
  usage: BackendUsage;
  attempts: number;
};

export type BackendRegistry = Partial<Record<BackendId, GenerationBackend>>;

type AttemptPlan = { backend: GenerationBackend; strictness: number };

export interface ContentGenerator {
  generate<T>(request: GenerateRequest<T>): Promise<GenerateResult<T>>;
}

export class GenerationAdapter implements ContentGenerator {
  constructor(private readonly backends: BackendRegistry) {
    if (!backends.fast && !backends.bulk) {
      throw new ConfigurationError("No generation backend configured (set ANTHROPIC_API_KEY or DEEPSEEK_API_KEY)");
    }
  }

  // 1 same-backend retry + 1 cross-backend retry.
  planAttempts(phase: GenerationPhase): AttemptPlan[] {
    const [preferred, fallback] = backendPreference(phase);
    const primary = this.backends[preferred] ?? this.backends[fallback];
    const secondary = this.backends[preferred] ? this.backends[fallback] : undefined;
    if (!primary) return [];
    const plan: AttemptPlan[] = [
      { backend: primary, strictness: 0 },
      { backend: primary, strictness: 1 },
    ];
    if (secondary) plan.push({ backend: secondary, strictness: 2 });
    return plan;
  }

  async generate<T>(request: GenerateRequest<T>): Promise<GenerateResult<T>> {
    const plan = this.planAttempts(request.phase);
    const failures: GenerationAttemptFailure[] = [];

    for (const [index, { backend, strictness }] of plan.entries()) {
      const prefill = backend.supportsPrefill ? JSON_PREFILL : null;
      const instruction = STRICT_FORMAT_INSTRUCTIONS[Math.min(strictness, STRICT_FORMAT_INSTRUCTIONS.length - 1)];
      const system = instruction ? `${request.prompt.system}\n${instruction}` : request.prompt.system;
      const maxTokens = Math.min(backend.maxTokens, TOKENS_BASE + Math.max(1, request.batchSize) * TOKENS_PER_BATCH_ITEM);

      const failure = (reason: GenerationAttemptFailure["reason"], message: string) => {
        failures.push({ backend: backend.id, reason, message });
        console.warn("[generation-adapter] attempt failed", {
          label: request.label,
          attempt: index + 1,
          backend: backend.id,
          reason,
          message: message.slice(0, 200),
        });
      };

      let text: string;
      let usage: BackendUsage;
      try {
        const response = await backend.complete({
          system,
          user: request.prompt.user,
          prefill,
          maxTokens,
          temperature: backend.temperature,
        });
        if (response.truncated) {
          failure("truncated", `output hit the ${maxTokens} token limit`);
          continue;
        }
        text = response.text;
        usage = response.usage;
      } catch (err) {
        failure("transport", errorMessage(err));
        continue;
      }

      let json: unknown;
      try {
        json = parseModelJson(text, prefill);
      } catch (err) {
        failure("parse", errorMessage(err));
        continue;
      }

      const parsed = request.schema.safeParse(json);
      if (!parsed.success) {
        const first = parsed.error.issues[0];
        failure("schema", first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "schema mismatch");
        continue;
      }

      console.log("[generation-adapter] generated", {
        label: request.label,
        phase: request.phase,
        backend: backend.id,
        attempts: index + 1,
        batchSize: request.batchSize,
      });
      return {
        data: parsed.data,
        backend: backend.id,
        model: backend.model,
        provider: backend.provider,
        usage,
        attempts: index + 1,
      };
    }

    console.error("[generation-adapter] generation failed", { label: request.label, attempts: failures.length });
    throw new GenerationError(`Generation failed after ${failures.length} attempts (${request.label})`, failures);
  }
}
