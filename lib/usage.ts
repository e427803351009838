import type { SupabaseClient } from "@supabase/supabase-js";

/**
 * Model pricing per 1M tokens
 *
 * - Anthropic Claude 3.5 Haiku: $0.80 input / $4.00 output
 * - DeepSeek chat: $0.27 input / $1.10 output
 */
const PRICES: Record<string, { input: number; output: number }> = {
  "anthropic/claude-3-5-haiku-20241022": { input: 0.8 / 1_000_000, output: 4 / 1_000_000 },
  "anthropic/claude-3-5-haiku-latest": { input: 0.8 / 1_000_000, output: 4 / 1_000_000 },
  "deepseek/deepseek-chat": { input: 0.27 / 1_000_000, output: 1.1 / 1_000_000 },
};

export function calcCost(model: string, inputTokens = 0, outputTokens = 0) {
  const price = PRICES[model];
  if (!price) return 0;
  return inputTokens * price.input + outputTokens * price.output;
}

export type UsageEvent = {
  userId: string | null;
  model: string;
  inputTokens: number | null;
  outputTokens: number | null;
  metadata: Record<string, unknown>;
};

export interface UsageRecorder {
  record(event: UsageEvent): Promise<void>;
}

export class SupabaseUsageRecorder implements UsageRecorder {
  constructor(private readonly sb: SupabaseClient) {}

  async record(event: UsageEvent): Promise<void> {
    const { error } = await this.sb.from("usage_logs").insert({
      user_id: event.userId,
      model: event.model,
      input_tokens: event.inputTokens,
      output_tokens: event.outputTokens,
      cost: calcCost(event.model, event.inputTokens ?? 0, event.outputTokens ?? 0),
      metadata: event.metadata,
    });
    if (error) throw new Error(`usage_logs insert failed: ${error.message}`);
  }
}
