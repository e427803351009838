import OpenAI from "openai";
import { z } from "zod";
import type { BackendConfig, BackendId } from "@/lib/model-config";

export type BackendRequest = {
  system: string;
  user: string;
  // Text the response is seeded with; only honored by backends that support prefill.
  prefill: string | null;
  maxTokens: number;
  temperature: number;
};

export type BackendUsage = { inputTokens: number | null; outputTokens: number | null };

export type BackendResponse = {
  text: string;
  truncated: boolean;
  usage: BackendUsage;
};

export interface GenerationBackend {
  readonly id: BackendId;
  readonly model: string;
  readonly provider: BackendConfig["provider"];
  readonly supportsPrefill: boolean;
  readonly maxTokens: number;
  readonly temperature: number;
  complete(request: BackendRequest): Promise<BackendResponse>;
}

export class BackendTransportError extends Error {
  constructor(message: string, readonly status: number | null) {
    super(message);
    this.name = "BackendTransportError";
  }
}

const AnthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  stop_reason: z.string().nullish(),
  usage: z
    .object({ input_tokens: z.number().nullish(), output_tokens: z.number().nullish() })
    .nullish(),
});

/**
 * Anthropic Messages API over fetch. A prefill is sent as a trailing assistant turn, which
 * makes the model continue from it instead of opening with prose.
 */
export class AnthropicBackend implements GenerationBackend {
  readonly supportsPrefill = true;
  readonly id: BackendId;
  readonly model: string;
  readonly provider: BackendConfig["provider"];
  readonly maxTokens: number;
  readonly temperature: number;

  constructor(
    private readonly config: BackendConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.id = config.id;
    this.model = config.model;
    this.provider = config.provider;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    const messages: { role: "user" | "assistant"; content: string }[] = [{ role: "user", content: request.user }];
    if (request.prefill) messages.push({ role: "assistant", content: request.prefill });

    const fetchImpl = this.fetchImpl;
    let resp: Response;
    try {
      resp = await fetchImpl(`${this.config.baseURL.replace(/\/$/, "")}/v1/messages`, {
        method: "POST",
        headers: {
          "x-api-key": this.config.apiKey,
          "content-type": "application/json",
          "anthropic-version": "2023-06-01",
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      throw new BackendTransportError(err instanceof Error ? err.message : "request failed", null);
    }

    if (!resp.ok) {
      const detail = (await resp.text().catch(() => "")).slice(0, 200);
      throw new BackendTransportError(`anthropic responded ${resp.status}${detail ? `: ${detail}` : ""}`, resp.status);
    }

    const parsed = AnthropicMessageSchema.safeParse(await resp.json());
    if (!parsed.success) throw new BackendTransportError("anthropic returned an unexpected payload", resp.status);

    const text = parsed.data.content
      .filter((block) => block.type === "text" && block.text)
      .map((block) => block.text ?? "")
      .join("");

    return {
      text,
      truncated: parsed.data.stop_reason === "max_tokens",
      usage: {
        inputTokens: parsed.data.usage?.input_tokens ?? null,
        outputTokens: parsed.data.usage?.output_tokens ?? null,
      },
    };
  }
}

/**
 * OpenAI-compatible chat completions (DeepSeek). No prefill; JSON is requested through
 * `response_format` and the format instruction in the system prompt.
 */
export class OpenAICompatibleBackend implements GenerationBackend {
  readonly supportsPrefill = false;
  readonly id: BackendId;
  readonly model: string;
  readonly provider: BackendConfig["provider"];
  readonly maxTokens: number;
  readonly temperature: number;
  private readonly client: OpenAI;

  constructor(config: BackendConfig, client?: OpenAI) {
    this.id = config.id;
    this.model = config.model;
    this.provider = config.provider;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    // Retries belong to the generation adapter.
    this.client =
      client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      });
    } catch (err) {
      const status = err instanceof OpenAI.APIError && typeof err.status === "number" ? err.status : null;
      throw new BackendTransportError(err instanceof Error ? err.message : "request failed", status);
    }

    const choice = completion.choices?.[0];
    return {
      text: choice?.message?.content ?? "",
      truncated: choice?.finish_reason === "length",
      usage: {
        inputTokens: completion.usage?.prompt_tokens ?? null,
        outputTokens: completion.usage?.completion_tokens ?? null,
      },
    };
  }
}

export function createBackend(config: BackendConfig): GenerationBackend {
  return config.provider === "anthropic" ? new AnthropicBackend(config) : new OpenAICompatibleBackend(config);
}
