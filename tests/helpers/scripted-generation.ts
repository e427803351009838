import type { ContentGenerator, GenerateRequest, GenerateResult } from "@/lib/generation-adapter";
import type { BackendRequest, BackendResponse, GenerationBackend } from "@/lib/generation-backends";
import type { BackendId } from "@/lib/model-config";
import type { TopicProposal } from "@/lib/schema";
import { GenerationError } from "@/lib/study-errors";

type ScriptStep = { text: string; truncated?: boolean } | Error;

// Backend that replays a fixed list of responses and records every request.
export class ScriptedBackend implements GenerationBackend {
  readonly requests: BackendRequest[] = [];
  readonly model: string;
  readonly provider: GenerationBackend["provider"];
  readonly maxTokens = 8192;
  readonly temperature = 0.7;

  constructor(
    readonly id: BackendId,
    private readonly script: ScriptStep[],
    readonly supportsPrefill = id === "fast"
  ) {
    this.model = id === "fast" ? "claude-test" : "deepseek-test";
    this.provider = id === "fast" ? "anthropic" : "deepseek";
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    this.requests.push(request);
    const step = this.script.shift();
    if (!step) throw new Error(`${this.id} backend has no scripted response left`);
    if (step instanceof Error) throw step;
    return { text: step.text, truncated: step.truncated ?? false, usage: { inputTokens: 100, outputTokens: 50 } };
  }
}

export function proposalWithLeaves(leafCount: number, perCategory = 4): TopicProposal {
  const categories: TopicProposal["categories"] = [];
  for (let i = 0; i < leafCount; i += perCategory) {
    const subtopics: TopicProposal["categories"] = [];
    for (let n = i + 1; n <= Math.min(leafCount, i + perCategory); n++) {
      subtopics.push({ title: `Concept ${n}`, description: `Explains concept ${n} in detail.` });
    }
    categories.push({
      title: `Unit ${categories.length + 1}`,
      description: "Overview of the unit material",
      subtopics,
    });
  }
  return { title: "Generated outline", categories };
}

export type GeneratorCall = {
  label: string;
  phase: string;
  batchSize: number;
  keys: string[];
  // Counts asked for per leaf; zero for hierarchy calls.
  questions: number;
  flashcards: number;
};

/**
 * ContentGenerator that answers hierarchy prompts with a fixed proposal and content prompts
 * with numbered questions for every requested leaf key.
 */
export class FakeStudyGenerator implements ContentGenerator {
  readonly calls: GeneratorCall[] = [];
  private questionCounter = 0;
  private failuresLeft = 0;

  constructor(
    private proposal: TopicProposal,
    private readonly options: { flashcardsPerTopic?: number } = {}
  ) {}

  setProposal(proposal: TopicProposal) {
    this.proposal = proposal;
  }

  // The next `count` content calls fail the way an exhausted adapter does.
  failNextContent(count = 1) {
    this.failuresLeft = count;
  }

  get contentCalls(): GeneratorCall[] {
    return this.calls.filter((call) => call.label !== "hierarchy");
  }

  async generate<T>(request: GenerateRequest<T>): Promise<GenerateResult<T>> {
    const keys = Array.from(request.prompt.user.matchAll(/^\[(L\d+)\]$/gm), (m) => m[1] ?? "");
    const counts = /Write (\d+) questions and (\d+) flashcards/.exec(request.prompt.user);
    const questions = Number(counts?.[1] ?? 0);
    const flashcards = this.options.flashcardsPerTopic ?? Number(counts?.[2] ?? 0);
    this.calls.push({ label: request.label, phase: request.phase, batchSize: request.batchSize, keys, questions, flashcards });

    let json: unknown;
    if (request.label === "hierarchy") {
      json = this.proposal;
    } else {
      if (this.failuresLeft > 0) {
        this.failuresLeft -= 1;
        throw new GenerationError("scripted content failure", [
          { backend: "bulk", reason: "transport", message: "offline" },
        ]);
      }
      const subtopics: Record<string, unknown> = {};
      for (const key of keys) {
        subtopics[key] = {
          questions: Array.from({ length: questions }, () => {
            this.questionCounter += 1;
            return {
              question: `Question ${this.questionCounter}?`,
              options: ["A one", "B two", "C three", "D four"],
              correctAnswer: 0,
              explanation: "Because the first option is right.",
            };
          }),
          flashcards: Array.from({ length: flashcards }, (_, idx) => ({
            front: `${key} front ${idx + 1}`,
            back: `${key} back ${idx + 1}`,
          })),
        };
      }
      json = { subtopics };
    }

    const parsed = request.schema.safeParse(json);
    if (!parsed.success) throw new Error(`fake output rejected: ${parsed.error.message}`);
    return {
      data: parsed.data,
      backend: request.phase === "initial" ? "fast" : "bulk",
      model: "fake-model",
      provider: "anthropic",
      usage: { inputTokens: 10, outputTokens: 20 },
      attempts: 1,
    };
  }
}
