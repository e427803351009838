/**
 * Generation Cache - content-addressed reuse of generated study trees
 *
 * Identical source text generated with identical parameters inside the TTL window
 * is rebuilt from the cached tree instead of calling a generation backend again.
 *
 * The cache is advisory: lookups that fail behave like misses and failed writes
 * only cost the speed-up on the next identical upload.
 */

import { createHash } from "crypto";
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { StudyTreeSnapshot } from "@/lib/study-types";
import { CacheUnavailableError, errorMessage } from "@/lib/study-errors";

export const GENERATION_CACHE_TTL_SECONDS = 24 * 60 * 60;

export function normalizeSourceText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function hashSourceText(text: string): string {
  return createHash("sha256").update(normalizeSourceText(text)).digest("hex");
}

export type GenerationCacheKeyParams = {
  sourceText: string;
  targetLeaves: number;
  questionsPerTopic: number;
  // A progressive tree holds only the creation-time leaves, so it never serves a full load.
  progressiveLoad: boolean;
};

export function generationCacheKey(params: GenerationCacheKeyParams): string {
  const fill = params.progressiveLoad ? "progressive" : "full";
  return `study_tree:${hashSourceText(params.sourceText)}:${params.targetLeaves}:${params.questionsPerTopic}:${fill}`;
}

export interface GenerationCache {
  lookup(key: string): Promise<StudyTreeSnapshot | null>;
  store(key: string, snapshot: StudyTreeSnapshot, ttlSeconds: number): Promise<void>;
}

const QuestionDraftSchema = z.object({
  question: z.string(),
  options: z.array(z.string()).length(4),
  correctAnswer: z.number().int().min(0).max(3),
  explanation: z.string(),
  sourceText: z.string().nullable(),
  sourcePage: z.number().int().nullable(),
});

const FlashcardDraftSchema = z.object({
  front: z.string(),
  back: z.string(),
  hint: z.string().nullable(),
});

export const StudyTreeSnapshotSchema = z.object({
  title: z.string(),
  topics: z.array(
    z.object({
      key: z.string(),
      parentKey: z.string().nullable(),
      title: z.string(),
      description: z.string().nullable(),
      isCategory: z.boolean(),
      depth: z.number().int().min(1),
      position: z.object({ x: z.number(), y: z.number() }),
      prerequisiteKeys: z.array(z.string()),
      content: z
        .object({
          questions: z.array(QuestionDraftSchema),
          flashcards: z.array(FlashcardDraftSchema),
        })
        .nullable(),
    })
  ),
});

type MemoryEntry = { snapshot: StudyTreeSnapshot; expiresAt: number };

// In-process TTL cache; entries are copied in and out so callers cannot mutate them.
export class MemoryGenerationCache implements GenerationCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async lookup(key: string): Promise<StudyTreeSnapshot | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.snapshot);
  }

  async store(key: string, snapshot: StudyTreeSnapshot, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { snapshot: structuredClone(snapshot), expiresAt: this.now() + ttlSeconds * 1000 });
  }
}

// Rows in `generation_cache` (see supabase/migrations).
export class SupabaseGenerationCache implements GenerationCache {
  constructor(
    private readonly sb: SupabaseClient,
    private readonly now: () => number = Date.now
  ) {}

  async lookup(key: string): Promise<StudyTreeSnapshot | null> {
    const { data, error } = await this.sb
      .from("generation_cache")
      .select("payload")
      .eq("cache_key", key)
      .gt("expires_at", new Date(this.now()).toISOString())
      .maybeSingle();

    if (error) throw new CacheUnavailableError(`generation_cache lookup failed: ${error.message}`, error);
    if (!data) return null;

    const parsed = StudyTreeSnapshotSchema.safeParse(data.payload);
    if (!parsed.success) {
      console.warn("[generation-cache] ignoring malformed cache entry", { key, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async store(key: string, snapshot: StudyTreeSnapshot, ttlSeconds: number): Promise<void> {
    const createdAt = this.now();
    const { error } = await this.sb.from("generation_cache").upsert(
      {
        cache_key: key,
        payload: snapshot,
        created_at: new Date(createdAt).toISOString(),
        expires_at: new Date(createdAt + ttlSeconds * 1000).toISOString(),
      },
      { onConflict: "cache_key" }
    );
    if (error) throw new CacheUnavailableError(`generation_cache store failed: ${error.message}`, error);
  }
}

/**
 * Wraps a cache so that backend failures degrade to a miss (lookup) or a no-op (store).
 */
export class AdvisoryGenerationCache implements GenerationCache {
  constructor(private readonly inner: GenerationCache) {}

  async lookup(key: string): Promise<StudyTreeSnapshot | null> {
    try {
      const hit = await this.inner.lookup(key);
      console.log(hit ? "[generation-cache] hit" : "[generation-cache] miss", { key: shortKey(key) });
      return hit;
    } catch (err) {
      console.warn("[generation-cache] lookup unavailable, treating as miss", { key: shortKey(key), error: errorMessage(err) });
      return null;
    }
  }

  async store(key: string, snapshot: StudyTreeSnapshot, ttlSeconds: number): Promise<void> {
    try {
      await this.inner.store(key, snapshot, ttlSeconds);
    } catch (err) {
      console.warn("[generation-cache] store unavailable, continuing without cache", {
        key: shortKey(key),
        error: errorMessage(err),
      });
    }
  }
}

function shortKey(key: string) {
  const [prefix, hash = "", ...rest] = key.split(":");
  return [prefix, hash.slice(0, 16), ...rest].join(":");
}
