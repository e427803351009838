import type { GenerationCache } from "@/lib/generation-cache";
import type { StudyTreeSnapshot } from "@/lib/study-types";
import { CacheUnavailableError } from "@/lib/study-errors";

// Cache whose backing store is down.
export class FailingGenerationCache implements GenerationCache {
  lookups = 0;
  stores = 0;

  async lookup(_key: string): Promise<StudyTreeSnapshot | null> {
    this.lookups += 1;
    throw new CacheUnavailableError("cache store offline");
  }

  async store(_key: string, _snapshot: StudyTreeSnapshot, _ttlSeconds: number): Promise<void> {
    this.stores += 1;
    throw new CacheUnavailableError("cache store offline");
  }
}
