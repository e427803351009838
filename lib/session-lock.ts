import { randomUUID } from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { SessionBusyError, errorMessage } from "@/lib/study-errors";

/**
 * Mutual exclusion per key (one key per session and concern, e.g. `generate:<sessionId>`).
 * Different keys never wait on each other.
 */
export interface SessionLock {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

// Single-instance lock: callers for the same key queue behind each other.
export class InProcessSessionLock implements SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The queue only tracks completion; the caller still receives the rejection through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this.tails.has(key);
  }
}

export type LockResult = { acquired: boolean; supported: boolean; reason?: "busy" | "error" };

export type LockRow = { lock_key: string; owner: string; created_at: string };
export type LockRowError = { code?: string; message: string };

// Row operations on `study_session_locks` (primary key `lock_key`).
export interface LockRowStore {
  insert(row: LockRow): Promise<LockRowError | null>;
  createdAt(key: string): Promise<string | null>;
  deleteIfCreatedAt(key: string, createdAt: string): Promise<void>;
  touch(key: string, owner: string, createdAt: string): Promise<LockRowError | null>;
  deleteOwned(key: string, owner: string): Promise<LockRowError | null>;
}

export class SupabaseLockRows implements LockRowStore {
  constructor(private readonly sb: SupabaseClient) {}

  async insert(row: LockRow) {
    const { error } = await this.sb.from("study_session_locks").insert(row);
    return error;
  }

  async createdAt(key: string) {
    const { data } = await this.sb.from("study_session_locks").select("created_at").eq("lock_key", key).maybeSingle();
    return typeof data?.created_at === "string" ? data.created_at : null;
  }

  async deleteIfCreatedAt(key: string, createdAt: string) {
    await this.sb.from("study_session_locks").delete().eq("lock_key", key).eq("created_at", createdAt);
  }

  async touch(key: string, owner: string, createdAt: string) {
    const { error } = await this.sb
      .from("study_session_locks")
      .update({ created_at: createdAt })
      .eq("lock_key", key)
      .eq("owner", owner);
    return error;
  }

  async deleteOwned(key: string, owner: string) {
    const { error } = await this.sb.from("study_session_locks").delete().eq("lock_key", key).eq("owner", owner);
    return error;
  }
}

export type RowLockOptions = {
  ttlMs: number;
  waitMs: number;
  pollMs?: number;
  // How often a holder refreshes its row; defaults to a third of the TTL.
  heartbeatMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Cross-instance lock backed by one row per key. A duplicate key means another instance holds
 * the lock. The holder refreshes `created_at` while it runs, so only rows whose holder stopped
 * refreshing for longer than the TTL are taken over. Without the table the lock degrades to
 * in-process serialization.
 */
export class RowSessionLock implements SessionLock {
  private readonly local = new InProcessSessionLock();
  private readonly pollMs: number;
  private readonly heartbeatMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly rows: LockRowStore,
    private readonly options: RowLockOptions
  ) {
    this.pollMs = options.pollMs ?? 500;
    this.heartbeatMs = options.heartbeatMs ?? Math.max(1000, Math.floor(options.ttlMs / 3));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => Date.now());
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Waiters on this instance queue locally so only one of them polls the table.
    return this.local.runExclusive(key, () => this.runWithRowLock(key, fn));
  }

  private async runWithRowLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const owner = randomUUID();
    const deadline = this.now() + this.options.waitMs;

    for (;;) {
      const result = await this.acquire(key, owner);
      if (result.acquired) break;
      if (!result.supported) {
        console.warn("[session-lock] lock table unavailable, using in-process lock only", { key });
        return fn();
      }
      if (this.now() >= deadline) {
        throw new SessionBusyError(`Session is busy (${key}); try again shortly`);
      }
      await this.sleep(this.pollMs);
    }

    const heartbeat = setInterval(() => {
      void this.refresh(key, owner);
    }, this.heartbeatMs);
    try {
      return await fn();
    } finally {
      clearInterval(heartbeat);
      await this.release(key, owner);
    }
  }

  async acquire(key: string, owner: string): Promise<LockResult> {
    const now = this.now();
    const row = { lock_key: key, owner, created_at: new Date(now).toISOString() };
    try {
      const error = await this.rows.insert(row);
      if (!error) return { acquired: true, supported: true };

      const code = error.code ?? "";
      if (code === "42P01" || /relation .* does not exist/i.test(error.message)) {
        return { acquired: false, supported: false };
      }
      if (code !== "23505" && !/duplicate key/i.test(error.message)) {
        console.warn("[session-lock] acquire failed", { key, error: error.message });
        return { acquired: false, supported: true, reason: "error" };
      }

      const stamp = await this.rows.createdAt(key);
      const createdAt = stamp ? Date.parse(stamp) : NaN;
      if (stamp && Number.isFinite(createdAt) && now - createdAt > this.options.ttlMs) {
        // Stale lock; take it over
        await this.rows.deleteIfCreatedAt(key, stamp);
        const retryError = await this.rows.insert(row);
        if (!retryError) {
          console.warn("[session-lock] took over stale lock", { key, ageMs: now - createdAt });
          return { acquired: true, supported: true };
        }
      }
      return { acquired: false, supported: true, reason: "busy" };
    } catch (err) {
      const message = errorMessage(err);
      if (/relation .* does not exist/i.test(message)) return { acquired: false, supported: false };
      console.warn("[session-lock] acquire threw", { key, error: message });
      return { acquired: false, supported: true, reason: "error" };
    }
  }

  // Never rejects; a missed refresh only shortens the time before takeover.
  private async refresh(key: string, owner: string): Promise<void> {
    try {
      const error = await this.rows.touch(key, owner, new Date(this.now()).toISOString());
      if (error) console.warn("[session-lock] heartbeat failed", { key, error: error.message });
    } catch (err) {
      console.warn("[session-lock] heartbeat threw", { key, error: errorMessage(err) });
    }
  }

  async release(key: string, owner: string): Promise<void> {
    const error = await this.rows.deleteOwned(key, owner);
    if (error) {
      // The row expires through the TTL takeover if this delete is lost.
      console.warn("[session-lock] release failed", { key, error: error.message });
    }
  }
}

export class SupabaseSessionLock extends RowSessionLock {
  constructor(sb: SupabaseClient, options: RowLockOptions) {
    super(new SupabaseLockRows(sb), options);
  }
}
