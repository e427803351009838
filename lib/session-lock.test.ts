import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { InProcessSessionLock, RowSessionLock } from '@/lib/session-lock';
import { SessionBusyError } from '@/lib/study-errors';
import { MemoryLockRows } from '@/tests/helpers/memory-lock-rows';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InProcessSessionLock', () => {
  it('serializes one key without blocking others', async () => {
    const lock = new InProcessSessionLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive('generate:s1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.runExclusive('generate:s1', async () => {
      events.push('second');
    });
    await lock.runExclusive('workflow:s1', async () => {
      events.push('workflow');
    });

    expect(events).toEqual(['first:start', 'workflow']);
    expect(lock.isHeld('generate:s1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'workflow', 'first:end', 'second']);
    expect(lock.isHeld('generate:s1')).toBe(false);
  });

  it('releases the key when the holder fails', async () => {
    const lock = new InProcessSessionLock();
    await expect(
      lock.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(lock.runExclusive('k', async () => 42)).resolves.toBe(42);
  });
});

describe('RowSessionLock', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps a holder that outlives the TTL from being taken over', async () => {
    const rows = new MemoryLockRows();
    const first = new RowSessionLock(rows, { ttlMs: 180_000, waitMs: 0 });
    const second = new RowSessionLock(rows, { ttlMs: 180_000, waitMs: 0 });
    const entered = deferred();
    const gate = deferred();
    let inside = 0;
    let maxInside = 0;
    const critical = async (wait: Promise<void>) => {
      inside += 1;
      maxInside = Math.max(maxInside, inside);
      entered.resolve();
      await wait;
      inside -= 1;
    };

    const holder = first.runExclusive('generate:s1', () => critical(gate.promise));
    await entered.promise;
    await vi.advanceTimersByTimeAsync(200_000);

    expect(rows.rows.get('generate:s1')?.created_at).toBe('2025-03-01T00:03:00.000Z');
    await expect(second.runExclusive('generate:s1', () => critical(Promise.resolve()))).rejects.toBeInstanceOf(
      SessionBusyError
    );

    gate.resolve();
    await holder;
    expect(maxInside).toBe(1);
    expect(rows.rows.size).toBe(0);
  });

  it('takes over a row whose holder stopped refreshing', async () => {
    const rows = new MemoryLockRows();
    rows.rows.set('generate:s1', {
      lock_key: 'generate:s1',
      owner: 'gone',
      created_at: '2025-02-28T23:56:00.000Z',
    });
    const lock = new RowSessionLock(rows, { ttlMs: 180_000, waitMs: 0 });

    await expect(lock.runExclusive('generate:s1', async () => 'ran')).resolves.toBe('ran');
    expect(rows.rows.size).toBe(0);
  });

  it('reports a fresh row held elsewhere as busy', async () => {
    const rows = new MemoryLockRows();
    rows.rows.set('generate:s1', {
      lock_key: 'generate:s1',
      owner: 'other',
      created_at: '2025-02-28T23:59:00.000Z',
    });
    const lock = new RowSessionLock(rows, { ttlMs: 180_000, waitMs: 0 });

    await expect(lock.runExclusive('generate:s1', async () => 'ran')).rejects.toBeInstanceOf(SessionBusyError);
    expect(rows.rows.get('generate:s1')?.owner).toBe('other');
  });
});
