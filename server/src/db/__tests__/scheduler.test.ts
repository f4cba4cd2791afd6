import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { PersistenceScheduler } from '../index';
import type { ShoppingList } from '../../types';
import { MemoryStorage, T0 } from '../../__tests__/memory-storage';

function makeList(id: string, revision = 0): ShoppingList {
  return { id, name: id, revision, items: [], createdAt: T0, updatedAt: T0 };
}

describe('PersistenceScheduler', () => {
  let storage: MemoryStorage;
  let lists: ShoppingList[];
  let scheduler: PersistenceScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    storage = new MemoryStorage();
    lists = [makeList('groceries')];
    scheduler = new PersistenceScheduler(storage, () => lists, { debounceMs: 100, retryMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('mutations inside one window share a single write', async () => {
    scheduler.schedule();
    await vi.advanceTimersByTimeAsync(50);
    lists = [makeList('groceries', 1)];
    scheduler.schedule();
    expect(storage.saved).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(50);

    expect(storage.saved).toHaveLength(1);
    expect(storage.saved[0][0].revision).toBe(1);
    expect(scheduler.pending).toBe(false);
    expect(scheduler.saves).toBe(1);
  });

  test('flush with nothing pending does not write', async () => {
    await expect(scheduler.flush()).resolves.toBe(true);
    expect(storage.attempts).toBe(0);
  });

  test('a failed write degrades, retries, then recovers', async () => {
    const degraded = vi.fn();
    const recovered = vi.fn();
    scheduler.on('degraded', degraded);
    scheduler.on('recovered', recovered);
    storage.failures = 2;

    scheduler.schedule();
    await vi.advanceTimersByTimeAsync(100);

    expect(storage.attempts).toBe(1);
    expect(scheduler.degraded).toBe(true);
    expect(scheduler.pending).toBe(true);
    expect(scheduler.lastError).toBeInstanceOf(Error);

    await vi.advanceTimersByTimeAsync(1000);
    expect(storage.attempts).toBe(2);
    expect(degraded).toHaveBeenCalledTimes(1);
    expect(recovered).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(storage.attempts).toBe(3);
    expect(storage.saved).toHaveLength(1);
    expect(scheduler.degraded).toBe(false);
    expect(scheduler.lastError).toBeNull();
    expect(recovered).toHaveBeenCalledTimes(1);
  });

  test('close writes pending changes and closes the adapter', async () => {
    scheduler.schedule();

    await scheduler.close();

    expect(storage.saved).toHaveLength(1);
    expect(storage.closed).toBe(true);

    scheduler.schedule();
    await vi.advanceTimersByTimeAsync(1000);
    expect(storage.saved).toHaveLength(1);
  });
});
