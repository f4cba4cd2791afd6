import type { PersistenceAdapter } from '../db/adapter';
import { cloneList, type ShoppingList } from '../types';

/** In-process stand-in for a persistence adapter */
export class MemoryStorage implements PersistenceAdapter {
  saved: ShoppingList[][] = [];
  attempts = 0;
  failures = 0; // remaining saves that should fail
  closed = false;
  private initial: ShoppingList[];

  constructor(initial: ShoppingList[] = []) {
    this.initial = initial;
  }

  async load(): Promise<ShoppingList[]> {
    return this.initial.map(cloneList);
  }

  async save(lists: ShoppingList[]): Promise<void> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('disk full');
    }
    this.saved.push(lists.map(cloneList));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get last(): ShoppingList[] | undefined {
    return this.saved[this.saved.length - 1];
  }
}

export const T0 = '2026-01-01T00:00:00.000Z';

/** Deterministic ids: prefix-1, prefix-2, ... */
export function sequence(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
