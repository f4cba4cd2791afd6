import type { ShoppingList } from '../types';

/**
 * Durable storage for the full list collection.
 *
 * `load` is called once at start-up and yields an empty collection when
 * nothing has been stored yet. `save` must be atomic: after a crash the
 * previous collection or the new one is readable, never a mix.
 */
export interface PersistenceAdapter {
  load(): Promise<ShoppingList[]>;
  save(lists: ShoppingList[]): Promise<void>;
  close(): Promise<void>;
}
