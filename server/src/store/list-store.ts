/**
 * Authoritative in-memory list state.
 *
 * Every mutation runs in its list's lane (see KeyedSerialQueue), applies
 * synchronously, bumps the revision by one, schedules persistence and then
 * emits a 'change' event carrying a ChangeNotification. Values handed out
 * are always copies.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type { DurabilityMode } from '../config';
import { PersistenceScheduler, type PersistenceAdapter, type PersistenceOptions } from '../db/index';
import { alreadyExists, invalidArgument, notFound } from '../errors';
import {
  cloneItem,
  cloneList,
  summarizeList,
  DEFAULT_QUANTITY,
  DEFAULT_UNIT,
  type ChangeNotification,
  type ItemDetails,
  type ItemFields,
  type ListChange,
  type ListItem,
  type ListSummary,
  type ShoppingList,
} from '../types';
import { isBlank, nowIso } from '../utils';
import { KeyedSerialQueue } from './serial-queue';

export interface ListStoreOptions {
  durability?: DurabilityMode;
  /** Create a list named after its id when add_item or subscribe reference an unknown id */
  createOnReference?: boolean;
  persistence?: Partial<PersistenceOptions>;
  generateId?: () => string;
  now?: () => string;
}

interface Mutation<T> {
  change: ListChange;
  result: T;
}

/** Outcome of a committed mutation and the revision it committed as */
export interface Committed<T> {
  value: T;
  revision: number;
}

const MIN_QUANTITY_AFTER_INCREMENT = 1;

const DEFAULT_PERSISTENCE: PersistenceOptions = { debounceMs: 250, retryMs: 5000 };

export class ListStore extends EventEmitter {
  private lists = new Map<string, ShoppingList>();
  private lanes = new KeyedSerialQueue();
  private persistence: PersistenceScheduler;
  private durability: DurabilityMode;
  private createOnReference: boolean;
  private generateId: () => string;
  private now: () => string;

  constructor(adapter: PersistenceAdapter, options: ListStoreOptions = {}) {
    super();
    this.durability = options.durability ?? 'eventual';
    this.createOnReference = options.createOnReference ?? false;
    this.generateId = options.generateId ?? (() => uuidv4());
    this.now = options.now ?? nowIso;
    this.persistence = new PersistenceScheduler(adapter, () => this.exportLists(), {
      ...DEFAULT_PERSISTENCE,
      ...options.persistence,
    });
  }

  /** Build a store and load the last durable collection into it */
  static async open(adapter: PersistenceAdapter, options: ListStoreOptions = {}): Promise<ListStore> {
    const store = new ListStore(adapter, options);
    const lists = await adapter.load();
    for (const list of lists) {
      if (store.lists.has(list.id)) {
        console.warn(`[store] Duplicate list id in storage, keeping the first: ${list.id}`);
        continue;
      }
      store.lists.set(list.id, cloneList(list));
    }
    console.log(`[store] Loaded ${store.lists.size} list(s)`);
    return store;
  }

  get durabilityDegraded(): boolean {
    return this.persistence.degraded;
  }

  get scheduler(): PersistenceScheduler {
    return this.persistence;
  }

  has(listId: string): boolean {
    return this.lists.has(listId);
  }

  /**
   * List operations
   */

  async createList(name: string, id?: string): Promise<ShoppingList> {
    if (isBlank(name)) throw invalidArgument('List name cannot be empty');
    if (id !== undefined && isBlank(id)) throw invalidArgument('List id cannot be empty');

    const listId = id ?? this.generateId();
    return this.lanes.run(listId, async () => {
      if (this.lists.has(listId)) {
        throw alreadyExists(`List already exists: ${listId}`);
      }
      const list = this.insertList(listId, name);
      await this.persist();
      console.log(`[store] Created list ${listId} (${name})`);
      return cloneList(list);
    });
  }

  async deleteList(listId: string): Promise<void> {
    return this.lanes.run(listId, async () => {
      const list = this.requireList(listId);
      this.lists.delete(listId);
      await this.persist();
      console.log(`[store] Deleted list ${listId}`);
      this.publish({
        listId,
        revision: list.revision + 1,
        committedAt: this.now(),
        change: { kind: 'list_deleted' },
      });
    });
  }

  async renameList(listId: string, name: string): Promise<Committed<ShoppingList>> {
    if (isBlank(name)) throw invalidArgument('List name cannot be empty');

    return this.mutate(listId, false, (list, now) => {
      list.name = name;
      // The result reflects the revision this mutation commits as
      const renamed = { ...cloneList(list), revision: list.revision + 1, updatedAt: now };
      return { change: { kind: 'list_renamed', name }, result: renamed };
    });
  }

  /** Snapshot of one list. Never waits for queued mutations. */
  getSnapshot(listId: string): ShoppingList {
    return cloneList(this.requireList(listId));
  }

  listSummaries(): ListSummary[] {
    return [...this.lists.values()]
      .map(summarizeList)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id));
  }

  /** Copies of every list, as written by persistence */
  exportLists(): ShoppingList[] {
    return [...this.lists.values()].map(cloneList);
  }

  /**
   * Run `reader` against a snapshot from inside the list's lane. Nothing
   * commits on that list between the snapshot and the reader's return.
   */
  async inspect<T>(listId: string, reader: (snapshot: ShoppingList) => T): Promise<T> {
    return this.lanes.run(listId, async () => {
      const list = await this.referenceList(listId, this.createOnReference);
      return reader(cloneList(list));
    });
  }

  /**
   * Item operations
   */

  async addItem(listId: string, text: string, details: ItemDetails = {}): Promise<Committed<ListItem>> {
    if (isBlank(text)) throw invalidArgument('Item text cannot be empty');
    if (details.quantity !== undefined) assertQuantity(details.quantity);

    return this.mutate(listId, this.createOnReference, (list, now) => {
      const item: ListItem = {
        id: this.generateId(),
        text,
        checked: false,
        quantity: details.quantity ?? DEFAULT_QUANTITY,
        unit: details.unit ?? DEFAULT_UNIT,
        note: details.note ?? null,
        checkedAt: null,
        createdAt: now,
        updatedAt: now,
      };
      list.items.push(item);
      return {
        change: { kind: 'item_added', item: cloneItem(item), position: list.items.length - 1 },
        result: cloneItem(item),
      };
    });
  }

  async updateItem(listId: string, itemId: string, fields: ItemFields): Promise<Committed<ListItem>> {
    if (Object.values(fields).every((value) => value === undefined)) {
      throw invalidArgument('No fields to update');
    }
    if (fields.text !== undefined && isBlank(fields.text)) {
      throw invalidArgument('Item text cannot be empty');
    }
    if (fields.quantity !== undefined) assertQuantity(fields.quantity);

    return this.mutate(listId, false, (list, now) => {
      const item = list.items[this.requireItemIndex(list, itemId)];
      if (fields.text !== undefined) item.text = fields.text;
      if (fields.note !== undefined) item.note = fields.note;
      if (fields.quantity !== undefined) item.quantity = fields.quantity;
      if (fields.unit !== undefined) item.unit = fields.unit;
      if (fields.checked !== undefined) setChecked(item, fields.checked, now);
      item.updatedAt = now;
      return { change: { kind: 'item_updated', item: cloneItem(item) }, result: cloneItem(item) };
    });
  }

  /**
   * Add `amount` to an item's quantity. Negative amounts decrease it, but
   * never below 1; removing an item is removeItem's job.
   */
  async incrementItem(listId: string, itemId: string, amount: number): Promise<Committed<ListItem>> {
    if (!Number.isFinite(amount) || amount === 0) {
      throw invalidArgument(`Amount must be a non-zero number: ${amount}`);
    }

    return this.mutate(listId, false, (list, now) => {
      const item = list.items[this.requireItemIndex(list, itemId)];
      item.quantity = Math.max(MIN_QUANTITY_AFTER_INCREMENT, item.quantity + amount);
      item.updatedAt = now;
      return { change: { kind: 'item_updated', item: cloneItem(item) }, result: cloneItem(item) };
    });
  }

  /** Check or uncheck several items as one revision. All ids must exist. */
  async checkItems(listId: string, itemIds: string[], checked: boolean): Promise<Committed<ListItem[]>> {
    if (itemIds.length === 0) throw invalidArgument('No items to check');
    const wanted = [...new Set(itemIds)];

    return this.mutate(listId, false, (list, now) => {
      const targets = wanted.map((itemId) => list.items[this.requireItemIndex(list, itemId)]);
      for (const item of targets) {
        setChecked(item, checked, now);
        item.updatedAt = now;
      }
      const copies = targets.map(cloneItem);
      return { change: { kind: 'items_updated', items: copies.map(cloneItem) }, result: copies };
    });
  }

  async removeItem(listId: string, itemId: string): Promise<Committed<undefined>> {
    return this.mutate(listId, false, (list) => {
      list.items.splice(this.requireItemIndex(list, itemId), 1);
      return { change: { kind: 'item_removed', itemId }, result: undefined };
    });
  }

  async reorderItem(listId: string, itemId: string, position: number): Promise<Committed<undefined>> {
    if (!Number.isInteger(position)) throw invalidArgument(`Position must be an integer: ${position}`);

    return this.mutate(listId, false, (list) => {
      const index = this.requireItemIndex(list, itemId);
      if (position < 0 || position >= list.items.length) {
        throw invalidArgument(`Position ${position} is out of range 0..${list.items.length - 1}`);
      }
      const [item] = list.items.splice(index, 1);
      list.items.splice(position, 0, item);
      return { change: { kind: 'item_moved', itemId, position }, result: undefined };
    });
  }

  /** Remove every checked item as a single revision; returns how many went */
  async clearChecked(listId: string): Promise<Committed<number>> {
    return this.mutate(listId, false, (list) => {
      const removed = list.items.filter((item) => item.checked).map((item) => item.id);
      list.items = list.items.filter((item) => !item.checked);
      return { change: { kind: 'items_removed', itemIds: removed }, result: removed.length };
    });
  }

  /** Wait for queued mutations, write pending state and release storage */
  async close(): Promise<void> {
    await this.lanes.idle();
    await this.persistence.close();
  }

  /**
   * Internals
   */

  private mutate<T>(
    listId: string,
    createIfMissing: boolean,
    apply: (list: ShoppingList, now: string) => Mutation<T>,
  ): Promise<Committed<T>> {
    return this.lanes.run(listId, async () => {
      const list = await this.referenceList(listId, createIfMissing);
      const now = this.now();

      // Validation inside apply throws before anything is changed
      const { change, result } = apply(list, now);
      list.revision += 1;
      list.updatedAt = now;

      await this.persist();
      this.publish({ listId, revision: list.revision, committedAt: now, change });
      return { value: result, revision: list.revision };
    });
  }

  private async referenceList(listId: string, createIfMissing: boolean): Promise<ShoppingList> {
    const existing = this.lists.get(listId);
    if (existing) return existing;
    if (!createIfMissing) throw notFound(`List not found: ${listId}`);

    const list = this.insertList(listId, listId);
    await this.persist();
    console.log(`[store] Created list ${listId} on first reference`);
    return list;
  }

  private insertList(listId: string, name: string): ShoppingList {
    const now = this.now();
    const list: ShoppingList = { id: listId, name, revision: 0, items: [], createdAt: now, updatedAt: now };
    this.lists.set(listId, list);
    return list;
  }

  private requireList(listId: string): ShoppingList {
    const list = this.lists.get(listId);
    if (!list) throw notFound(`List not found: ${listId}`);
    return list;
  }

  private requireItemIndex(list: ShoppingList, itemId: string): number {
    const index = list.items.findIndex((item) => item.id === itemId);
    if (index === -1) throw notFound(`Item not found: ${itemId} in list ${list.id}`);
    return index;
  }

  private async persist(): Promise<void> {
    this.persistence.schedule();
    if (this.durability === 'sync') {
      await this.persistence.flush();
    }
  }

  private publish(notification: ChangeNotification): void {
    try {
      this.emit('change', notification);
    } catch (error: unknown) {
      // A failing listener must not undo or fail a committed mutation
      console.error('[store] Change listener failed:', error);
    }
  }
}

function assertQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw invalidArgument(`Quantity must be a positive number: ${quantity}`);
  }
}

function setChecked(item: ListItem, checked: boolean, now: string): void {
  if (item.checked !== checked) {
    item.checkedAt = checked ? now : null;
  }
  item.checked = checked;
}
