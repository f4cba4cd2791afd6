/**
 * Client-side copy of one list, kept current from change notifications.
 */

import { cloneItem, cloneList, type ChangeNotification, type ListChange, type ShoppingList } from '../types';

/**
 * - applied: state advanced to the notification's revision
 * - stale: already seen (revision at or below the current one), ignored
 * - gap: a revision is missing or the change does not fit; resync from a snapshot
 * - deleted: the list was deleted
 */
export type ApplyResult = 'applied' | 'stale' | 'gap' | 'deleted';

export class ListMirror {
  readonly listId: string;
  private list: ShoppingList | null = null;
  private deleted = false;

  constructor(listId: string) {
    this.listId = listId;
  }

  /** Replace the mirrored state with a full snapshot */
  load(snapshot: ShoppingList): void {
    if (snapshot.id !== this.listId) {
      throw new Error(`Snapshot for list ${snapshot.id} loaded into mirror of ${this.listId}`);
    }
    this.list = cloneList(snapshot);
    this.deleted = false;
  }

  get state(): ShoppingList | null {
    return this.list ? cloneList(this.list) : null;
  }

  /** Revision of the mirrored state, or -1 before the first snapshot */
  get revision(): number {
    return this.list?.revision ?? -1;
  }

  get isDeleted(): boolean {
    return this.deleted;
  }

  apply(notification: ChangeNotification): ApplyResult {
    if (notification.listId !== this.listId) {
      throw new Error(`Notification for list ${notification.listId} applied to mirror of ${this.listId}`);
    }
    if (!this.list) return 'gap';
    if (notification.revision <= this.list.revision) return 'stale';
    if (notification.revision > this.list.revision + 1) return 'gap';

    if (notification.change.kind === 'list_deleted') {
      this.list = null;
      this.deleted = true;
      return 'deleted';
    }

    const next = cloneList(this.list);
    if (!applyChange(next, notification.change)) return 'gap';
    next.revision = notification.revision;
    next.updatedAt = notification.committedAt;
    this.list = next;
    return 'applied';
  }
}

/** Apply one change in place; false when it does not fit the current items */
function applyChange(list: ShoppingList, change: ListChange): boolean {
  const indexOf = (itemId: string) => list.items.findIndex((item) => item.id === itemId);

  switch (change.kind) {
    case 'item_added': {
      if (change.position < 0 || change.position > list.items.length) return false;
      list.items.splice(change.position, 0, cloneItem(change.item));
      return true;
    }
    case 'item_updated': {
      const index = indexOf(change.item.id);
      if (index === -1) return false;
      list.items[index] = cloneItem(change.item);
      return true;
    }
    case 'items_updated': {
      const indexes = change.items.map((item) => indexOf(item.id));
      if (indexes.includes(-1)) return false;
      change.items.forEach((item, i) => {
        list.items[indexes[i]] = cloneItem(item);
      });
      return true;
    }
    case 'item_removed': {
      const index = indexOf(change.itemId);
      if (index === -1) return false;
      list.items.splice(index, 1);
      return true;
    }
    case 'item_moved': {
      const index = indexOf(change.itemId);
      if (index === -1 || change.position < 0 || change.position >= list.items.length) return false;
      const [item] = list.items.splice(index, 1);
      list.items.splice(change.position, 0, item);
      return true;
    }
    case 'items_removed': {
      const removed = new Set(change.itemIds);
      list.items = list.items.filter((item) => !removed.has(item.id));
      return true;
    }
    case 'list_renamed': {
      list.name = change.name;
      return true;
    }
    case 'list_deleted':
      return false;
  }
}
