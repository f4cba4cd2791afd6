/**
 * Core types for CartSync lists, items and change notifications
 */

export interface ListItem {
  id: string;
  text: string;
  checked: boolean;
  quantity: number; // always > 0
  unit: string;
  note: string | null;
  checkedAt: string | null; // set when the item was last checked
  createdAt: string;
  updatedAt: string;
}

export interface ShoppingList {
  id: string;
  name: string;
  revision: number;
  items: ListItem[]; // presentation order
  createdAt: string;
  updatedAt: string;
}

export interface ListSummary {
  id: string;
  name: string;
  revision: number;
  itemCount: number;
  checkedCount: number;
  updatedAt: string;
}

/** Optional details of a new item */
export interface ItemDetails {
  note?: string | null;
  quantity?: number;
  unit?: string;
}

/** Partial update accepted by updateItem. `note: null` clears the note. */
export interface ItemFields {
  text?: string;
  checked?: boolean;
  note?: string | null;
  quantity?: number;
  unit?: string;
}

export const DEFAULT_QUANTITY = 1;
export const DEFAULT_UNIT = 'units';

/**
 * Change descriptors pushed to subscribers.
 * Each one carries enough to rebuild the list without a refetch.
 */
export type ListChange =
  | { kind: 'item_added'; item: ListItem; position: number }
  | { kind: 'item_updated'; item: ListItem }
  | { kind: 'items_updated'; items: ListItem[] }
  | { kind: 'item_removed'; itemId: string }
  | { kind: 'item_moved'; itemId: string; position: number }
  | { kind: 'items_removed'; itemIds: string[] }
  | { kind: 'list_renamed'; name: string }
  | { kind: 'list_deleted' };

export interface ChangeNotification {
  listId: string;
  revision: number;
  committedAt: string;
  change: ListChange;
}

export function cloneItem(item: ListItem): ListItem {
  return { ...item };
}

export function cloneList(list: ShoppingList): ShoppingList {
  return { ...list, items: list.items.map(cloneItem) };
}

export function summarizeList(list: ShoppingList): ListSummary {
  return {
    id: list.id,
    name: list.name,
    revision: list.revision,
    itemCount: list.items.length,
    checkedCount: list.items.filter((item) => item.checked).length,
    updatedAt: list.updatedAt,
  };
}
