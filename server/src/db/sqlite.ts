/**
 * SQLite persistence for CartSync
 * Stores the whole list collection; every save replaces it inside one transaction
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { DEFAULT_QUANTITY, DEFAULT_UNIT, type ListItem, type ShoppingList } from '../types';
import type { PersistenceAdapter } from './adapter';

interface ListRow {
  id: string;
  name: string;
  revision: number | null;
  created_at: string | null;
  updated_at: string | null;
}

interface ItemRow {
  id: string;
  list_id: string;
  position: number;
  text: string;
  checked: number | null;
  quantity: number | null;
  unit: string | null;
  note: string | null;
  checked_at: string | null;
  created_at: string | null;
  updated_at: string | null;
}

const EPOCH = new Date(0).toISOString();

export class SQLiteListStorage implements PersistenceAdapter {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      // Ensure directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS lists (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        revision INTEGER NOT NULL DEFAULT 0,
        created_at TEXT,
        updated_at TEXT
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS items (
        list_id TEXT NOT NULL,
        id TEXT NOT NULL,
        position INTEGER NOT NULL,
        text TEXT NOT NULL,
        checked INTEGER NOT NULL DEFAULT 0,
        created_at TEXT,
        updated_at TEXT,
        PRIMARY KEY (list_id, id),
        FOREIGN KEY (list_id) REFERENCES lists(id) ON DELETE CASCADE
      )
    `);

    // Migrate: columns added after the first schema
    const itemColumns = this.db.pragma('table_info(items)') as { name: string }[];
    if (!itemColumns.some((col) => col.name === 'note')) {
      this.db.exec(`ALTER TABLE items ADD COLUMN note TEXT`);
    }
    if (!itemColumns.some((col) => col.name === 'checked_at')) {
      this.db.exec(`ALTER TABLE items ADD COLUMN checked_at TEXT`);
    }
    if (!itemColumns.some((col) => col.name === 'quantity')) {
      this.db.exec(`ALTER TABLE items ADD COLUMN quantity REAL NOT NULL DEFAULT ${DEFAULT_QUANTITY}`);
    }
    if (!itemColumns.some((col) => col.name === 'unit')) {
      this.db.exec(`ALTER TABLE items ADD COLUMN unit TEXT`);
    }

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_items_list ON items(list_id, position);
    `);
  }

  async load(): Promise<ShoppingList[]> {
    const listRows = this.db.prepare('SELECT * FROM lists ORDER BY id').all() as ListRow[];
    const itemRows = this.db
      .prepare('SELECT * FROM items ORDER BY list_id, position')
      .all() as ItemRow[];

    const itemsByList = new Map<string, ListItem[]>();
    for (const row of itemRows) {
      const items = itemsByList.get(row.list_id) ?? [];
      items.push(rowToItem(row));
      itemsByList.set(row.list_id, items);
    }

    return listRows.map((row) => ({
      id: row.id,
      name: row.name,
      revision: row.revision ?? 0,
      items: itemsByList.get(row.id) ?? [],
      createdAt: row.created_at ?? EPOCH,
      updatedAt: row.updated_at ?? row.created_at ?? EPOCH,
    }));
  }

  async save(lists: ShoppingList[]): Promise<void> {
    const insertList = this.db.prepare(`
      INSERT INTO lists (id, name, revision, created_at, updated_at)
      VALUES (@id, @name, @revision, @createdAt, @updatedAt)
    `);
    const insertItem = this.db.prepare(`
      INSERT INTO items (list_id, id, position, text, checked, quantity, unit, note, checked_at, created_at, updated_at)
      VALUES (@listId, @id, @position, @text, @checked, @quantity, @unit, @note, @checkedAt, @createdAt, @updatedAt)
    `);

    // Replace the whole collection atomically; readers keep the old rows until commit
    const replaceAll = this.db.transaction((collection: ShoppingList[]) => {
      this.db.prepare('DELETE FROM items').run();
      this.db.prepare('DELETE FROM lists').run();

      for (const list of collection) {
        insertList.run({
          id: list.id,
          name: list.name,
          revision: list.revision,
          createdAt: list.createdAt,
          updatedAt: list.updatedAt,
        });
        list.items.forEach((item, position) => {
          insertItem.run({
            listId: list.id,
            id: item.id,
            position,
            text: item.text,
            checked: item.checked ? 1 : 0,
            quantity: item.quantity,
            unit: item.unit,
            note: item.note,
            checkedAt: item.checkedAt,
            createdAt: item.createdAt,
            updatedAt: item.updatedAt,
          });
        });
      }
    });

    replaceAll(lists);
  }

  /**
   * Cleanup and close
   */
  async close(): Promise<void> {
    this.db.close();
  }
}

function rowToItem(row: ItemRow): ListItem {
  const createdAt = row.created_at ?? EPOCH;
  return {
    id: row.id,
    text: row.text,
    checked: row.checked === 1,
    quantity: row.quantity ?? DEFAULT_QUANTITY,
    unit: row.unit ?? DEFAULT_UNIT,
    note: row.note ?? null,
    checkedAt: row.checked_at ?? null,
    createdAt,
    updatedAt: row.updated_at ?? createdAt,
  };
}
