/**
 * JSON document persistence: the collection lives in one file,
 * replaced by write-to-temp + rename.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_QUANTITY, DEFAULT_UNIT, type ShoppingList } from '../types';
import type { PersistenceAdapter } from './adapter';

const DOCUMENT_VERSION = 1;
const EPOCH = new Date(0).toISOString();

// Fields added after version 1 must carry defaults so older documents still load
const ItemDocument = z.object({
  id: z.string(),
  text: z.string(),
  checked: z.boolean().default(false),
  quantity: z.number().positive().default(DEFAULT_QUANTITY),
  unit: z.string().default(DEFAULT_UNIT),
  note: z.string().nullable().default(null),
  checkedAt: z.string().nullable().default(null),
  createdAt: z.string().default(EPOCH),
  updatedAt: z.string().optional(),
});

const ListDocument = z.object({
  id: z.string(),
  name: z.string(),
  revision: z.number().int().min(0).default(0),
  items: z.array(ItemDocument).default([]),
  createdAt: z.string().default(EPOCH),
  updatedAt: z.string().optional(),
});

const CollectionDocument = z.object({
  version: z.number().int().default(DOCUMENT_VERSION),
  lists: z.array(ListDocument).default([]),
});

export class JsonFileListStorage implements PersistenceAdapter {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<ShoppingList[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const document = CollectionDocument.parse(JSON.parse(raw));
    return document.lists.map((list) => ({
      id: list.id,
      name: list.name,
      revision: list.revision,
      createdAt: list.createdAt,
      updatedAt: list.updatedAt ?? list.createdAt,
      items: list.items.map((item) => ({
        id: item.id,
        text: item.text,
        checked: item.checked,
        quantity: item.quantity,
        unit: item.unit,
        note: item.note,
        checkedAt: item.checkedAt,
        createdAt: item.createdAt,
        updatedAt: item.updatedAt ?? item.createdAt,
      })),
    }));
  }

  async save(lists: ShoppingList[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const body = JSON.stringify({ version: DOCUMENT_VERSION, lists }, null, 2);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(body, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    // rename is atomic on the same filesystem
    await fs.rename(tempPath, this.filePath);
  }

  async close(): Promise<void> {
    // Nothing held open between saves
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
