/**
 * Persistence layer for CartSync
 *
 * PersistenceScheduler batches saves of the whole collection behind a short
 * window and retries failed writes. It extends EventEmitter and emits
 * 'degraded' when a write fails and 'recovered' when one succeeds again.
 */

import { EventEmitter } from 'events';
import path from 'path';
import type { ServerConfig } from '../config';
import { errorMessage } from '../errors';
import type { ShoppingList } from '../types';
import type { PersistenceAdapter } from './adapter';
import { JsonFileListStorage } from './json-file';
import { SQLiteListStorage } from './sqlite';

export interface PersistenceOptions {
  debounceMs: number; // batch window opened by the first unsaved mutation
  retryMs: number; // delay before retrying a failed write
}

export class PersistenceScheduler extends EventEmitter {
  private adapter: PersistenceAdapter;
  private collect: () => ShoppingList[];
  private options: PersistenceOptions;
  private timer: NodeJS.Timeout | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private dirty = false;
  private closed = false;
  private _degraded = false;
  private _lastError: unknown = null;
  private _saves = 0;

  constructor(adapter: PersistenceAdapter, collect: () => ShoppingList[], options: PersistenceOptions) {
    super();
    this.adapter = adapter;
    this.collect = collect;
    this.options = options;
  }

  get degraded(): boolean {
    return this._degraded;
  }

  get lastError(): unknown {
    return this._lastError;
  }

  /** Successful writes since start */
  get saves(): number {
    return this._saves;
  }

  /** True while some committed change has not been written yet */
  get pending(): boolean {
    return this.dirty;
  }

  /**
   * Mark the collection as changed. The first call opens a batch window;
   * calls inside the window join that batch.
   */
  schedule(): void {
    this.dirty = true;
    if (this.closed) return;
    this.arm(this.options.debounceMs);
  }

  /**
   * Write the current collection now. Writes never overlap. Resolves to
   * false when the write failed; the failure is retried later.
   */
  flush(): Promise<boolean> {
    this.disarm();
    const run = this.queue.then(() => this.write());
    this.queue = run;
    return run;
  }

  /** Write anything still pending and release the adapter */
  async close(): Promise<void> {
    this.closed = true;
    this.disarm();
    if (this.dirty) {
      await this.flush();
    }
    await this.queue;
    await this.adapter.close();
  }

  private async write(): Promise<boolean> {
    if (!this.dirty) return true;
    this.dirty = false;

    const lists = this.collect();
    try {
      await this.adapter.save(lists);
    } catch (error: unknown) {
      this.dirty = true;
      this._lastError = error;
      console.warn(`[persistence] Save failed, changes kept in memory: ${errorMessage(error)}`);
      if (!this._degraded) {
        this._degraded = true;
        this.emit('degraded', error);
      }
      if (!this.closed) {
        this.arm(this.options.retryMs);
      }
      return false;
    }

    this._saves++;
    this._lastError = null;
    if (this._degraded) {
      this._degraded = false;
      console.log('[persistence] Save succeeded again, durability restored');
      this.emit('recovered');
    }
    return true;
  }

  private arm(delayMs: number): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((error: unknown) => {
        console.error('[persistence] Unexpected flush error:', error);
      });
    }, delayMs);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/** Build the adapter selected by configuration */
export function openStorage(config: Pick<ServerConfig, 'dataDir' | 'storageDriver'>): PersistenceAdapter {
  if (config.storageDriver === 'json') {
    return new JsonFileListStorage(path.join(config.dataDir, 'lists.json'));
  }
  return new SQLiteListStorage(path.join(config.dataDir, 'cartsync.db'));
}

export type { PersistenceAdapter };
export { SQLiteListStorage, JsonFileListStorage };
