/**
 * CartSync client
 *
 * Type-safe access to the list server over a WebSocket: correlated
 * requests with timeouts, and live list mirrors fed by change pushes.
 */

import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ListSyncError, errorMessage, isListSyncError } from '../errors';
import type { ChangeNotification, ItemDetails, ItemFields, ListItem, ListSummary, ShoppingList } from '../types';
import type { CommandInput, CommandType } from '../websocket/protocol';
import { ListMirror } from './list-mirror';
import {
  InboundMessageSchema,
  ListItemSchema,
  ListSummarySchema,
  ShoppingListSchema,
  type InboundSuccess,
} from './schemas';

/**
 * The request got no answer in time. The command may or may not have
 * committed; it is not retried. A late answer for it is dropped.
 */
export class RequestTimeoutError extends Error {
  readonly command: CommandType;
  readonly requestId: string;

  constructor(command: CommandType, requestId: string, timeoutMs: number) {
    super(`${command} got no response within ${timeoutMs}ms; outcome unknown`);
    this.name = 'RequestTimeoutError';
    this.command = command;
    this.requestId = requestId;
  }
}

export interface ClientOptions {
  requestTimeoutMs?: number;
}

export type ListListener = (list: ShoppingList | null) => void;

interface PendingRequest {
  resolve: (response: InboundSuccess) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface Watch {
  mirror: ListMirror;
  listener: ListListener;
  loaded: boolean;
  resyncing: boolean;
  buffered: ChangeNotification[]; // arrived while waiting for a snapshot
}

export class CartSyncClient extends EventEmitter {
  private url: string;
  private requestTimeoutMs: number;
  private socket: WebSocket | null = null;
  private pending = new Map<string, PendingRequest>();
  private watches = new Map<string, Watch>();

  constructor(url: string, options: ClientOptions = {}) {
    super();
    this.url = url;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
  }

  /**
   * Open the connection
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.socket = socket;

      socket.once('open', () => {
        socket.off('error', reject);
        socket.on('error', (error) => this.emit('transport_error', error));
        resolve();
      });
      socket.once('error', reject);
      socket.on('message', (data) => this.handleMessage(data.toString()));
      socket.on('close', () => this.handleClose());
    });
  }

  /**
   * Close the connection; outstanding requests fail with TransportFailure
   */
  disconnect(): void {
    this.socket?.close();
  }

  isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /**
   * Send one command and wait for its response
   */
  request<K extends CommandType>(
    type: K,
    data: CommandInput<K>,
    options: { timeoutMs?: number } = {},
  ): Promise<InboundSuccess> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ListSyncError('TransportFailure', 'Not connected'));
    }

    const id = uuidv4();
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RequestTimeoutError(type, id, timeoutMs));
      }, timeoutMs);

      this.pending.set(id, { resolve, reject, timer });
      socket.send(JSON.stringify({ type, data, id }), (error) => {
        if (!error) return;
        clearTimeout(timer);
        this.pending.delete(id);
        reject(new ListSyncError('TransportFailure', error.message, { cause: error }));
      });
    });
  }

  // ==========================================================================
  // List Operations
  // ==========================================================================

  async listLists(): Promise<ListSummary[]> {
    const response = await this.request('list_lists', {});
    return z.array(ListSummarySchema).parse(response.data);
  }

  async createList(name: string, id?: string): Promise<ShoppingList> {
    const response = await this.request('create_list', { name, id });
    return ShoppingListSchema.parse(response.data);
  }

  async renameList(listId: string, name: string): Promise<ShoppingList> {
    const response = await this.request('rename_list', { listId, name });
    return ShoppingListSchema.parse(response.data);
  }

  async deleteList(listId: string): Promise<void> {
    await this.request('delete_list', { listId });
  }

  async getList(listId: string): Promise<ShoppingList> {
    const response = await this.request('get_list', { listId });
    return ShoppingListSchema.parse(response.data);
  }

  // ==========================================================================
  // Item Operations
  // ==========================================================================

  async addItem(listId: string, text: string, details: ItemDetails = {}): Promise<ListItem> {
    const response = await this.request('add_item', { listId, text, ...details });
    return ListItemSchema.parse(response.data);
  }

  async updateItem(listId: string, itemId: string, fields: ItemFields): Promise<ListItem> {
    const response = await this.request('update_item', { listId, itemId, fields });
    return ListItemSchema.parse(response.data);
  }

  /** Change an item's quantity by `amount`; it never drops below 1 */
  async incrementItem(listId: string, itemId: string, amount: number): Promise<ListItem> {
    const response = await this.request('increment_item', { listId, itemId, amount });
    return ListItemSchema.parse(response.data);
  }

  async checkItems(listId: string, itemIds: string[], checked: boolean): Promise<ListItem[]> {
    const response = await this.request('check_items', { listId, itemIds, checked });
    return z.array(ListItemSchema).parse(response.data);
  }

  async removeItem(listId: string, itemId: string): Promise<void> {
    await this.request('remove_item', { listId, itemId });
  }

  async reorderItem(listId: string, itemId: string, position: number): Promise<void> {
    await this.request('reorder_item', { listId, itemId, position });
  }

  async clearChecked(listId: string): Promise<number> {
    const response = await this.request('clear_checked', { listId });
    return z.object({ count: z.number().int() }).parse(response.data).count;
  }

  // ==========================================================================
  // Live Lists
  // ==========================================================================

  /**
   * Subscribe to a list and keep a mirror of it. `listener` gets the new
   * state after every applied change, and null once the list is deleted.
   * Resolves with the initial snapshot.
   */
  async watchList(listId: string, listener: ListListener): Promise<ShoppingList> {
    const watch: Watch = {
      mirror: new ListMirror(listId),
      listener,
      loaded: false,
      resyncing: false,
      buffered: [],
    };
    this.watches.set(listId, watch);

    try {
      const response = await this.request('subscribe', { listId });
      const snapshot = ShoppingListSchema.parse(response.data);
      watch.mirror.load(snapshot);
      watch.loaded = true;
      this.replay(watch);
      return snapshot;
    } catch (error: unknown) {
      this.watches.delete(listId);
      throw error;
    }
  }

  /** Stop watching. The mirror is kept if the server refuses. */
  async unwatchList(listId: string): Promise<void> {
    await this.request('unsubscribe', { listId });
    this.watches.delete(listId);
  }

  /** Current mirrored state of a watched list */
  getMirror(listId: string): ShoppingList | null {
    return this.watches.get(listId)?.mirror.state ?? null;
  }

  private handleMessage(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      this.emit('protocol_error', error);
      return;
    }

    const result = InboundMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.emit('protocol_error', result.error);
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'hello':
        this.emit('hello', message.data);
        break;

      case 'list_changed':
        this.handleChange(message.data);
        this.emit('change', message.data);
        break;

      case 'success':
      case 'error': {
        const pending = message.requestId ? this.pending.get(message.requestId) : undefined;
        if (!message.requestId || !pending) {
          // Timed out earlier, or not ours
          this.emit('late_response', message);
          return;
        }
        clearTimeout(pending.timer);
        this.pending.delete(message.requestId);
        if (message.type === 'success') {
          if (message.warning) this.emit('durability_degraded');
          pending.resolve(message);
        } else {
          pending.reject(new ListSyncError(message.error.code, message.error.message));
        }
        break;
      }
    }
  }

  private handleChange(notification: ChangeNotification): void {
    const watch = this.watches.get(notification.listId);
    if (!watch) return;
    if (!watch.loaded || watch.resyncing) {
      watch.buffered.push(notification);
      return;
    }

    const outcome = watch.mirror.apply(notification);
    if (outcome === 'applied') {
      watch.listener(watch.mirror.state);
    } else if (outcome === 'deleted') {
      this.watches.delete(notification.listId);
      watch.listener(null);
    } else if (outcome === 'gap') {
      this.resync(watch);
    }
  }

  /** Reload a mirror from a full snapshot after a missed revision */
  private resync(watch: Watch): void {
    const listId = watch.mirror.listId;
    watch.resyncing = true;
    this.getList(listId)
      .then((snapshot) => {
        watch.mirror.load(snapshot);
        watch.resyncing = false;
        watch.listener(watch.mirror.state);
        // Changes that arrived during the reload; older revisions come back stale
        this.replay(watch);
      })
      .catch((error: unknown) => {
        watch.resyncing = false;
        watch.buffered = [];
        if (isListSyncError(error) && error.code === 'NotFound') {
          if (this.watches.get(listId) === watch) this.watches.delete(listId);
          watch.listener(null);
          return;
        }
        this.emit('resync_failed', listId, new Error(errorMessage(error)));
      });
  }

  private replay(watch: Watch): void {
    for (const notification of watch.buffered.splice(0)) {
      this.handleChange(notification);
    }
  }

  private handleClose(): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new ListSyncError('TransportFailure', `Connection closed before response to ${id}`));
    }
    this.pending.clear();
    this.socket = null;
    this.emit('disconnected');
  }
}
