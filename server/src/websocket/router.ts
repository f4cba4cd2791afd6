/**
 * Command router: validates client messages, calls the list store and
 * answers the originating session.
 *
 * The router keeps no state between commands. Same-list ordering comes
 * from the store's lanes; commands for different lists run concurrently.
 */

import type { z } from 'zod';
import { invalidArgument, isListSyncError, notFound, type ListSyncError } from '../errors';
import type { ListStore } from '../store/list-store';
import type { SubscriptionBroadcaster, SubscriberSession } from './broadcaster';
import {
  CommandSchemas,
  EnvelopeSchema,
  isCommandType,
  type CommandType,
  type ErrorResponse,
  type SuccessResponse,
} from './protocol';

export class CommandRouter {
  private store: ListStore;
  private broadcaster: SubscriptionBroadcaster;

  constructor(store: ListStore, broadcaster: SubscriptionBroadcaster) {
    this.store = store;
    this.broadcaster = broadcaster;
  }

  /** Handle one raw text frame from a session */
  async handleRaw(session: SubscriberSession, raw: string): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.fail(session, invalidArgument('Invalid message: not valid JSON'));
      return;
    }
    await this.handle(session, message);
  }

  /** Handle one decoded message; always answers the session exactly once */
  async handle(session: SubscriberSession, message: unknown): Promise<void> {
    const envelope = EnvelopeSchema.safeParse(message);
    if (!envelope.success) {
      this.fail(session, invalidArgument(`Invalid message: ${formatIssues(envelope.error)}`), requestIdOf(message));
      return;
    }

    const { type, data = {}, id } = envelope.data;
    if (!isCommandType(type)) {
      this.fail(session, invalidArgument(`Unknown message type: ${type}`), id, type);
      return;
    }

    try {
      await this.dispatch(session, type, data, id);
    } catch (error: unknown) {
      this.fail(session, error, id, type);
    }
  }

  private async dispatch(
    session: SubscriberSession,
    type: CommandType,
    data: Record<string, unknown>,
    requestId?: string,
  ): Promise<void> {
    switch (type) {
      case 'create_list': {
        const { name, id } = parseData(CommandSchemas.create_list, data);
        const list = await this.store.createList(name, id);
        this.succeed(session, type, list, list.revision, requestId);
        break;
      }

      case 'delete_list': {
        const { listId } = parseData(CommandSchemas.delete_list, data);
        await this.store.deleteList(listId);
        this.succeed(session, type, null, undefined, requestId);
        break;
      }

      case 'rename_list': {
        const { listId, name } = parseData(CommandSchemas.rename_list, data);
        const { value, revision } = await this.store.renameList(listId, name);
        this.succeed(session, type, value, revision, requestId);
        break;
      }

      case 'list_lists': {
        parseData(CommandSchemas.list_lists, data);
        this.succeed(session, type, this.store.listSummaries(), undefined, requestId);
        break;
      }

      case 'get_list': {
        const { listId } = parseData(CommandSchemas.get_list, data);
        const snapshot = this.store.getSnapshot(listId);
        this.succeed(session, type, snapshot, snapshot.revision, requestId);
        break;
      }

      case 'subscribe': {
        const { listId } = parseData(CommandSchemas.subscribe, data);
        // Register and answer inside the list's lane: every later notification
        // is queued on the session after this snapshot.
        await this.store.inspect(listId, (snapshot) => {
          this.broadcaster.subscribe(session, listId);
          this.succeed(session, type, snapshot, snapshot.revision, requestId);
        });
        break;
      }

      case 'unsubscribe': {
        const { listId } = parseData(CommandSchemas.unsubscribe, data);
        if (!this.broadcaster.unsubscribe(session, listId)) {
          throw notFound(`Not subscribed to list: ${listId}`);
        }
        this.succeed(session, type, null, undefined, requestId);
        break;
      }

      case 'add_item': {
        const { listId, text, ...details } = parseData(CommandSchemas.add_item, data);
        const { value, revision } = await this.store.addItem(listId, text, details);
        this.succeed(session, type, value, revision, requestId);
        break;
      }

      case 'update_item': {
        const { listId, itemId, fields } = parseData(CommandSchemas.update_item, data);
        const { value, revision } = await this.store.updateItem(listId, itemId, fields);
        this.succeed(session, type, value, revision, requestId);
        break;
      }

      case 'increment_item': {
        const { listId, itemId, amount } = parseData(CommandSchemas.increment_item, data);
        const { value, revision } = await this.store.incrementItem(listId, itemId, amount);
        this.succeed(session, type, value, revision, requestId);
        break;
      }

      case 'check_items': {
        const { listId, itemIds, checked } = parseData(CommandSchemas.check_items, data);
        const { value, revision } = await this.store.checkItems(listId, itemIds, checked);
        this.succeed(session, type, value, revision, requestId);
        break;
      }

      case 'remove_item': {
        const { listId, itemId } = parseData(CommandSchemas.remove_item, data);
        const { revision } = await this.store.removeItem(listId, itemId);
        this.succeed(session, type, null, revision, requestId);
        break;
      }

      case 'reorder_item': {
        const { listId, itemId, position } = parseData(CommandSchemas.reorder_item, data);
        const { revision } = await this.store.reorderItem(listId, itemId, position);
        this.succeed(session, type, null, revision, requestId);
        break;
      }

      case 'clear_checked': {
        const { listId } = parseData(CommandSchemas.clear_checked, data);
        const { value, revision } = await this.store.clearChecked(listId);
        this.succeed(session, type, { count: value }, revision, requestId);
        break;
      }
    }
  }

  private succeed(
    session: SubscriberSession,
    command: CommandType,
    data: unknown,
    revision?: number,
    requestId?: string,
  ): void {
    const response: SuccessResponse = { type: 'success', command, data };
    if (revision !== undefined) response.revision = revision;
    if (requestId !== undefined) response.requestId = requestId;
    if (this.store.durabilityDegraded) response.warning = 'DurabilityDegraded';
    this.broadcaster.deliver(session, response);
  }

  private fail(session: SubscriberSession, error: unknown, requestId?: string, command?: string): void {
    const known: ListSyncError | null = isListSyncError(error) ? error : null;
    if (!known) {
      console.error(`[router] Unexpected error handling ${command ?? 'message'}:`, error);
    }

    const response: ErrorResponse = {
      type: 'error',
      error: known ? { code: known.code, message: known.message } : { code: 'Internal', message: 'Internal error' },
    };
    if (command !== undefined) response.command = command;
    if (requestId !== undefined) response.requestId = requestId;
    this.broadcaster.deliver(session, response);
  }
}

function parseData<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw invalidArgument(`Invalid payload: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Echo a correlation token even when the rest of the envelope is malformed */
function requestIdOf(message: unknown): string | undefined {
  if (typeof message === 'object' && message !== null && 'id' in message && typeof message.id === 'string') {
    return message.id;
  }
  return undefined;
}
