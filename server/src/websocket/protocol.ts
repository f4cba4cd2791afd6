/**
 * Wire protocol: client commands, responses and server pushes.
 *
 * Every client message is `{ type, data, id? }`; `id` is echoed back as
 * `requestId` so clients can match responses (and drop late ones).
 */

import { z } from 'zod';
import type { ErrorCode } from '../errors';
import type { ChangeNotification, ListSummary } from '../types';

const listId = z.string().min(1);
const itemId = z.string().min(1);
const quantity = z.number().positive().finite();

export const CommandSchemas = {
  create_list: z.object({ name: z.string(), id: z.string().optional() }),
  delete_list: z.object({ listId }),
  rename_list: z.object({ listId, name: z.string() }),
  list_lists: z.object({}),
  get_list: z.object({ listId }),
  subscribe: z.object({ listId }),
  unsubscribe: z.object({ listId }),
  add_item: z.object({
    listId,
    text: z.string(),
    note: z.string().nullable().optional(),
    quantity: quantity.optional(),
    unit: z.string().optional(),
  }),
  update_item: z.object({
    listId,
    itemId,
    fields: z
      .object({
        text: z.string().optional(),
        checked: z.boolean().optional(),
        note: z.string().nullable().optional(),
        quantity: quantity.optional(),
        unit: z.string().optional(),
      })
      .strict(),
  }),
  increment_item: z.object({ listId, itemId, amount: z.number().finite() }),
  check_items: z.object({ listId, itemIds: z.array(itemId), checked: z.boolean() }),
  remove_item: z.object({ listId, itemId }),
  reorder_item: z.object({ listId, itemId, position: z.number().int() }),
  clear_checked: z.object({ listId }),
} as const;

export type CommandType = keyof typeof CommandSchemas;

export type CommandData<K extends CommandType> = z.infer<(typeof CommandSchemas)[K]>;

/** What a client may send for a command, before defaults are applied */
export type CommandInput<K extends CommandType> = z.input<(typeof CommandSchemas)[K]>;

export const EnvelopeSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).optional(),
  id: z.string().max(128).optional(),
});

export type Envelope = z.infer<typeof EnvelopeSchema>;

export function isCommandType(type: string): type is CommandType {
  return Object.prototype.hasOwnProperty.call(CommandSchemas, type);
}

export interface SuccessResponse {
  type: 'success';
  command: CommandType;
  data: unknown;
  revision?: number;
  requestId?: string;
  warning?: 'DurabilityDegraded';
}

export interface ErrorResponse {
  type: 'error';
  command?: string;
  error: { code: ErrorCode; message: string };
  requestId?: string;
}

export interface ChangePush {
  type: 'list_changed';
  data: ChangeNotification;
}

export interface HelloPush {
  type: 'hello';
  data: { sessionId: string; lists: ListSummary[] };
}

export type ServerMessage = SuccessResponse | ErrorResponse | ChangePush | HelloPush;
