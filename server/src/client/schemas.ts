/**
 * Runtime shapes of server messages, as seen by clients
 */

import { z } from 'zod';

export const ListItemSchema = z.object({
  id: z.string(),
  text: z.string(),
  checked: z.boolean(),
  quantity: z.number(),
  unit: z.string(),
  note: z.string().nullable(),
  checkedAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const ShoppingListSchema = z.object({
  id: z.string(),
  name: z.string(),
  revision: z.number().int(),
  items: z.array(ListItemSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const ListSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  revision: z.number().int(),
  itemCount: z.number().int(),
  checkedCount: z.number().int(),
  updatedAt: z.string(),
});

const ListChangeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('item_added'), item: ListItemSchema, position: z.number().int() }),
  z.object({ kind: z.literal('item_updated'), item: ListItemSchema }),
  z.object({ kind: z.literal('items_updated'), items: z.array(ListItemSchema) }),
  z.object({ kind: z.literal('item_removed'), itemId: z.string() }),
  z.object({ kind: z.literal('item_moved'), itemId: z.string(), position: z.number().int() }),
  z.object({ kind: z.literal('items_removed'), itemIds: z.array(z.string()) }),
  z.object({ kind: z.literal('list_renamed'), name: z.string() }),
  z.object({ kind: z.literal('list_deleted') }),
]);

export const ChangeNotificationSchema = z.object({
  listId: z.string(),
  revision: z.number().int(),
  committedAt: z.string(),
  change: ListChangeSchema,
});

const ErrorCodeSchema = z.enum([
  'NotFound',
  'AlreadyExists',
  'InvalidArgument',
  'DurabilityDegraded',
  'TransportFailure',
  'Internal',
]);

export const InboundMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('success'),
    command: z.string(),
    data: z.unknown(),
    revision: z.number().int().optional(),
    requestId: z.string().optional(),
    warning: z.literal('DurabilityDegraded').optional(),
  }),
  z.object({
    type: z.literal('error'),
    command: z.string().optional(),
    error: z.object({ code: ErrorCodeSchema, message: z.string() }),
    requestId: z.string().optional(),
  }),
  z.object({ type: z.literal('list_changed'), data: ChangeNotificationSchema }),
  z.object({
    type: z.literal('hello'),
    data: z.object({ sessionId: z.string(), lists: z.array(ListSummarySchema) }),
  }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;
export type InboundSuccess = Extract<InboundMessage, { type: 'success' }>;
